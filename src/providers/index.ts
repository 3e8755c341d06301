/**
 * Chat Provider Module
 */

export { OpenAIChatClient, parseToolArguments } from './OpenAIChatClient.js';
export type {
  ChatClient,
  ChatClientConfig,
  ChatMessage,
  ChatResponse,
  FinishReason,
  ToolCall
} from './types.js';
