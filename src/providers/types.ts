/**
 * Chat Provider Types
 *
 * The narrow surface the agent loop needs from an LLM: one completion per
 * call, with function-calling.
 */

import type { ChatToolDefinition } from '../tools/types.js';

export interface ToolCall {
  id: string;
  name: string;
  /** Parsed JSON arguments, or the raw string when it was not valid JSON */
  arguments: unknown;
  rawArguments: string;
}

export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string | null; toolCalls?: ToolCall[] }
  | { role: 'tool'; content: string; toolCallId: string };

export type FinishReason = 'stop' | 'tool_calls' | 'length' | 'content_filter' | 'other';

export interface ChatResponse {
  content: string | null;
  toolCalls: ToolCall[];
  finishReason: FinishReason;
}

export interface ChatClient {
  complete(messages: readonly ChatMessage[], tools: readonly ChatToolDefinition[]): Promise<ChatResponse>;
}

export interface ChatClientConfig {
  apiKey: string;
  baseURL: string;
  model: string;
  temperature: number;
  timeoutMs?: number;
}
