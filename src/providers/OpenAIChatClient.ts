/**
 * OpenAI Chat Client
 *
 * Wraps the OpenAI SDK (or any compatible endpoint via baseURL). Retries are
 * left to the caller's RetryPolicy.
 */

import OpenAI from 'openai';
import type { ChatToolDefinition } from '../tools/types.js';
import type { ChatClient, ChatClientConfig, ChatMessage, ChatResponse, FinishReason, ToolCall } from './types.js';

const DEFAULT_TIMEOUT_MS = 60000;

type OpenAIMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;

export function parseToolArguments(raw: string): unknown {
  if (!raw.trim()) return {};
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    return raw;
  }
}

function toOpenAIMessage(message: ChatMessage): OpenAIMessage {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'tool':
      return { role: 'tool', content: message.content, tool_call_id: message.toolCallId };
    case 'assistant':
      if (message.toolCalls && message.toolCalls.length > 0) {
        return {
          role: 'assistant',
          content: message.content,
          tool_calls: message.toolCalls.map(call => ({
            id: call.id,
            type: 'function' as const,
            function: { name: call.name, arguments: call.rawArguments }
          }))
        };
      }
      return { role: 'assistant', content: message.content };
  }
}

function toFinishReason(reason: string | null | undefined): FinishReason {
  switch (reason) {
    case 'stop':
      return 'stop';
    case 'tool_calls':
      return 'tool_calls';
    case 'length':
      return 'length';
    case 'content_filter':
      return 'content_filter';
    default:
      return 'other';
  }
}

export class OpenAIChatClient implements ChatClient {
  private client: OpenAI;
  private config: ChatClientConfig;

  constructor(config: ChatClientConfig) {
    if (!config.apiKey) {
      throw new Error('OpenAI API key is required');
    }
    this.config = config;
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      timeout: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      maxRetries: 0
    });
  }

  getModel(): string {
    return this.config.model;
  }

  async complete(messages: readonly ChatMessage[], tools: readonly ChatToolDefinition[]): Promise<ChatResponse> {
    const response = await this.client.chat.completions.create({
      model: this.config.model,
      temperature: this.config.temperature,
      messages: messages.map(toOpenAIMessage),
      ...(tools.length > 0 ? { tools: [...tools] } : {})
    });

    const choice = response.choices[0];
    if (!choice) {
      return { content: null, toolCalls: [], finishReason: 'other' };
    }

    const toolCalls: ToolCall[] = (choice.message.tool_calls ?? []).map(call => ({
      id: call.id,
      name: call.function.name,
      arguments: parseToolArguments(call.function.arguments),
      rawArguments: call.function.arguments
    }));

    return {
      content: choice.message.content,
      toolCalls,
      finishReason: toFinishReason(choice.finish_reason)
    };
  }
}
