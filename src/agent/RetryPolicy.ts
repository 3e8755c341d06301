/**
 * Retry Policy
 *
 * Exponential backoff around LLM calls. Only the agent loop retries; the
 * client itself is built with retries disabled.
 */

import { LLMRequestError } from '../core/errors.js';

export interface RetryPolicyConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  factor: number;
}

export const DEFAULT_RETRY_CONFIG: RetryPolicyConfig = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 8000,
  factor: 2
};

export type Sleep = (ms: number) => Promise<void>;

export interface RetryPolicyOptions {
  sleep?: Sleep;
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
}

const defaultSleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Timeouts, dropped connections, rate limits and 5xx responses
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes('timeout') ||
      message.includes('timed out') ||
      message.includes('econnreset') ||
      message.includes('enotfound') ||
      message.includes('rate limit') ||
      message.includes('429') ||
      message.includes('500') ||
      message.includes('502') ||
      message.includes('503') ||
      message.includes('504')
    );
  }
  return false;
}

export class RetryPolicy {
  private config: RetryPolicyConfig;
  private sleep: Sleep;
  private isRetryable: (error: unknown) => boolean;
  private onRetry?: (attempt: number, delayMs: number, error: unknown) => void;

  constructor(config: Partial<RetryPolicyConfig> = {}, options: RetryPolicyOptions = {}) {
    this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
    this.sleep = options.sleep ?? defaultSleep;
    this.isRetryable = options.isRetryable ?? isRetryableError;
    this.onRetry = options.onRetry;
  }

  /**
   * Delay before the retry that follows a failed attempt (1-based)
   */
  delayFor(attempt: number): number {
    const delay = this.config.baseDelayMs * Math.pow(this.config.factor, attempt - 1);
    return Math.min(delay, this.config.maxDelayMs);
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    const maxAttempts = Math.max(1, this.config.maxAttempts);

    for (let attempt = 1; ; attempt++) {
      try {
        return await fn();
      } catch (error) {
        if (attempt >= maxAttempts || !this.isRetryable(error)) {
          throw new LLMRequestError(attempt, error);
        }
        const delay = this.delayFor(attempt);
        this.onRetry?.(attempt, delay, error);
        await this.sleep(delay);
      }
    }
  }
}
