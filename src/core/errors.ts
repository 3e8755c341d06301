/**
 * Custom Error Classes
 */

/**
 * Error thrown when configuration is missing or invalid
 */
export class ConfigurationError extends Error {
  public readonly problems: readonly string[];

  constructor(problems: readonly string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigurationError';
    this.problems = problems;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigurationError);
    }
  }
}

/**
 * Error thrown when the LLM provider still fails after every retry
 */
export class LLMRequestError extends Error {
  public readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`LLM request failed after ${attempts} attempt(s): ${detail}`, { cause });
    this.name = 'LLMRequestError';
    this.attempts = attempts;
  }
}
