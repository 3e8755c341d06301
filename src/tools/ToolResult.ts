/**
 * Tool Result
 *
 * A tool's raw output paired with the observation it contributes to the ledger.
 */

import { Observation } from '../provenance/Observation.js';
import { ObservationSourceType } from '../provenance/types.js';

/** Observation content is capped; the full text still goes back to the model */
export const OBSERVATION_CONTENT_LIMIT = 500;

/** Confidence given to tools that return bare text without provenance */
export const PLAIN_OUTCOME_CONFIDENCE = 0.5;

export interface ToolSuccessOptions {
  confidence?: number;
  ttlSeconds?: number | null;
  scope?: string;
  metadata?: Record<string, unknown>;
  sourceType?: ObservationSourceType;
  timestamp?: Date;
}

export class ToolResult {
  readonly content: string;
  readonly observation: Observation;
  readonly success: boolean;
  readonly errorMessage?: string;

  private constructor(content: string, observation: Observation, success: boolean, errorMessage?: string) {
    this.content = content;
    this.observation = observation;
    this.success = success;
    this.errorMessage = errorMessage;
  }

  static fromSuccess(content: string, toolName: string, options: ToolSuccessOptions = {}): ToolResult {
    const observation = new Observation({
      content: content.substring(0, OBSERVATION_CONTENT_LIMIT),
      sourceType: options.sourceType ?? ObservationSourceType.TOOL_RETURN,
      sourceId: toolName,
      timestamp: options.timestamp,
      confidence: options.confidence ?? 1.0,
      scope: options.scope ?? '',
      ttlSeconds: options.ttlSeconds ?? null,
      metadata: options.metadata ?? {}
    });
    return new ToolResult(content, observation, true);
  }

  /**
   * Failed run: the observation records the failure at zero confidence
   */
  static fromError(errorMessage: string, toolName: string, timestamp?: Date): ToolResult {
    const observation = new Observation({
      content: `Tool execution failed: ${errorMessage}`.substring(0, OBSERVATION_CONTENT_LIMIT),
      sourceType: ObservationSourceType.TOOL_RETURN,
      sourceId: toolName,
      timestamp,
      confidence: 0.0,
      scope: 'error',
      metadata: { error: errorMessage }
    });
    return new ToolResult(errorMessage, observation, false, errorMessage);
  }
}
