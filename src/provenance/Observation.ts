/**
 * Observation
 *
 * An atomic, timestamped, confidence-scored piece of world state taken from
 * an authoritative source (tool return, user input or system rule).
 * Observations are frozen once built; the registry only ever filters them.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  ObservationSourceType,
  DEFAULT_SOURCE_CONFIDENCE,
  OBSERVATION_ID_LENGTH,
  clamp,
  type SerializedObservation
} from './types.js';

export interface ObservationInit {
  id?: string;
  content?: string;
  sourceType?: ObservationSourceType;
  sourceId?: string;
  timestamp?: Date;
  /** Left unset, the source type decides (user input 0.8, everything else 1.0) */
  confidence?: number;
  scope?: string;
  /** null or unset means the observation never expires */
  ttlSeconds?: number | null;
  metadata?: Record<string, unknown>;
}

export function generateObservationId(): string {
  return uuidv4().slice(0, OBSERVATION_ID_LENGTH);
}

export class Observation {
  readonly id: string;
  readonly content: string;
  readonly sourceType: ObservationSourceType;
  readonly sourceId: string;
  readonly confidence: number;
  readonly scope: string;
  readonly ttlSeconds: number | null;
  readonly metadata: Readonly<Record<string, unknown>>;
  private readonly timestampMs: number;

  constructor(init: ObservationInit = {}) {
    const sourceType = init.sourceType ?? ObservationSourceType.TOOL_RETURN;
    const rawConfidence = init.confidence !== undefined && Number.isFinite(init.confidence)
      ? init.confidence
      : DEFAULT_SOURCE_CONFIDENCE[sourceType];

    this.id = init.id ?? generateObservationId();
    this.content = init.content ?? '';
    this.sourceType = sourceType;
    this.sourceId = init.sourceId ?? '';
    this.timestampMs = (init.timestamp ?? new Date()).getTime();
    this.confidence = clamp(rawConfidence);
    this.scope = init.scope ?? '';
    this.ttlSeconds = init.ttlSeconds ?? null;
    this.metadata = Object.freeze({ ...(init.metadata ?? {}) });

    Object.freeze(this);
  }

  /**
   * A fresh copy on every read
   */
  get timestamp(): Date {
    return new Date(this.timestampMs);
  }

  /**
   * Age in seconds at `now`
   */
  ageSeconds(now: Date = new Date()): number {
    return (now.getTime() - this.timestampMs) / 1000;
  }

  isExpired(now: Date = new Date()): boolean {
    if (this.ttlSeconds === null) {
      return false;
    }
    return this.ageSeconds(now) > this.ttlSeconds;
  }

  /**
   * Whole seconds left before expiry, or null if the observation never expires
   */
  remainingTtl(now: Date = new Date()): number | null {
    if (this.ttlSeconds === null) {
      return null;
    }
    const remaining = this.ttlSeconds - Math.trunc(this.ageSeconds(now));
    return Math.max(0, remaining);
  }

  /**
   * Digest entry for prompt injection
   */
  toContext(now: Date = new Date()): string {
    const sourceLabel = SOURCE_LABELS[this.sourceType];
    const excerpt = this.content.length > 200
      ? `${this.content.substring(0, 200)}...`
      : this.content;

    const lines = [
      `[${this.id}] source: ${sourceLabel} (${this.sourceId})`,
      `    content: ${excerpt}`,
      `    confidence: ${Math.round(this.confidence * 100)}%`
    ];

    const remaining = this.remainingTtl(now);
    if (remaining !== null) {
      lines.push(`    expires in: ${remaining}s`);
    }

    return lines.join('\n');
  }

  toDict(): SerializedObservation {
    return {
      id: this.id,
      content: this.content,
      source_type: this.sourceType,
      source_id: this.sourceId,
      timestamp: this.timestamp.toISOString(),
      confidence: this.confidence,
      scope: this.scope,
      ttl_seconds: this.ttlSeconds,
      metadata: { ...this.metadata }
    };
  }

  static fromDict(data: SerializedObservation): Observation {
    return new Observation({
      id: data.id,
      content: data.content,
      sourceType: data.source_type,
      sourceId: data.source_id,
      timestamp: new Date(data.timestamp),
      confidence: data.confidence,
      scope: data.scope,
      ttlSeconds: data.ttl_seconds,
      metadata: data.metadata
    });
  }
}

const SOURCE_LABELS: Record<ObservationSourceType, string> = {
  [ObservationSourceType.TOOL_RETURN]: 'tool return',
  [ObservationSourceType.USER_INPUT]: 'user input',
  [ObservationSourceType.DEFINED_RULE]: 'system rule'
};
