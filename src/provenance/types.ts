/**
 * Provenance Types
 *
 * Type definitions and policy constants for observation tracking,
 * claim derivation and answer degradation.
 */

// ==========================================
// ENUMS
// ==========================================

/**
 * Where an observation came from. Only these sources count as evidence.
 */
export enum ObservationSourceType {
  TOOL_RETURN = 'TOOL_RETURN',
  USER_INPUT = 'USER_INPUT',
  DEFINED_RULE = 'DEFINED_RULE'
}

export enum ClaimType {
  /** Directly supported by an observation */
  FACT = 'fact',
  /** Derived through reasoning */
  INFERENCE = 'inference',
  /** Speculative, weak or no evidence */
  HYPOTHESIS = 'hypothesis'
}

export type TransformOperation = 'extract' | 'aggregate' | 'infer' | 'combine';

/**
 * How much an answer must be hedged. Ordered by severity.
 */
export enum DegradationLevel {
  FULL_ANSWER = 'FULL_ANSWER',
  PARTIAL_WITH_UNCERTAINTY = 'PARTIAL_WITH_UNCERTAINTY',
  REQUEST_MORE_INFO = 'REQUEST_MORE_INFO',
  REFUSE = 'REFUSE'
}

const DEGRADATION_SEVERITY: Record<DegradationLevel, number> = {
  [DegradationLevel.FULL_ANSWER]: 0,
  [DegradationLevel.PARTIAL_WITH_UNCERTAINTY]: 1,
  [DegradationLevel.REQUEST_MORE_INFO]: 2,
  [DegradationLevel.REFUSE]: 3
};

/**
 * Negative when `a` is less severe than `b`, zero when equal.
 */
export function compareDegradation(a: DegradationLevel, b: DegradationLevel): number {
  return DEGRADATION_SEVERITY[a] - DEGRADATION_SEVERITY[b];
}

// ==========================================
// POLICY CONSTANTS
// ==========================================

/** Default confidence for observations by source when none is given */
export const DEFAULT_SOURCE_CONFIDENCE: Record<ObservationSourceType, number> = {
  [ObservationSourceType.TOOL_RETURN]: 1.0,
  [ObservationSourceType.USER_INPUT]: 0.8,
  [ObservationSourceType.DEFINED_RULE]: 1.0
};

/** Mean observation confidence required for a full answer */
export const FULL_ANSWER_CONFIDENCE = 0.8;
/** Mean observation confidence required for a partial answer */
export const PARTIAL_ANSWER_CONFIDENCE = 0.5;

/** Claim confidence buckets used when annotating answers */
export const HIGH_CONFIDENCE_BUCKET = 0.8;
export const MEDIUM_CONFIDENCE_BUCKET = 0.5;

/** Confidence adjustments applied by the extractor's reasoning hops */
export const EXTRACT_CONFIDENCE_DELTA = 0.0;
export const INFERENCE_CONFIDENCE_DELTA = -0.1;
export const HYPOTHESIS_CONFIDENCE_DELTA = -0.3;

/** Observations with less remaining TTL than this trigger a near-expiry warning */
export const NEAR_EXPIRY_WINDOW_SECONDS = 1800;

/** Below this many valid observations, a partial answer suggests gathering more */
export const CROSS_VALIDATION_TARGET = 3;

/** Length of observation ids, and of the bracketed references the extractor looks for */
export const OBSERVATION_ID_LENGTH = 8;

// ==========================================
// SERIALIZED FORMS
// ==========================================

export interface SerializedObservation {
  id: string;
  content: string;
  source_type: ObservationSourceType;
  source_id: string;
  timestamp: string;
  confidence: number;
  scope: string;
  ttl_seconds: number | null;
  metadata: Record<string, unknown>;
}

export interface SerializedTransformStep {
  operation: TransformOperation;
  description: string;
  input_ids: string[];
  confidence_delta: number;
}

export interface SerializedClaim {
  id: string;
  statement: string;
  claim_type: ClaimType;
  source_observations: string[];
  transform_chain: SerializedTransformStep[];
  confidence: number;
  scope: string;
  created_at: string;
}

export interface SerializedRegistry {
  observations: Record<string, SerializedObservation>;
  claims: Record<string, SerializedClaim>;
}

/**
 * Digest of the registry handed to the prompt builder
 */
export interface ProvenanceContext {
  text: string;
  includedCount: number;
  expiredCount: number;
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export function clamp(value: number, min = 0, max = 1): number {
  return Math.max(min, Math.min(max, value));
}
