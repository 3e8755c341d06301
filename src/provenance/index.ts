/**
 * Provenance Module
 *
 * Observation ledger, claim derivation and answer degradation.
 */

export { Observation, generateObservationId } from './Observation.js';
export type { ObservationInit } from './Observation.js';

export { Claim, createTransformStep, stepToDict, stepFromDict } from './Claim.js';
export type { ClaimInit, TransformStep, ObservationLookup } from './Claim.js';

export { ProvenanceRegistry } from './ProvenanceRegistry.js';
export type { ProvenanceRegistryOptions } from './ProvenanceRegistry.js';

export { ClaimExtractor, MIN_CLAIM_LENGTH } from './ClaimExtractor.js';
export type { ExtractedClaim, ConfidenceHint } from './ClaimExtractor.js';

export {
  GroundedAnswer,
  GroundedAnswerGenerator,
  DEFAULT_GENERATOR_CONFIG,
  PARTIAL_DISCLAIMER,
  LIMITED_INFO_PREAMBLE,
  LIMITED_INFO_POSTAMBLE,
  REFUSAL_TEXT
} from './GroundedAnswerGenerator.js';
export type { GroundedAnswerInit, GroundedAnswerGeneratorConfig } from './GroundedAnswerGenerator.js';

export { parseSerializedRegistry, serializedRegistrySchema } from './schemas.js';
export type { LedgerParseResult } from './schemas.js';

export * from './types.js';
