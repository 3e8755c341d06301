/**
 * Groundwork
 *
 * Problem-solving agent whose answers are grounded in an auditable ledger of
 * observations.
 */

export * from './provenance/index.js';
export * from './cognitive/index.js';
export * from './tools/index.js';
export * from './providers/index.js';
export * from './agent/index.js';

export { getDefaultConfig, validateConfig, mergeConfig } from './core/config.js';
export type { GroundworkConfig, GroundworkConfigOverrides, LLMConfig, AgentConfig } from './core/config.js';
export { ConfigurationError, LLMRequestError } from './core/errors.js';
