export { CognitiveState } from './CognitiveState.js';
export type { CognitiveStateInit, SerializedCognitiveState } from './CognitiveState.js';
export { StrategyGate } from './StrategyGate.js';
export { MinimalCommitmentPolicy } from './MinimalCommitmentPolicy.js';
export type { RiskedTool } from './MinimalCommitmentPolicy.js';
export * from './types.js';
