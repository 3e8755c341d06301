/**
 * Cognitive Types
 *
 * Decisions, tool risk tiers and the named thresholds of the strategy gate.
 */

export enum StrategyDecision {
  /** Keep going on the current path */
  CONTINUE = 'CONTINUE',
  /** Dig further into the current approach */
  DEEPEN = 'DEEPEN',
  /** Switch method */
  PIVOT = 'PIVOT',
  /** Ask the user to clarify */
  ASK_USER = 'ASK_USER',
  /** Answer now, with uncertainty acknowledged */
  DEGRADE = 'DEGRADE',
  /** Produce the final answer */
  CONCLUDE = 'CONCLUDE',
  /** Gather or refresh observations before answering */
  REQUEST_MORE_INFO = 'REQUEST_MORE_INFO'
}

export interface StrategyPath {
  decision: StrategyDecision;
  reason: string;
  suggestedAction?: string;
}

export enum ToolRisk {
  /** Read-only, no side effects */
  SAFE = 'SAFE',
  /** Reversible side effects */
  LOW = 'LOW',
  /** Recoverable side effects */
  MEDIUM = 'MEDIUM',
  /** Irreversible side effects */
  HIGH = 'HIGH'
}

export const TOOL_RISK_ORDER: readonly ToolRisk[] = [ToolRisk.SAFE, ToolRisk.LOW, ToolRisk.MEDIUM, ToolRisk.HIGH];

/** Minimum cognitive confidence before a tool of each tier may run */
export const TOOL_RISK_THRESHOLDS: Readonly<Record<ToolRisk, number>> = {
  [ToolRisk.SAFE]: 0.0,
  [ToolRisk.LOW]: 0.3,
  [ToolRisk.MEDIUM]: 0.5,
  [ToolRisk.HIGH]: 0.8
};

/** Confidence a fresh cognitive state starts with */
export const INITIAL_CONFIDENCE = 0.3;

/** A stalled session below this confidence degrades instead of pivoting */
export const STALL_DEGRADE_CONFIDENCE = 0.3;

/** Observations must reach this confidence to count as grounding */
export const GROUNDING_MIN_CONFIDENCE = 0.5;

/** Fewer valid observations than this with weak mean confidence triggers cross-validation */
export const CROSS_VALIDATION_MIN_SOURCES = 3;

/** Uncertainty markers about what the user actually wants */
export const GOAL_CLARITY_MARKERS: readonly string[] = ['goal', 'requirement', 'intent', '目标', '需求'];

/** Uncertainty markers about missing evidence */
export const DATA_SUFFICIENCY_MARKERS: readonly string[] = ['data', 'information', 'evidence', '数据', '信息'];

export interface StrategyGateConfig {
  confidenceThreshold: number;
  stallThreshold: number;
  uncertaintyLimit: number;
  minObservationsForAnswer: number;
}

export const DEFAULT_STRATEGY_GATE_CONFIG: StrategyGateConfig = {
  confidenceThreshold: 0.7,
  stallThreshold: 3,
  uncertaintyLimit: 5,
  minObservationsForAnswer: 1
};
