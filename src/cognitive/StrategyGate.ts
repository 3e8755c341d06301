/**
 * Strategy Gate
 *
 * Pure decision function evaluated once per loop iteration. Holds no state
 * of its own between calls.
 *
 * Decision tree (first match wins):
 * 1. confident, no uncertainties → CONCLUDE (or REQUEST_MORE_INFO when ungrounded)
 * 2. registry shows stale or weak evidence → REQUEST_MORE_INFO
 * 3. stalled → DEGRADE at low confidence, else PIVOT
 * 4. goal/requirement uncertainty → ASK_USER
 * 5. data/information uncertainty → DEEPEN
 * 6. too many uncertainties → DEGRADE
 * 7. otherwise → CONTINUE
 */

import type { ProvenanceRegistry } from '../provenance/ProvenanceRegistry.js';
import type { CognitiveState } from './CognitiveState.js';
import {
  StrategyDecision,
  DEFAULT_STRATEGY_GATE_CONFIG,
  STALL_DEGRADE_CONFIDENCE,
  GROUNDING_MIN_CONFIDENCE,
  CROSS_VALIDATION_MIN_SOURCES,
  GOAL_CLARITY_MARKERS,
  DATA_SUFFICIENCY_MARKERS,
  type StrategyGateConfig,
  type StrategyPath
} from './types.js';

export class StrategyGate {
  private config: StrategyGateConfig;

  constructor(config: Partial<StrategyGateConfig> = {}) {
    this.config = { ...DEFAULT_STRATEGY_GATE_CONFIG, ...config };
  }

  getConfig(): StrategyGateConfig {
    return { ...this.config };
  }

  evaluate(state: CognitiveState, registry?: ProvenanceRegistry): StrategyPath {
    const now = registry?.now();
    const groundedCount = registry
      ? registry.getValidObservations(GROUNDING_MIN_CONFIDENCE, now).length
      : 0;

    // Rule 1: confident and nothing open
    if (state.confidence >= this.config.confidenceThreshold && state.uncertainties.length === 0) {
      if (registry && groundedCount < this.config.minObservationsForAnswer) {
        return {
          decision: StrategyDecision.REQUEST_MORE_INFO,
          reason: `Confidence is ${percent(state.confidence)} but only ${groundedCount} grounded observation(s) support it`,
          suggestedAction: 'Use a tool to observe the facts the answer depends on'
        };
      }
      return {
        decision: StrategyDecision.CONCLUDE,
        reason: `Confidence reached ${percent(state.confidence)} with no open uncertainties`
      };
    }

    // Rule 2: evidence quality
    if (registry) {
      const expired = registry.invalidateExpired(now);
      if (expired.length > 0 && groundedCount < this.config.minObservationsForAnswer) {
        return {
          decision: StrategyDecision.REQUEST_MORE_INFO,
          reason: `${expired.length} observation(s) expired and too few valid ones remain`,
          suggestedAction: 'Refresh the stale data'
        };
      }

      const valid = registry.getValidObservations(0, now);
      if (valid.length > 0 && valid.length < CROSS_VALIDATION_MIN_SOURCES) {
        const avg = valid.reduce((sum, o) => sum + o.confidence, 0) / valid.length;
        if (avg < GROUNDING_MIN_CONFIDENCE) {
          return {
            decision: StrategyDecision.REQUEST_MORE_INFO,
            reason: `Observation confidence is low (${percent(avg)}) across ${valid.length} source(s)`,
            suggestedAction: 'Cross-validate with more sources'
          };
        }
      }
    }

    // Rule 3: stalled
    if (state.hasStalled(this.config.stallThreshold)) {
      if (state.confidence < STALL_DEGRADE_CONFIDENCE) {
        return {
          decision: StrategyDecision.DEGRADE,
          reason: `Stalled for ${state.stallCount} iterations with low confidence`,
          suggestedAction: 'Give the best current answer and state its uncertainty'
        };
      }
      return {
        decision: StrategyDecision.PIVOT,
        reason: `Stalled for ${state.stallCount} iterations`,
        suggestedAction: 'Switch to a different method or tool'
      };
    }

    // Rule 4: goal clarity
    const goalUncertainty = findMarked(state.uncertainties, GOAL_CLARITY_MARKERS);
    if (goalUncertainty !== undefined) {
      return {
        decision: StrategyDecision.ASK_USER,
        reason: 'The goal or requirements are unclear',
        suggestedAction: `Ask the user about: ${goalUncertainty}`
      };
    }

    // Rule 5: data sufficiency
    if (findMarked(state.uncertainties, DATA_SUFFICIENCY_MARKERS) !== undefined) {
      return {
        decision: StrategyDecision.DEEPEN,
        reason: 'More data or information is needed',
        suggestedAction: 'Keep exploring the current path'
      };
    }

    // Rule 6: too many open questions
    if (state.uncertainties.length >= this.config.uncertaintyLimit) {
      return {
        decision: StrategyDecision.DEGRADE,
        reason: `Too many uncertainties (${state.uncertainties.length})`,
        suggestedAction: 'Give a partial answer and state its limits'
      };
    }

    return {
      decision: StrategyDecision.CONTINUE,
      reason: 'Continue with the current strategy'
    };
  }
}

function findMarked(uncertainties: readonly string[], markers: readonly string[]): string | undefined {
  return uncertainties.find(u => {
    const lower = u.toLowerCase();
    return markers.some(marker => lower.includes(marker));
  });
}

function percent(value: number): string {
  return `${Math.round(value * 100)}%`;
}
