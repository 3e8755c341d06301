/**
 * Cognitive State
 *
 * Running counters for one problem-solving session. Deliberately small:
 * just enough for the strategy gate to branch on. Owned by a single loop.
 */

import { INITIAL_CONFIDENCE } from './types.js';

export interface CognitiveStateInit {
  goalStatement?: string;
  confidence?: number;
}

export interface SerializedCognitiveState {
  confidence: number;
  uncertainties: string[];
  iteration_count: number;
  stall_count: number;
  goal_statement: string;
  current_hypothesis: string;
  observation_count: number;
  average_observation_confidence: number;
}

export class CognitiveState {
  goalStatement: string;
  currentHypothesis = '';
  lastToolUsed = '';

  private _confidence: number;
  private _uncertainties: string[] = [];
  private _iterationCount = 0;
  private _stallCount = 0;
  private _observationCount = 0;
  private _observationConfidenceSum = 0;

  constructor(init: CognitiveStateInit = {}) {
    this.goalStatement = init.goalStatement ?? '';
    this._confidence = clampUnit(init.confidence ?? INITIAL_CONFIDENCE);
  }

  get confidence(): number {
    return this._confidence;
  }

  get uncertainties(): readonly string[] {
    return this._uncertainties;
  }

  get iterationCount(): number {
    return this._iterationCount;
  }

  get stallCount(): number {
    return this._stallCount;
  }

  get observationCount(): number {
    return this._observationCount;
  }

  get observationConfidenceSum(): number {
    return this._observationConfidenceSum;
  }

  updateConfidence(value: number): void {
    this._confidence = clampUnit(value);
  }

  /**
   * Insertion-ordered, no duplicates
   */
  addUncertainty(uncertainty: string): void {
    if (!this._uncertainties.includes(uncertainty)) {
      this._uncertainties.push(uncertainty);
    }
  }

  removeUncertainty(uncertainty: string): void {
    this._uncertainties = this._uncertainties.filter(u => u !== uncertainty);
  }

  incrementIteration(): void {
    this._iterationCount++;
  }

  markProgress(): void {
    this._stallCount = 0;
  }

  markStall(): void {
    this._stallCount++;
  }

  hasStalled(threshold = 3): boolean {
    return this._stallCount >= threshold;
  }

  recordObservation(confidence: number): void {
    this._observationCount++;
    this._observationConfidenceSum += clampUnit(confidence);
  }

  averageObservationConfidence(): number {
    if (this._observationCount === 0) return 0;
    return this._observationConfidenceSum / this._observationCount;
  }

  /**
   * A few lines of hints for the system prompt; empty when nothing is notable
   */
  toContext(): string {
    const lines: string[] = [];

    if (this._confidence < 0.5) {
      lines.push(`Current confidence is low (${percent(this._confidence)})`);
    }
    if (this._uncertainties.length > 0) {
      lines.push(`Open uncertainties: ${this._uncertainties.slice(0, 2).join(', ')}`);
    }
    if (this._stallCount >= 2) {
      lines.push('Progress is slow; consider switching strategy');
    }

    if (this._observationCount === 0 && this._iterationCount > 0) {
      lines.push('Note: no observations have been gathered yet');
    } else if (this._observationCount > 0) {
      const avg = this.averageObservationConfidence();
      if (avg < 0.6) {
        lines.push(`Observation confidence is low (${percent(avg)})`);
      }
    }

    return lines.join('\n');
  }

  toDict(): SerializedCognitiveState {
    return {
      confidence: this._confidence,
      uncertainties: [...this._uncertainties],
      iteration_count: this._iterationCount,
      stall_count: this._stallCount,
      goal_statement: this.goalStatement,
      current_hypothesis: this.currentHypothesis,
      observation_count: this._observationCount,
      average_observation_confidence: this.averageObservationConfidence()
    };
  }
}

function clampUnit(value: number): number {
  return Math.max(0, Math.min(1, value));
}

function percent(value: number): string {
  return `${Math.round(value * 100)}%`;
}
