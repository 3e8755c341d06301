/**
 * Claim & TransformStep
 *
 * A claim is a statement derived from observations through a recorded chain
 * of reasoning hops. Its confidence is derived, never authoritative: it has
 * to be recomputed against the ledger before it is trusted, because source
 * observations may have expired since the claim was built.
 */

import { v4 as uuidv4 } from 'uuid';
import type { Observation } from './Observation.js';
import {
  ClaimType,
  OBSERVATION_ID_LENGTH,
  clamp,
  type TransformOperation,
  type SerializedClaim,
  type SerializedTransformStep
} from './types.js';

export interface TransformStep {
  readonly operation: TransformOperation;
  readonly description: string;
  readonly inputIds: readonly string[];
  /** In [-1, 1] */
  readonly confidenceDelta: number;
}

export function createTransformStep(
  operation: TransformOperation,
  description: string,
  inputIds: readonly string[] = [],
  confidenceDelta = 0
): TransformStep {
  return Object.freeze({
    operation,
    description,
    inputIds: Object.freeze([...inputIds]),
    confidenceDelta: clamp(confidenceDelta, -1, 1)
  });
}

export type ObservationLookup = ReadonlyMap<string, Observation>;

export interface ClaimInit {
  id?: string;
  statement?: string;
  claimType?: ClaimType;
  sourceObservations?: readonly string[];
  transformChain?: readonly TransformStep[];
  confidence?: number;
  scope?: string;
  createdAt?: Date;
}

export class Claim {
  readonly id: string;
  readonly statement: string;
  readonly claimType: ClaimType;
  readonly sourceObservations: readonly string[];
  readonly transformChain: readonly TransformStep[];
  readonly scope: string;
  private readonly createdAtMs: number;
  private _confidence: number;

  constructor(init: ClaimInit = {}) {
    this.id = init.id ?? uuidv4().slice(0, OBSERVATION_ID_LENGTH);
    this.statement = init.statement ?? '';
    this.claimType = init.claimType ?? ClaimType.FACT;
    this.sourceObservations = Object.freeze([...(init.sourceObservations ?? [])]);
    this.transformChain = Object.freeze([...(init.transformChain ?? [])]);
    this.scope = init.scope ?? '';
    this.createdAtMs = (init.createdAt ?? new Date()).getTime();
    this._confidence = clamp(init.confidence ?? 0);
  }

  get createdAt(): Date {
    return new Date(this.createdAtMs);
  }

  /**
   * Last computed confidence. Call updateConfidence() first when it matters.
   */
  get confidence(): number {
    return this._confidence;
  }

  /**
   * Weakest-link confidence: the minimum over still-valid source observations,
   * shifted by every transform delta, clamped to [0, 1]. Missing or expired
   * sources contribute nothing; with none left the claim is worth 0.
   */
  computeConfidence(observations: ObservationLookup, now: Date = new Date()): number {
    const sourceConfidences: number[] = [];
    for (const obsId of this.sourceObservations) {
      const obs = observations.get(obsId);
      if (obs && !obs.isExpired(now)) {
        sourceConfidences.push(obs.confidence);
      }
    }

    if (sourceConfidences.length === 0) {
      return 0;
    }

    const base = Math.min(...sourceConfidences);
    const delta = this.transformChain.reduce((sum, step) => sum + step.confidenceDelta, 0);

    return clamp(base + delta);
  }

  updateConfidence(observations: ObservationLookup, now: Date = new Date()): number {
    this._confidence = this.computeConfidence(observations, now);
    return this._confidence;
  }

  getAuditTrail(): string {
    const lines = [
      `Claim: ${this.statement}`,
      `Type: ${this.claimType}`,
      `Confidence: ${Math.round(this._confidence * 100)}%`,
      'Source observations:'
    ];

    if (this.sourceObservations.length === 0) {
      lines.push('  (none)');
    }
    for (const obsId of this.sourceObservations) {
      lines.push(`  - ${obsId}`);
    }

    if (this.transformChain.length > 0) {
      lines.push('Reasoning chain:');
      this.transformChain.forEach((step, i) => {
        lines.push(`  ${i + 1}. [${step.operation}] ${step.description}`);
        if (step.inputIds.length > 0) {
          lines.push(`     inputs: ${step.inputIds.join(', ')}`);
        }
        const sign = step.confidenceDelta >= 0 ? '+' : '';
        lines.push(`     confidence change: ${sign}${step.confidenceDelta.toFixed(2)}`);
      });
    }

    return lines.join('\n');
  }

  toDict(): SerializedClaim {
    return {
      id: this.id,
      statement: this.statement,
      claim_type: this.claimType,
      source_observations: [...this.sourceObservations],
      transform_chain: this.transformChain.map(stepToDict),
      confidence: this._confidence,
      scope: this.scope,
      created_at: this.createdAt.toISOString()
    };
  }

  static fromDict(data: SerializedClaim): Claim {
    return new Claim({
      id: data.id,
      statement: data.statement,
      claimType: data.claim_type,
      sourceObservations: data.source_observations,
      transformChain: data.transform_chain.map(stepFromDict),
      confidence: data.confidence,
      scope: data.scope,
      createdAt: new Date(data.created_at)
    });
  }
}

export function stepToDict(step: TransformStep): SerializedTransformStep {
  return {
    operation: step.operation,
    description: step.description,
    input_ids: [...step.inputIds],
    confidence_delta: step.confidenceDelta
  };
}

export function stepFromDict(data: SerializedTransformStep): TransformStep {
  return createTransformStep(data.operation, data.description, data.input_ids, data.confidence_delta);
}
