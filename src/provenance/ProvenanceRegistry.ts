/**
 * Provenance Registry
 *
 * Session-scoped audit ledger of every observation and claim. Sole mutator of
 * both maps. Observations are appended once and never removed during a
 * session: expiry only hides them from validity filters.
 */

import { Observation } from './Observation.js';
import { Claim } from './Claim.js';
import {
  ClaimType,
  DegradationLevel,
  ObservationSourceType,
  FULL_ANSWER_CONFIDENCE,
  PARTIAL_ANSWER_CONFIDENCE,
  systemClock,
  type Clock,
  type ProvenanceContext,
  type SerializedRegistry
} from './types.js';

export interface ProvenanceRegistryOptions {
  clock?: Clock;
}

export class ProvenanceRegistry {
  private observations: Map<string, Observation> = new Map();
  private claims: Map<string, Claim> = new Map();
  private clock: Clock;

  constructor(options: ProvenanceRegistryOptions = {}) {
    this.clock = options.clock ?? systemClock;
  }

  now(): Date {
    return this.clock();
  }

  // ==========================================
  // OBSERVATIONS
  // ==========================================

  /**
   * Store an observation unconditionally. No dedup, no rejection.
   */
  addObservation(observation: Observation): string {
    this.observations.set(observation.id, observation);
    return observation.id;
  }

  getObservation(id: string): Observation | undefined {
    return this.observations.get(id);
  }

  get observationCount(): number {
    return this.observations.size;
  }

  /**
   * Read-only view of the full ledger, expired entries included
   */
  getObservationMap(): ReadonlyMap<string, Observation> {
    return this.observations;
  }

  /**
   * Observations that are unexpired and at or above `minConfidence`.
   * Every observation is judged against the same instant.
   */
  getValidObservations(minConfidence = 0, now: Date = this.clock()): Observation[] {
    const valid: Observation[] = [];
    for (const obs of this.observations.values()) {
      if (!obs.isExpired(now) && obs.confidence >= minConfidence) {
        valid.push(obs);
      }
    }
    return valid;
  }

  /**
   * Ids of observations that have expired. This is a query: expired
   * observations stay in the ledger for audit.
   */
  invalidateExpired(now: Date = this.clock()): string[] {
    const expired: string[] = [];
    for (const [id, obs] of this.observations) {
      if (obs.isExpired(now)) {
        expired.push(id);
      }
    }
    return expired;
  }

  getObservationsBySource(sourceId: string): Observation[] {
    return [...this.observations.values()].filter(obs => obs.sourceId === sourceId);
  }

  getObservationsByType(sourceType: ObservationSourceType): Observation[] {
    return [...this.observations.values()].filter(obs => obs.sourceType === sourceType);
  }

  // ==========================================
  // CLAIMS
  // ==========================================

  /**
   * Store a claim after recomputing its confidence against the current ledger
   */
  addClaim(claim: Claim): string {
    claim.updateConfidence(this.observations, this.clock());
    this.claims.set(claim.id, claim);
    return claim.id;
  }

  getClaim(id: string): Claim | undefined {
    return this.claims.get(id);
  }

  get claimCount(): number {
    return this.claims.size;
  }

  /**
   * Claims at or above `minConfidence`, each refreshed first
   */
  getValidClaims(minConfidence = 0, claimType?: ClaimType): Claim[] {
    const now = this.clock();
    const result: Claim[] = [];
    for (const claim of this.claims.values()) {
      claim.updateConfidence(this.observations, now);
      if (claim.confidence >= minConfidence && (claimType === undefined || claim.claimType === claimType)) {
        result.push(claim);
      }
    }
    return result;
  }

  /**
   * Recompute a claim against this ledger at the registry's current time
   */
  refreshClaim(claim: Claim, now: Date = this.clock()): number {
    return claim.updateConfidence(this.observations, now);
  }

  // ==========================================
  // DEGRADATION
  // ==========================================

  /**
   * Decide how much an answer built on this ledger must be degraded.
   *
   * - no valid observations → REFUSE
   * - mean confidence >= fullConfidence (0.8) and enough observations → FULL_ANSWER
   * - mean confidence >= minConfidence → PARTIAL_WITH_UNCERTAINTY
   * - otherwise → REQUEST_MORE_INFO
   */
  determineDegradationLevel(
    requiredObservations = 1,
    minConfidence = PARTIAL_ANSWER_CONFIDENCE,
    fullConfidence = FULL_ANSWER_CONFIDENCE,
    now: Date = this.clock()
  ): DegradationLevel {
    const valid = this.getValidObservations(0, now);

    if (valid.length === 0) {
      return DegradationLevel.REFUSE;
    }

    const avg = valid.reduce((sum, o) => sum + o.confidence, 0) / valid.length;

    if (avg >= fullConfidence && valid.length >= requiredObservations) {
      return DegradationLevel.FULL_ANSWER;
    }
    if (avg >= minConfidence) {
      return DegradationLevel.PARTIAL_WITH_UNCERTAINTY;
    }
    return DegradationLevel.REQUEST_MORE_INFO;
  }

  // ==========================================
  // CONTEXT & LIFECYCLE
  // ==========================================

  /**
   * Bounded digest of the most recent valid observations for prompt building
   */
  toContext(maxObservations = 5): ProvenanceContext {
    const now = this.clock();
    const valid = this.getValidObservations(0, now);
    const expiredCount = this.invalidateExpired(now).length;

    if (valid.length === 0) {
      const lines = ['[No valid observations]'];
      if (expiredCount > 0) {
        lines.push(`(expired observations: ${expiredCount})`);
      }
      return { text: lines.join('\n'), includedCount: 0, expiredCount };
    }

    const recent = [...valid]
      .sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime())
      .slice(0, Math.max(0, maxObservations));

    const lines = ['[Current observations]'];
    for (const obs of recent) {
      lines.push(obs.toContext(now));
    }
    if (expiredCount > 0) {
      lines.push(`\n(expired observations: ${expiredCount})`);
    }

    return { text: lines.join('\n'), includedCount: recent.length, expiredCount };
  }

  /**
   * Discard the ledger at the end of a session
   */
  clear(): void {
    this.observations.clear();
    this.claims.clear();
  }

  toDict(): SerializedRegistry {
    const observations: SerializedRegistry['observations'] = {};
    for (const [id, obs] of this.observations) {
      observations[id] = obs.toDict();
    }
    const claims: SerializedRegistry['claims'] = {};
    for (const [id, claim] of this.claims) {
      claims[id] = claim.toDict();
    }
    return { observations, claims };
  }

  /**
   * Rebuild a ledger. Claim confidences are restored as stored, not recomputed.
   */
  static fromDict(data: SerializedRegistry, options: ProvenanceRegistryOptions = {}): ProvenanceRegistry {
    const registry = new ProvenanceRegistry(options);
    for (const obsData of Object.values(data.observations)) {
      const obs = Observation.fromDict(obsData);
      registry.observations.set(obs.id, obs);
    }
    for (const claimData of Object.values(data.claims)) {
      const claim = Claim.fromDict(claimData);
      registry.claims.set(claim.id, claim);
    }
    return registry;
  }
}
