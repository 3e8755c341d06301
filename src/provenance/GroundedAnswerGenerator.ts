/**
 * Grounded Answer Generator
 *
 * Turns a raw model answer plus the ledger into a user-facing answer whose
 * hedging matches the evidence. The one hard rule: when evidence is missing
 * the raw answer is discarded and never reaches the user.
 */

import type { Claim } from './Claim.js';
import type { Observation } from './Observation.js';
import type { ProvenanceRegistry } from './ProvenanceRegistry.js';
import {
  DegradationLevel,
  FULL_ANSWER_CONFIDENCE,
  PARTIAL_ANSWER_CONFIDENCE,
  HIGH_CONFIDENCE_BUCKET,
  MEDIUM_CONFIDENCE_BUCKET,
  NEAR_EXPIRY_WINDOW_SECONDS,
  CROSS_VALIDATION_TARGET
} from './types.js';

export const PARTIAL_DISCLAIMER =
  '\n\nNote: parts of this answer rest on limited observations and may be uncertain.';

export const LIMITED_INFO_PREAMBLE =
  'Based on the observations so far, I can only offer this limited information:\n\n';

export const LIMITED_INFO_POSTAMBLE =
  '\n\nMore information is needed for a complete answer.';

export const REFUSAL_TEXT =
  'Sorry, I do not have enough observed evidence to answer this question.\n\n' +
  'To avoid giving you inaccurate information, I will not guess.';

const LEVEL_HEADERS: Record<DegradationLevel, string> = {
  [DegradationLevel.FULL_ANSWER]: '[Full answer]\n',
  [DegradationLevel.PARTIAL_WITH_UNCERTAINTY]: '[Partial answer]\nSome of this information is uncertain.\n',
  [DegradationLevel.REQUEST_MORE_INFO]: '[Insufficient information]\nMore information is needed for a complete answer.\n',
  [DegradationLevel.REFUSE]: '[Cannot answer]\nThere is not enough observed evidence.\n'
};

export interface GroundedAnswerGeneratorConfig {
  confidenceThresholdFull: number;
  confidenceThresholdPartial: number;
  minObservationsForAnswer: number;
  /** Max length of statement excerpts in the confidence breakdown */
  excerptLength: number;
}

export const DEFAULT_GENERATOR_CONFIG: GroundedAnswerGeneratorConfig = {
  confidenceThresholdFull: FULL_ANSWER_CONFIDENCE,
  confidenceThresholdPartial: PARTIAL_ANSWER_CONFIDENCE,
  minObservationsForAnswer: 1,
  excerptLength: 100
};

export interface GroundedAnswerInit {
  content: string;
  degradationLevel: DegradationLevel;
  observationsUsed?: string[];
  claims?: Claim[];
  highConfidenceParts?: string[];
  mediumConfidenceParts?: string[];
  lowConfidenceParts?: string[];
  limitations?: string[];
  suggestedActions?: string[];
}

export class GroundedAnswer {
  readonly content: string;
  readonly degradationLevel: DegradationLevel;
  readonly observationsUsed: string[];
  readonly claims: Claim[];
  readonly highConfidenceParts: string[];
  readonly mediumConfidenceParts: string[];
  readonly lowConfidenceParts: string[];
  readonly limitations: string[];
  readonly suggestedActions: string[];

  constructor(init: GroundedAnswerInit) {
    this.content = init.content;
    this.degradationLevel = init.degradationLevel;
    this.observationsUsed = init.observationsUsed ?? [];
    this.claims = init.claims ?? [];
    this.highConfidenceParts = init.highConfidenceParts ?? [];
    this.mediumConfidenceParts = init.mediumConfidenceParts ?? [];
    this.lowConfidenceParts = init.lowConfidenceParts ?? [];
    this.limitations = init.limitations ?? [];
    this.suggestedActions = init.suggestedActions ?? [];
  }

  /**
   * Header, content, confidence breakdown (skipped for full answers),
   * limitations, suggestions. Always in that order.
   */
  toFormattedOutput(): string {
    const parts: string[] = [LEVEL_HEADERS[this.degradationLevel], this.content];

    if (this.degradationLevel !== DegradationLevel.FULL_ANSWER) {
      parts.push('\n\n[Confidence assessment]');
      appendList(parts, '\nHigh confidence:', this.highConfidenceParts, '\n  - ');
      appendList(parts, '\nMedium confidence:', this.mediumConfidenceParts, '\n  - ');
      appendList(parts, '\nLow confidence:', this.lowConfidenceParts, '\n  - ');
    }

    appendList(parts, '\n\n[Limitations]', this.limitations, '\n- ');
    appendList(parts, '\n\n[Suggestions]', this.suggestedActions, '\n- ');

    return parts.join('');
  }

  toJSON(): Record<string, unknown> {
    return {
      content: this.content,
      degradation_level: this.degradationLevel,
      observations_used: this.observationsUsed,
      claims: this.claims.map(c => c.toDict()),
      high_confidence_parts: this.highConfidenceParts,
      medium_confidence_parts: this.mediumConfidenceParts,
      low_confidence_parts: this.lowConfidenceParts,
      limitations: this.limitations,
      suggested_actions: this.suggestedActions
    };
  }
}

function appendList(parts: string[], heading: string, items: readonly string[], bullet: string): void {
  if (items.length === 0) return;
  parts.push(heading);
  for (const item of items) {
    parts.push(`${bullet}${item}`);
  }
}

export class GroundedAnswerGenerator {
  private config: GroundedAnswerGeneratorConfig;

  constructor(config: Partial<GroundedAnswerGeneratorConfig> = {}) {
    this.config = { ...DEFAULT_GENERATOR_CONFIG, ...config };
  }

  getConfig(): GroundedAnswerGeneratorConfig {
    return { ...this.config };
  }

  determineDegradation(registry: ProvenanceRegistry, now: Date = registry.now()): DegradationLevel {
    return registry.determineDegradationLevel(
      this.config.minObservationsForAnswer,
      this.config.confidenceThresholdPartial,
      this.config.confidenceThresholdFull,
      now
    );
  }

  generate(rawAnswer: string, registry: ProvenanceRegistry, claims: Claim[] = []): GroundedAnswer {
    const now = registry.now();
    const level = this.determineDegradation(registry, now);
    const validObs = registry.getValidObservations(0, now);

    const high: string[] = [];
    const medium: string[] = [];
    const low: string[] = [];
    for (const claim of claims) {
      registry.refreshClaim(claim, now);
      const excerpt = claim.statement.substring(0, this.config.excerptLength);
      if (claim.confidence >= HIGH_CONFIDENCE_BUCKET) {
        high.push(excerpt);
      } else if (claim.confidence >= MEDIUM_CONFIDENCE_BUCKET) {
        medium.push(excerpt);
      } else {
        low.push(excerpt);
      }
    }

    return new GroundedAnswer({
      content: this.processContent(rawAnswer, level),
      degradationLevel: level,
      observationsUsed: validObs.map(o => o.id),
      claims,
      highConfidenceParts: high,
      mediumConfidenceParts: medium,
      lowConfidenceParts: low,
      limitations: this.generateLimitations(registry, validObs, now),
      suggestedActions: this.generateSuggestions(level, validObs.length)
    });
  }

  /**
   * Short listing of the ledger for display
   */
  formatProvenanceSummary(registry: ProvenanceRegistry): string {
    const now = registry.now();
    const validObs = registry.getValidObservations(0, now);
    const expired = registry.invalidateExpired(now);

    const lines = ['[Observation summary]'];
    if (validObs.length > 0) {
      lines.push(`Valid observations: ${validObs.length}`);
      for (const obs of validObs.slice(0, 5)) {
        lines.push(`  - [${obs.id}] ${obs.sourceId} (confidence: ${Math.round(obs.confidence * 100)}%)`);
      }
    } else {
      lines.push('No valid observations');
    }
    if (expired.length > 0) {
      lines.push(`Expired: ${expired.length}`);
    }
    return lines.join('\n');
  }

  private processContent(rawAnswer: string, level: DegradationLevel): string {
    switch (level) {
      case DegradationLevel.FULL_ANSWER:
        return rawAnswer;
      case DegradationLevel.PARTIAL_WITH_UNCERTAINTY:
        return rawAnswer + PARTIAL_DISCLAIMER;
      case DegradationLevel.REQUEST_MORE_INFO:
        return LIMITED_INFO_PREAMBLE + rawAnswer + LIMITED_INFO_POSTAMBLE;
      case DegradationLevel.REFUSE:
        return REFUSAL_TEXT;
    }
  }

  private generateLimitations(registry: ProvenanceRegistry, validObs: Observation[], now: Date): string[] {
    const limitations: string[] = [];

    const nearExpiry = validObs.find(obs => {
      const remaining = obs.remainingTtl(now);
      return remaining !== null && remaining < NEAR_EXPIRY_WINDOW_SECONDS;
    });
    if (nearExpiry) {
      limitations.push(`Some data (from ${nearExpiry.sourceId}) is about to expire; consider fetching it again`);
    }

    const expired = registry.invalidateExpired(now);
    if (expired.length > 0) {
      limitations.push(`${expired.length} observation(s) have expired`);
    }

    const sources = new Set(validObs.map(obs => obs.sourceId));
    if (sources.size === 1) {
      limitations.push('Information comes from a single source; cross-validation is recommended');
    }

    return limitations;
  }

  private generateSuggestions(level: DegradationLevel, validCount: number): string[] {
    switch (level) {
      case DegradationLevel.REQUEST_MORE_INFO:
        return [
          'Gather more observations with the available tools',
          'Or provide more specific background information'
        ];
      case DegradationLevel.REFUSE:
        return [
          'Please provide more specific information about the question',
          'Try splitting the question into smaller parts that can be looked up'
        ];
      case DegradationLevel.PARTIAL_WITH_UNCERTAINTY:
        return validCount < CROSS_VALIDATION_TARGET
          ? ['Gathering more related data would make this answer more reliable']
          : [];
      case DegradationLevel.FULL_ANSWER:
        return [];
    }
  }
}
