/**
 * Claim Extractor
 *
 * Parses model output into candidate claims bound to the observation ids the
 * text cites as `[xxxxxxxx]`. Classification is keyword based:
 *
 * 1. cites observations and reads as a report of evidence → FACT
 * 2. reads as a reasoning step → INFERENCE
 * 3. reads as speculation → HYPOTHESIS
 * 4. cites observations with no marker → FACT
 * 5. anything else → HYPOTHESIS
 *
 * Rule 5 is the safety net: an unsupported, unmarked assertion is never a fact.
 */

import { Claim, createTransformStep, type ObservationLookup, type TransformStep } from './Claim.js';
import type { ProvenanceRegistry } from './ProvenanceRegistry.js';
import {
  ClaimType,
  EXTRACT_CONFIDENCE_DELTA,
  INFERENCE_CONFIDENCE_DELTA,
  HYPOTHESIS_CONFIDENCE_DELTA,
  OBSERVATION_ID_LENGTH
} from './types.js';

export type ConfidenceHint = 'high' | 'medium' | 'low';

export interface ExtractedClaim {
  statement: string;
  claimType: ClaimType;
  observationRefs: string[];
  confidenceHint: ConfidenceHint;
}

/** Units shorter than this are not treated as claims */
export const MIN_CLAIM_LENGTH = 15;

const FACT_PATTERNS = [
  /\baccording to\b/i,
  /\b(?:search )?results show\b/i,
  /\bdata (?:indicates|shows)\b/i,
  /\bthe output shows\b/i,
  /\[(?:obs|observation)[:\s]\w+\]/i
];

const INFERENCE_PATTERNS = [
  /\btherefore\b/i,
  /\bI infer\b/i,
  /\bit follows that\b/i,
  /\bwe can conclude\b/i,
  /\bthis implies\b/i,
  /\bhence\b/i
];

const HYPOTHESIS_PATTERNS = [
  /\bif\b.*\bthen\b/i,
  /\bassuming\b/i,
  /\bsuppose\b/i,
  /\bpossibly\b/i,
  /\bperhaps\b/i,
  /\bmight\b/i,
  /\bmay be\b/i
];

const FORMATTING_MARKERS = ['【', '】', '---', '===', 'output format'];

const SENTENCE_BOUNDARY = /\n+|(?<=[。！？])|(?<=[.!?])\s+/;

export class ClaimExtractor {
  private readonly refPattern = new RegExp(`\\[(\\w{${OBSERVATION_ID_LENGTH}})\\]`, 'g');

  /**
   * Extract candidate claims from generated text. Never throws; text that
   * cannot be classified falls through to HYPOTHESIS.
   */
  extractClaims(text: string): ExtractedClaim[] {
    const claims: ExtractedClaim[] = [];
    for (const sentence of this.splitIntoSentences(text)) {
      if (!this.isMeaningfulClaim(sentence)) {
        continue;
      }
      claims.push(this.analyzeSentence(sentence));
    }
    return claims;
  }

  splitIntoSentences(text: string): string[] {
    return text
      .split(SENTENCE_BOUNDARY)
      .map(s => s.trim())
      .filter(s => s.length > 0);
  }

  extractReferences(sentence: string): string[] {
    const refs: string[] = [];
    for (const match of sentence.matchAll(this.refPattern)) {
      if (!refs.includes(match[1])) {
        refs.push(match[1]);
      }
    }
    return refs;
  }

  classify(sentence: string, refs: readonly string[]): ClaimType {
    if (refs.length > 0 && matchesAny(sentence, FACT_PATTERNS)) {
      return ClaimType.FACT;
    }
    if (matchesAny(sentence, INFERENCE_PATTERNS)) {
      return ClaimType.INFERENCE;
    }
    if (matchesAny(sentence, HYPOTHESIS_PATTERNS)) {
      return ClaimType.HYPOTHESIS;
    }
    if (refs.length > 0) {
      return ClaimType.FACT;
    }
    return ClaimType.HYPOTHESIS;
  }

  /**
   * Turn an extracted claim into a full Claim with its reasoning chain.
   * The extract step is always recorded; inference and hypothesis add a
   * penalised infer step.
   */
  buildClaim(extracted: ExtractedClaim, observations: ObservationLookup, now: Date = new Date()): Claim {
    const refs = extracted.observationRefs;
    const chain: TransformStep[] = [
      createTransformStep('extract', 'Extracted from observations', refs, EXTRACT_CONFIDENCE_DELTA)
    ];

    if (extracted.claimType === ClaimType.INFERENCE) {
      chain.push(createTransformStep('infer', 'Logical inference from observations', refs, INFERENCE_CONFIDENCE_DELTA));
    } else if (extracted.claimType === ClaimType.HYPOTHESIS) {
      chain.push(createTransformStep('infer', 'Speculative hypothesis', refs, HYPOTHESIS_CONFIDENCE_DELTA));
    }

    const claim = new Claim({
      statement: extracted.statement,
      claimType: extracted.claimType,
      sourceObservations: refs,
      transformChain: chain
    });
    claim.updateConfidence(observations, now);
    return claim;
  }

  /**
   * Extract, build and record every claim in `text` against a registry
   */
  extractAndRecord(text: string, registry: ProvenanceRegistry): Claim[] {
    const now = registry.now();
    const observations = registry.getObservationMap();
    return this.extractClaims(text).map(extracted => {
      const claim = this.buildClaim(extracted, observations, now);
      registry.addClaim(claim);
      return claim;
    });
  }

  private analyzeSentence(sentence: string): ExtractedClaim {
    const refs = this.extractReferences(sentence);
    const claimType = this.classify(sentence, refs);
    return {
      statement: sentence,
      claimType,
      observationRefs: refs,
      confidenceHint: confidenceHintFor(claimType, refs)
    };
  }

  private isMeaningfulClaim(sentence: string): boolean {
    if (sentence.endsWith('?') || sentence.endsWith('？')) {
      return false;
    }
    if (sentence.length < MIN_CLAIM_LENGTH) {
      return false;
    }
    if (sentence.startsWith('#')) {
      return false;
    }
    const lower = sentence.toLowerCase();
    return !FORMATTING_MARKERS.some(marker => lower.includes(marker));
  }
}

function confidenceHintFor(claimType: ClaimType, refs: readonly string[]): ConfidenceHint {
  if (refs.length === 0) {
    return 'low';
  }
  if (claimType === ClaimType.FACT) {
    return 'high';
  }
  if (claimType === ClaimType.INFERENCE) {
    return 'medium';
  }
  return 'low';
}

function matchesAny(text: string, patterns: readonly RegExp[]): boolean {
  return patterns.some(p => p.test(text));
}
