/**
 * Ledger Schemas
 *
 * zod schemas for exported ledgers read back from disk.
 */

import { z } from 'zod';
import { ClaimType, ObservationSourceType, type SerializedRegistry } from './types.js';

export const serializedObservationSchema = z.object({
  id: z.string(),
  content: z.string(),
  source_type: z.nativeEnum(ObservationSourceType),
  source_id: z.string(),
  timestamp: z.string().datetime({ offset: true }),
  confidence: z.number(),
  scope: z.string(),
  ttl_seconds: z.number().nullable(),
  metadata: z.record(z.unknown())
});

export const serializedTransformStepSchema = z.object({
  operation: z.enum(['extract', 'aggregate', 'infer', 'combine']),
  description: z.string(),
  input_ids: z.array(z.string()),
  confidence_delta: z.number()
});

export const serializedClaimSchema = z.object({
  id: z.string(),
  statement: z.string(),
  claim_type: z.nativeEnum(ClaimType),
  source_observations: z.array(z.string()),
  transform_chain: z.array(serializedTransformStepSchema),
  confidence: z.number(),
  scope: z.string(),
  created_at: z.string().datetime({ offset: true })
});

export const serializedRegistrySchema = z.object({
  observations: z.record(serializedObservationSchema),
  claims: z.record(serializedClaimSchema).default({})
});

export type LedgerParseResult =
  | { success: true; data: SerializedRegistry }
  | { success: false; error: string };

/**
 * Validate an untrusted ledger document
 */
export function parseSerializedRegistry(input: unknown): LedgerParseResult {
  const parsed = serializedRegistrySchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return { success: false, error: issues };
  }
  return { success: true, data: parsed.data };
}
