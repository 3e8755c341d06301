/**
 * Inspect Command
 *
 * Audit a ledger exported by `solve --save-ledger`.
 */

import { readFile } from 'fs/promises';
import { Command } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';
import { ProvenanceRegistry } from '../../provenance/ProvenanceRegistry.js';
import { GroundedAnswerGenerator } from '../../provenance/GroundedAnswerGenerator.js';
import { parseSerializedRegistry } from '../../provenance/schemas.js';
import type { DegradationLevel } from '../../provenance/types.js';

const inspectOptionsSchema = z.object({
  minConfidence: z.coerce.number().min(0).max(1).default(0),
  claims: z.boolean().default(false)
});

export type InspectOptions = z.infer<typeof inspectOptionsSchema>;

export interface InspectReport {
  summary: string;
  degradationLevel: DegradationLevel;
  validObservationIds: string[];
  expiredObservationIds: string[];
  claimAuditTrails: string[];
}

/**
 * Build the report for an already-parsed ledger document
 */
export function inspectLedger(
  document: unknown,
  options: Partial<InspectOptions> = {},
  now?: Date
): InspectReport {
  const parsed = parseSerializedRegistry(document);
  if (!parsed.success) {
    throw new Error(`Invalid ledger: ${parsed.error}`);
  }

  const registry = ProvenanceRegistry.fromDict(parsed.data, now ? { clock: () => now } : {});
  const generator = new GroundedAnswerGenerator();
  const at = registry.now();

  return {
    summary: generator.formatProvenanceSummary(registry),
    degradationLevel: generator.determineDegradation(registry, at),
    validObservationIds: registry.getValidObservations(options.minConfidence ?? 0, at).map(o => o.id),
    expiredObservationIds: registry.invalidateExpired(at),
    claimAuditTrails: options.claims ? registry.getValidClaims(0).map(c => c.getAuditTrail()) : []
  };
}

export const inspectCommand = new Command('inspect')
  .description('Audit an exported observation ledger')
  .argument('<ledger>', 'Ledger JSON file written by solve --save-ledger')
  .option('-m, --min-confidence <value>', 'Only list observations at or above this confidence', '0')
  .option('-c, --claims', 'Print the audit trail of every claim')
  .action(async (ledgerPath: string, rawOptions: unknown) => {
    try {
      const options = inspectOptionsSchema.parse(rawOptions);
      const document: unknown = JSON.parse(await readFile(ledgerPath, 'utf-8'));
      const report = inspectLedger(document, options);

      console.log();
      console.log(chalk.cyan(report.summary));
      console.log();
      console.log(chalk.dim('Degradation level:'), chalk.white(report.degradationLevel));
      console.log(
        chalk.dim(`Observations at or above ${Math.round(options.minConfidence * 100)}%:`),
        chalk.white(report.validObservationIds.join(', ') || '(none)')
      );
      if (report.expiredObservationIds.length > 0) {
        console.log(chalk.dim('Expired:'), chalk.yellow(report.expiredObservationIds.join(', ')));
      }

      if (options.claims) {
        console.log();
        console.log(chalk.cyan('Claims'));
        console.log(chalk.dim('─'.repeat(40)));
        if (report.claimAuditTrails.length === 0) {
          console.log(chalk.dim('(no claims recorded)'));
        }
        for (const trail of report.claimAuditTrails) {
          console.log(trail);
          console.log();
        }
      }
    } catch (error) {
      console.error(chalk.red('Failed to inspect ledger:'), error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });
