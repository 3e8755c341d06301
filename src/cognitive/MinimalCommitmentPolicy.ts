/**
 * Minimal Commitment Policy
 *
 * Prefer reversible actions while confidence is low; riskier tools unlock
 * only as confidence grows.
 */

import { ToolRisk, TOOL_RISK_ORDER, TOOL_RISK_THRESHOLDS } from './types.js';

export type RiskedTool = readonly [name: string, risk: ToolRisk];

export class MinimalCommitmentPolicy {
  private thresholds: Readonly<Record<ToolRisk, number>>;

  constructor(thresholds: Partial<Record<ToolRisk, number>> = {}) {
    this.thresholds = { ...TOOL_RISK_THRESHOLDS, ...thresholds };
  }

  thresholdFor(risk: ToolRisk): number {
    return this.thresholds[risk];
  }

  shouldProceed(risk: ToolRisk, confidence: number): boolean {
    return confidence >= this.thresholds[risk];
  }

  /**
   * Names of admissible tools, safest tier first. Input order is kept
   * within a tier.
   */
  rankTools(tools: readonly RiskedTool[], confidence: number): string[] {
    return tools
      .filter(([, risk]) => this.shouldProceed(risk, confidence))
      .map((tool, index) => ({ tool, index }))
      .sort((a, b) =>
        TOOL_RISK_ORDER.indexOf(a.tool[1]) - TOOL_RISK_ORDER.indexOf(b.tool[1]) || a.index - b.index
      )
      .map(({ tool }) => tool[0]);
  }
}
