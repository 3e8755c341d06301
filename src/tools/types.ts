/**
 * Tool Types
 *
 * The contract between tool implementations and the provenance ledger.
 */

import type { z } from 'zod';
import type { ToolRisk } from '../cognitive/types.js';
import type { ToolResult } from './ToolResult.js';

/**
 * What a tool hands back. A plain outcome carries no provenance of its own;
 * the registry boundary turns both variants into exactly one observation.
 */
export type ExecutionOutcome =
  | { kind: 'plain'; text: string }
  | { kind: 'with_provenance'; result: ToolResult };

export function plainOutcome(text: string): ExecutionOutcome {
  return { kind: 'plain', text };
}

export function withProvenance(result: ToolResult): ExecutionOutcome {
  return { kind: 'with_provenance', result };
}

// ==========================================
// SCHEMAS
// ==========================================

export interface JsonSchemaProperty {
  type: 'string' | 'number' | 'integer' | 'boolean';
  description: string;
  minimum?: number;
  maximum?: number;
}

export type JsonSchemaObject = {
  type: 'object';
  properties: Record<string, JsonSchemaProperty>;
  required: string[];
};

// ==========================================
// TOOLS
// ==========================================

/**
 * Answers questions the agent puts to the user
 */
export interface UserPrompter {
  ask(question: string): Promise<string>;
}

export interface ToolContext {
  cwd: string;
  prompter?: UserPrompter;
}

export interface ToolMetadata {
  name: string;
  description: string;
  category: string;
  riskLevel: ToolRisk;
  inputSchema: JsonSchemaObject;
}

export interface Tool {
  readonly metadata: ToolMetadata;
  run(rawArgs: unknown, context: ToolContext): Promise<ExecutionOutcome>;
}

export interface ToolDefinition<S extends z.ZodTypeAny> extends ToolMetadata {
  argsSchema: S;
  execute(args: z.infer<S>, context: ToolContext): Promise<ExecutionOutcome>;
}

/**
 * Function-calling definition sent to the model
 */
export interface ChatToolDefinition {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: JsonSchemaObject;
  };
}
