/**
 * Tool Registry
 *
 * Holds the tools offered to the model and executes them behind a single
 * boundary: every call, whatever happens inside, resolves to exactly one
 * observation.
 */

import type { z } from 'zod';
import { Observation } from '../provenance/Observation.js';
import { ObservationSourceType } from '../provenance/types.js';
import type { RiskedTool } from '../cognitive/MinimalCommitmentPolicy.js';
import { ToolResult, PLAIN_OUTCOME_CONFIDENCE, OBSERVATION_CONTENT_LIMIT } from './ToolResult.js';
import type {
  ChatToolDefinition,
  ExecutionOutcome,
  Tool,
  ToolContext,
  ToolDefinition
} from './types.js';

/**
 * Wrap a definition so arguments are checked against its zod schema before
 * the executor ever sees them.
 */
export function defineTool<S extends z.ZodTypeAny>(definition: ToolDefinition<S>): Tool {
  const { argsSchema, execute, ...metadata } = definition;
  return {
    metadata,
    async run(rawArgs: unknown, context: ToolContext): Promise<ExecutionOutcome> {
      const parsed = argsSchema.safeParse(rawArgs ?? {});
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map(issue => `${issue.path.join('.') || 'args'}: ${issue.message}`)
          .join('; ');
        return { kind: 'with_provenance', result: ToolResult.fromError(`Invalid arguments: ${issues}`, metadata.name) };
      }
      return execute(parsed.data, context);
    }
  };
}

/**
 * Resolve an outcome to the observation it contributes
 */
export function outcomeToObservation(outcome: ExecutionOutcome, toolName: string): Observation {
  if (outcome.kind === 'with_provenance') {
    return outcome.result.observation;
  }
  return new Observation({
    content: outcome.text.substring(0, OBSERVATION_CONTENT_LIMIT),
    sourceType: ObservationSourceType.TOOL_RETURN,
    sourceId: toolName,
    confidence: PLAIN_OUTCOME_CONFIDENCE
  });
}

/**
 * Text handed back to the model for a tool call
 */
export function outcomeText(outcome: ExecutionOutcome): string {
  if (outcome.kind === 'plain') {
    return outcome.text;
  }
  return outcome.result.success
    ? outcome.result.content
    : `Error: ${outcome.result.errorMessage ?? outcome.result.content}`;
}

export class ToolRegistry {
  private tools: Map<string, Tool> = new Map();
  private context: ToolContext;

  constructor(context: Partial<ToolContext> = {}) {
    this.context = { cwd: context.cwd ?? process.cwd(), prompter: context.prompter };
  }

  register(tool: Tool): void {
    this.tools.set(tool.metadata.name, tool);
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get size(): number {
    return this.tools.size;
  }

  getAll(): Tool[] {
    return Array.from(this.tools.values());
  }

  getByCategory(category: string): Tool[] {
    return this.getAll().filter(tool => tool.metadata.category === category);
  }

  categories(): string[] {
    return Array.from(new Set(this.getAll().map(tool => tool.metadata.category)));
  }

  riskProfile(): RiskedTool[] {
    return this.getAll().map(tool => [tool.metadata.name, tool.metadata.riskLevel] as const);
  }

  /**
   * Run a tool by name. Unknown tools, invalid arguments and thrown
   * executors all come back as error results.
   */
  async execute(name: string, args: unknown): Promise<ExecutionOutcome> {
    const tool = this.tools.get(name);
    if (!tool) {
      return { kind: 'with_provenance', result: ToolResult.fromError(`Unknown tool: ${name}`, name) };
    }

    try {
      return await tool.run(args, this.context);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { kind: 'with_provenance', result: ToolResult.fromError(message, name) };
    }
  }

  toChatTools(names?: readonly string[]): ChatToolDefinition[] {
    const selected = names
      ? names.flatMap(name => {
          const tool = this.tools.get(name);
          return tool ? [tool] : [];
        })
      : this.getAll();

    return selected.map((tool): ChatToolDefinition => ({
      type: 'function',
      function: {
        name: tool.metadata.name,
        description: tool.metadata.description,
        parameters: tool.metadata.inputSchema
      }
    }));
  }
}
