/**
 * Interaction Tools
 *
 * Answers from the user enter the ledger as USER_INPUT observations.
 */

import * as readline from 'readline';
import { z } from 'zod';
import { ToolRisk } from '../../cognitive/types.js';
import { DEFAULT_SOURCE_CONFIDENCE, ObservationSourceType } from '../../provenance/types.js';
import { ToolResult } from '../ToolResult.js';
import { defineTool } from '../ToolRegistry.js';
import type { Tool, UserPrompter } from '../types.js';

/**
 * Prompter that reads one line from stdin per question
 */
export class ReadlinePrompter implements UserPrompter {
  constructor(
    private input: NodeJS.ReadableStream = process.stdin,
    private output: NodeJS.WritableStream = process.stdout
  ) {}

  ask(question: string): Promise<string> {
    const rl = readline.createInterface({ input: this.input, output: this.output });
    return new Promise(resolve => {
      rl.question(`\n${question}\n> `, answer => {
        rl.close();
        resolve(answer.trim());
      });
    });
  }
}

export const askUserTool: Tool = defineTool({
  name: 'ask_user',
  description: 'Ask the user a clarifying question when the goal or requirements are unclear.',
  category: 'interaction',
  riskLevel: ToolRisk.SAFE,
  inputSchema: {
    type: 'object',
    properties: {
      question: { type: 'string', description: 'The question to ask' }
    },
    required: ['question']
  },
  argsSchema: z.object({
    question: z.string().min(1)
  }),
  async execute({ question }, context) {
    if (!context.prompter) {
      return { kind: 'with_provenance', result: ToolResult.fromError('No user is available to answer', 'ask_user') };
    }

    const answer = await context.prompter.ask(question);
    if (!answer) {
      return { kind: 'with_provenance', result: ToolResult.fromError('The user gave no answer', 'ask_user') };
    }

    return {
      kind: 'with_provenance',
      result: ToolResult.fromSuccess(answer, 'ask_user', {
        sourceType: ObservationSourceType.USER_INPUT,
        confidence: DEFAULT_SOURCE_CONFIDENCE[ObservationSourceType.USER_INPUT],
        ttlSeconds: null,
        scope: 'user',
        metadata: { question }
      })
    };
  }
});
