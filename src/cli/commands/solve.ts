/**
 * Solve Command
 *
 * Run the agent on one problem and print the grounded answer.
 */

import { writeFile } from 'fs/promises';
import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { z } from 'zod';
import { getDefaultConfig, mergeConfig, validateConfig, type GroundworkConfig } from '../../core/config.js';
import { ConfigurationError } from '../../core/errors.js';
import { OpenAIChatClient } from '../../providers/OpenAIChatClient.js';
import type { ChatClient } from '../../providers/types.js';
import { createDefaultToolRegistry } from '../../tools/defaults.js';
import { ReadlinePrompter } from '../../tools/categories/interaction.js';
import type { UserPrompter } from '../../tools/types.js';
import { ProblemSolvingAgent, type SolveResult } from '../../agent/ProblemSolvingAgent.js';

const solveOptionsSchema = z.object({
  maxIterations: z.coerce.number().int().positive().optional(),
  model: z.string().min(1).optional(),
  bash: z.boolean().default(true),
  format: z.enum(['text', 'json']).default('text'),
  saveLedger: z.string().min(1).optional(),
  verbose: z.boolean().default(false)
});

export type SolveOptions = z.infer<typeof solveOptionsSchema>;

/**
 * Overlay command-line options on the environment config. Options the user
 * did not pass leave the config untouched.
 */
export function resolveSolveConfig(base: GroundworkConfig, options: SolveOptions): GroundworkConfig {
  return mergeConfig(base, {
    llm: options.model !== undefined ? { model: options.model } : {},
    agent: {
      ...(options.maxIterations !== undefined ? { maxIterations: options.maxIterations } : {}),
      enableBash: base.agent.enableBash && options.bash,
      verbose: base.agent.verbose || options.verbose
    }
  });
}

/**
 * The part of an ora spinner a prompter needs
 */
export interface PausableSpinner {
  readonly isSpinning: boolean;
  start(): unknown;
  stop(): unknown;
}

/**
 * Stops the spinner while a question is on screen so the two do not fight
 * over the terminal.
 */
export class SpinnerAwarePrompter implements UserPrompter {
  constructor(
    private inner: UserPrompter,
    private spinner: PausableSpinner
  ) {}

  async ask(question: string): Promise<string> {
    const wasSpinning = this.spinner.isSpinning;
    if (wasSpinning) {
      this.spinner.stop();
    }
    try {
      return await this.inner.ask(question);
    } finally {
      if (wasSpinning) {
        this.spinner.start();
      }
    }
  }
}

export interface AgentFactoryOptions {
  client: ChatClient;
  prompter?: UserPrompter;
  cwd?: string;
}

export function createAgent(config: GroundworkConfig, options: AgentFactoryOptions): ProblemSolvingAgent {
  const tools = createDefaultToolRegistry({
    cwd: options.cwd,
    prompter: options.prompter,
    enableBash: config.agent.enableBash
  });
  return new ProblemSolvingAgent(
    { client: options.client, tools },
    {
      maxIterations: config.agent.maxIterations,
      verbose: config.agent.verbose,
      gate: {
        confidenceThreshold: config.agent.confidenceThreshold,
        stallThreshold: config.agent.stallThreshold
      }
    }
  );
}

export function formatResult(result: SolveResult, format: SolveOptions['format']): string {
  if (format === 'json') {
    return JSON.stringify(
      {
        answer: result.answer,
        iterations: result.iterations,
        stop_reason: result.stopReason,
        decisions: result.decisions
      },
      null,
      2
    );
  }
  return result.answer.toFormattedOutput();
}

export const solveCommand = new Command('solve')
  .description('Solve a problem with grounded, auditable answers')
  .argument('<problem>', 'The problem to solve')
  .option('-n, --max-iterations <n>', 'Maximum loop iterations')
  .option('-m, --model <name>', 'Model name')
  .option('--no-bash', 'Disable the bash tool')
  .option('-f, --format <format>', 'Output format (text, json)', 'text')
  .option('-s, --save-ledger <file>', 'Write the observation ledger to a JSON file')
  .option('-v, --verbose', 'Log each iteration')
  .action(async (problem: string, rawOptions: unknown) => {
    const spinner = ora({ text: 'Solving...', discardStdin: false });

    try {
      const options = solveOptionsSchema.parse(rawOptions);
      const config = resolveSolveConfig(getDefaultConfig(), options);
      const problems = validateConfig(config);
      if (problems.length > 0) {
        throw new ConfigurationError(problems);
      }

      const client = new OpenAIChatClient({
        apiKey: config.llm.apiKey ?? '',
        baseURL: config.llm.baseURL,
        model: config.llm.model,
        temperature: config.llm.temperature
      });
      const agent = createAgent(config, { client, prompter: new SpinnerAwarePrompter(new ReadlinePrompter(), spinner) });

      // Spinner only in quiet mode
      if (!config.agent.verbose) {
        spinner.start();
      }
      const result = await agent.solve(problem);
      spinner.succeed(`Done in ${result.iterations} iteration(s)`);

      console.log();
      console.log(formatResult(result, options.format));

      if (options.saveLedger) {
        await writeFile(options.saveLedger, JSON.stringify(result.session.registry.toDict(), null, 2), 'utf-8');
        console.log();
        console.log(chalk.dim('Ledger written to'), chalk.white(options.saveLedger));
      }
    } catch (error) {
      spinner.fail(chalk.red('Failed to solve'));
      console.error(error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });
