/**
 * Compute Tools
 *
 * Deterministic arithmetic and shell execution. Calculations are exact and
 * side-effect free, so they are SAFE at full confidence. Shell commands can
 * have side effects, so their observations are slightly below full
 * confidence and the tool sits in the MEDIUM risk tier.
 */

import { exec } from 'child_process';
import { create, all } from 'mathjs';
import { z } from 'zod';
import { ToolRisk } from '../../cognitive/types.js';
import { ToolResult } from '../ToolResult.js';
import { defineTool } from '../ToolRegistry.js';
import type { Tool } from '../types.js';

export const BASH_DEFAULT_TIMEOUT_SECONDS = 30;
export const BASH_MAX_TIMEOUT_SECONDS = 300;
export const BASH_CONFIDENCE = 0.9;
export const BASH_MAX_BUFFER_BYTES = 10 * 1024 * 1024;

export const CALCULATE_CONFIDENCE = 1.0;
export const CALCULATE_PRECISION = 14;

export const BASH_COMMAND_BLACKLIST: readonly string[] = [
  'rm -rf /',
  'rm -rf /*',
  'rm -rf ~',
  'rm -rf ~/',
  'dd if=',
  'mkfs',
  'shutdown',
  'reboot',
  'poweroff',
  'init 0',
  'init 6',
  ':(){:|:&};:',
  '> /dev/sda',
  'mv /* ',
  'chmod -R 777 /'
];

/**
 * Returns the blacklisted fragment the command contains, if any
 */
export function findBlockedFragment(command: string): string | undefined {
  const lower = command.toLowerCase().trim();
  return BASH_COMMAND_BLACKLIST.find(fragment => lower.includes(fragment.toLowerCase()));
}

export function normalizeTimeout(timeout: number | undefined): number {
  if (timeout === undefined || timeout <= 0) return BASH_DEFAULT_TIMEOUT_SECONDS;
  return Math.min(timeout, BASH_MAX_TIMEOUT_SECONDS);
}

export interface CommandRun {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  /** Killed for writing more than the buffer allows */
  outputOverflow: boolean;
}

export function runCommand(
  command: string,
  cwd: string,
  timeoutSeconds: number,
  maxBuffer = BASH_MAX_BUFFER_BYTES
): Promise<CommandRun> {
  return new Promise(resolve => {
    exec(command, { cwd, timeout: timeoutSeconds * 1000, maxBuffer }, (error, stdout, stderr) => {
      const code: unknown = error?.code;
      const outputOverflow = code === 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER';
      resolve({
        exitCode: error ? (typeof code === 'number' ? code : 1) : 0,
        stdout,
        stderr,
        timedOut: error?.killed === true && !outputOverflow,
        outputOverflow
      });
    });
  });
}

export const bashTool: Tool = defineTool({
  name: 'bash',
  description: 'Run a shell command for system inspection, file processing or automation.',
  category: 'compute',
  riskLevel: ToolRisk.MEDIUM,
  inputSchema: {
    type: 'object',
    properties: {
      command: { type: 'string', description: 'Shell command to run' },
      timeout: {
        type: 'integer',
        description: `Timeout in seconds (default ${BASH_DEFAULT_TIMEOUT_SECONDS}, max ${BASH_MAX_TIMEOUT_SECONDS})`
      }
    },
    required: ['command']
  },
  argsSchema: z.object({
    command: z.string().min(1),
    timeout: z.number().int().optional()
  }),
  async execute({ command, timeout }, context) {
    const blocked = findBlockedFragment(command);
    if (blocked !== undefined) {
      return {
        kind: 'with_provenance',
        result: ToolResult.fromError(`Safety check failed: command contains a dangerous operation: ${blocked}`, 'bash')
      };
    }

    const timeoutSeconds = normalizeTimeout(timeout);
    const run = await runCommand(command, context.cwd, timeoutSeconds);

    if (run.outputOverflow) {
      return {
        kind: 'with_provenance',
        result: ToolResult.fromError(`Command output exceeded ${BASH_MAX_BUFFER_BYTES} bytes`, 'bash')
      };
    }
    if (run.timedOut) {
      return { kind: 'with_provenance', result: ToolResult.fromError(`Command timed out (${timeoutSeconds}s)`, 'bash') };
    }

    const parts: string[] = [];
    if (run.stdout) parts.push(run.stdout);
    if (run.stderr) parts.push(`[stderr]\n${run.stderr}`);
    const output = parts.join('\n').trim();

    if (run.exitCode !== 0) {
      return {
        kind: 'with_provenance',
        result: ToolResult.fromError(output || `Command exited with code ${run.exitCode}`, 'bash')
      };
    }

    return {
      kind: 'with_provenance',
      result: ToolResult.fromSuccess(output || 'Command succeeded (no output)', 'bash', {
        confidence: BASH_CONFIDENCE,
        ttlSeconds: null,
        scope: `bash:${command.slice(0, 50)}`,
        metadata: { command, exitCode: run.exitCode, hasOutput: output.length > 0, timeout: timeoutSeconds }
      })
    };
  }
});

// ==========================================
// CALCULATE
// ==========================================

const math = create(all);
const evaluateExpression = math.evaluate;

// Expressions may not redefine the evaluator or reach the parser
math.import(
  Object.fromEntries(
    ['import', 'createUnit', 'evaluate', 'parse', 'simplify', 'derivative', 'resolve'].map(name => [
      name,
      () => {
        throw new Error(`Function ${name} is disabled`);
      }
    ])
  ),
  { override: true }
);

/**
 * Evaluate an expression and format the result
 */
export function calculate(expression: string): string {
  const result: unknown = evaluateExpression(expression);
  if (result === undefined) {
    throw new Error('Expression produced no value');
  }
  return math.format(result, { precision: CALCULATE_PRECISION });
}

export const calculateTool: Tool = defineTool({
  name: 'calculate',
  description:
    'Evaluate a math expression exactly, e.g. "1024 * 0.15", "sqrt(2) ^ 2" or "5 km to m". Use this instead of doing arithmetic in your head.',
  category: 'compute',
  riskLevel: ToolRisk.SAFE,
  inputSchema: {
    type: 'object',
    properties: {
      expression: { type: 'string', description: 'Expression to evaluate' }
    },
    required: ['expression']
  },
  argsSchema: z.object({
    expression: z.string().min(1)
  }),
  async execute({ expression }) {
    let value: string;
    try {
      value = calculate(expression);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { kind: 'with_provenance', result: ToolResult.fromError(`Calculation failed: ${message}`, 'calculate') };
    }

    return {
      kind: 'with_provenance',
      result: ToolResult.fromSuccess(value, 'calculate', {
        confidence: CALCULATE_CONFIDENCE,
        ttlSeconds: null,
        scope: `calc:${expression.slice(0, 50)}`,
        metadata: { expression }
      })
    };
  }
});
