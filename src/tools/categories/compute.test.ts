import { describe, it, expect } from 'vitest';
import { tmpdir } from 'os';
import { ToolRisk } from '../../cognitive/types.js';
import { ToolRegistry } from '../ToolRegistry.js';
import type { ToolResult } from '../ToolResult.js';
import type { ExecutionOutcome } from '../types.js';
import {
  bashTool,
  calculateTool,
  calculate,
  runCommand,
  findBlockedFragment,
  normalizeTimeout,
  BASH_CONFIDENCE,
  BASH_DEFAULT_TIMEOUT_SECONDS,
  BASH_MAX_TIMEOUT_SECONDS
} from './compute.js';

function resultOf(outcome: ExecutionOutcome): ToolResult {
  if (outcome.kind !== 'with_provenance') {
    throw new Error('expected a provenance result');
  }
  return outcome.result;
}

function calculateRegistry(): ToolRegistry {
  const registry = new ToolRegistry({ cwd: tmpdir() });
  registry.register(calculateTool);
  return registry;
}

function bashRegistry(): ToolRegistry {
  const registry = new ToolRegistry({ cwd: tmpdir() });
  registry.register(bashTool);
  return registry;
}

describe('bash safety', () => {
  it('blocks destructive commands regardless of case', () => {
    expect(findBlockedFragment('rm -rf /')).toBe('rm -rf /');
    expect(findBlockedFragment('sudo rm -rf ~')).toBe('rm -rf ~');
    expect(findBlockedFragment('MKFS.ext4 /dev/sdb1')).toBe('mkfs');
    expect(findBlockedFragment('  Shutdown -h now')).toBe('shutdown');
  });

  it('lets ordinary commands through', () => {
    expect(findBlockedFragment('ls -la')).toBeUndefined();
    expect(findBlockedFragment('rm -rf ./build')).toBeUndefined();
  });

  it('normalizes timeouts', () => {
    expect(normalizeTimeout(undefined)).toBe(BASH_DEFAULT_TIMEOUT_SECONDS);
    expect(normalizeTimeout(0)).toBe(BASH_DEFAULT_TIMEOUT_SECONDS);
    expect(normalizeTimeout(-5)).toBe(BASH_DEFAULT_TIMEOUT_SECONDS);
    expect(normalizeTimeout(10)).toBe(10);
    expect(normalizeTimeout(9999)).toBe(BASH_MAX_TIMEOUT_SECONDS);
  });
});

describe('bash tool', () => {
  it('returns command output', async () => {
    const result = resultOf(await bashRegistry().execute('bash', { command: 'echo hello' }));

    expect(result.success).toBe(true);
    expect(result.content).toBe('hello');
    expect(result.observation.confidence).toBe(BASH_CONFIDENCE);
    expect(result.observation.scope).toBe('bash:echo hello');
    expect(result.observation.metadata).toMatchObject({ exitCode: 0, hasOutput: true, timeout: BASH_DEFAULT_TIMEOUT_SECONDS });
  });

  it('describes a silent success', async () => {
    const result = resultOf(await bashRegistry().execute('bash', { command: 'true' }));
    expect(result.content).toBe('Command succeeded (no output)');
  });

  it('reports a non-zero exit', async () => {
    const result = resultOf(await bashRegistry().execute('bash', { command: 'exit 3' }));
    expect(result.success).toBe(false);
    expect(result.errorMessage).toBe('Command exited with code 3');
  });

  it('includes stderr in failure output', async () => {
    const result = resultOf(await bashRegistry().execute('bash', { command: 'echo oops 1>&2; exit 1' }));
    expect(result.errorMessage).toBe('[stderr]\noops');
  });

  it('refuses blacklisted commands without running them', async () => {
    const result = resultOf(await bashRegistry().execute('bash', { command: 'rm -rf / --no-preserve-root' }));
    expect(result.errorMessage).toBe('Safety check failed: command contains a dangerous operation: rm -rf /');
  });
});

describe('bash output limits', () => {
  it('reports overflowing output apart from a timeout', async () => {
    const run = await runCommand('head -c 2000 /dev/zero', tmpdir(), 5, 100);

    expect(run.outputOverflow).toBe(true);
    expect(run.timedOut).toBe(false);
  });

  it('leaves output under the limit alone', async () => {
    const run = await runCommand('echo small', tmpdir(), 5, 100);

    expect(run).toEqual({ exitCode: 0, stdout: 'small\n', stderr: '', timedOut: false, outputOverflow: false });
  });
});

describe('calculate', () => {
  it('evaluates arithmetic', () => {
    expect(calculate('2 + 3 * 4')).toBe('14');
    expect(calculate('sqrt(16)')).toBe('4');
    expect(calculate('0.1 + 0.2')).toBe('0.3');
  });

  it('returns an exact, non-expiring observation', async () => {
    const result = resultOf(await calculateRegistry().execute('calculate', { expression: '1024 * 0.15' }));

    expect(result.success).toBe(true);
    expect(result.content).toBe('153.6');
    expect(result.observation.confidence).toBe(1.0);
    expect(result.observation.ttlSeconds).toBeNull();
    expect(result.observation.scope).toBe('calc:1024 * 0.15');
    expect(result.observation.metadata).toEqual({ expression: '1024 * 0.15' });
  });

  it('reports unknown symbols', async () => {
    const result = resultOf(await calculateRegistry().execute('calculate', { expression: 'foo + 1' }));

    expect(result.success).toBe(false);
    expect(result.errorMessage).toMatch(/^Calculation failed: Undefined symbol foo/);
  });

  it('keeps expressions away from the evaluator internals', async () => {
    const result = resultOf(await calculateRegistry().execute('calculate', { expression: 'import({}, {})' }));

    expect(result.success).toBe(false);
    expect(result.errorMessage).toBe('Calculation failed: Function import is disabled');
  });

  it('sits in the safe tier', () => {
    expect(calculateTool.metadata.riskLevel).toBe(ToolRisk.SAFE);
    expect(calculateTool.metadata.category).toBe('compute');
  });
});
