import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile, mkdir, utimes } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ToolRegistry } from '../ToolRegistry.js';
import type { ToolResult } from '../ToolResult.js';
import type { ExecutionOutcome } from '../types.js';
import { readFileTool, globTool, FILE_READ_MAX_BYTES } from './filesystem.js';

function resultOf(outcome: ExecutionOutcome): ToolResult {
  if (outcome.kind !== 'with_provenance') {
    throw new Error('expected a provenance result');
  }
  return outcome.result;
}

describe('filesystem tools', () => {
  let dir: string;
  let registry: ToolRegistry;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'groundwork-fs-'));
    registry = new ToolRegistry({ cwd: dir });
    registry.register(readFileTool);
    registry.register(globTool);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('read_file', () => {
    it('reads a file relative to the working directory', async () => {
      await writeFile(join(dir, 'notes.txt'), 'deploy window: friday');

      const result = resultOf(await registry.execute('read_file', { file_path: 'notes.txt' }));
      expect(result.success).toBe(true);
      expect(result.content).toBe('deploy window: friday');
      expect(result.observation.confidence).toBe(1);
      expect(result.observation.ttlSeconds).toBeNull();
      expect(result.observation.scope).toBe(`file:${join(dir, 'notes.txt')}`);
      expect(result.observation.metadata).toEqual({ filePath: join(dir, 'notes.txt'), fileSize: 21 });
    });

    it('reports a missing file', async () => {
      const result = resultOf(await registry.execute('read_file', { file_path: 'absent.txt' }));
      expect(result.errorMessage).toBe('File not found: absent.txt');
    });

    it('refuses directories', async () => {
      await mkdir(join(dir, 'sub'));
      const result = resultOf(await registry.execute('read_file', { file_path: 'sub' }));
      expect(result.errorMessage).toBe('Not a file: sub');
    });

    it('refuses files over the size limit', async () => {
      await writeFile(join(dir, 'big.txt'), 'x'.repeat(FILE_READ_MAX_BYTES + 1));
      const result = resultOf(await registry.execute('read_file', { file_path: 'big.txt' }));
      expect(result.errorMessage).toBe(`File too large (${FILE_READ_MAX_BYTES + 1} bytes > ${FILE_READ_MAX_BYTES} bytes): big.txt`);
    });
  });

  describe('glob', () => {
    it('lists matches newest first', async () => {
      await writeFile(join(dir, 'old.txt'), 'a');
      await writeFile(join(dir, 'new.txt'), 'b');
      await writeFile(join(dir, 'skip.md'), 'c');
      await utimes(join(dir, 'old.txt'), new Date('2024-01-01'), new Date('2024-01-01'));
      await utimes(join(dir, 'new.txt'), new Date('2024-06-01'), new Date('2024-06-01'));

      const result = resultOf(await registry.execute('glob', { pattern: '*.txt' }));
      expect(result.content).toBe('new.txt\nold.txt');
      expect(result.observation.metadata).toMatchObject({ pattern: '*.txt', matchCount: 2, truncated: false });
    });

    it('searches below a base path', async () => {
      await mkdir(join(dir, 'src'));
      await writeFile(join(dir, 'src', 'a.ts'), '');

      const result = resultOf(await registry.execute('glob', { pattern: '**/*.ts', path: 'src' }));
      expect(result.content).toBe('a.ts');
    });

    it('says when nothing matches', async () => {
      const result = resultOf(await registry.execute('glob', { pattern: '*.rs' }));
      expect(result.success).toBe(true);
      expect(result.content).toBe("No files match '*.rs'");
    });

    it('reports a missing base path', async () => {
      const result = resultOf(await registry.execute('glob', { pattern: '*', path: 'nowhere' }));
      expect(result.errorMessage).toBe(`Path not found: ${join(dir, 'nowhere')}`);
    });
  });
});
