/**
 * Filesystem Tools
 *
 * Local reads are deterministic, so their observations carry full confidence
 * and never expire.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { glob } from 'glob';
import { z } from 'zod';
import { ToolRisk } from '../../cognitive/types.js';
import { ToolResult } from '../ToolResult.js';
import { defineTool } from '../ToolRegistry.js';
import type { Tool } from '../types.js';

export const FILE_READ_MAX_BYTES = 100_000;
export const GLOB_MAX_RESULTS = 100;

export const readFileTool: Tool = defineTool({
  name: 'read_file',
  description: 'Read a local text file. Use it to inspect code, configuration or documents.',
  category: 'filesystem',
  riskLevel: ToolRisk.SAFE,
  inputSchema: {
    type: 'object',
    properties: {
      file_path: { type: 'string', description: 'Path of the file to read' }
    },
    required: ['file_path']
  },
  argsSchema: z.object({
    file_path: z.string().min(1)
  }),
  async execute({ file_path }, context) {
    const resolved = path.resolve(context.cwd, file_path);

    const stat = await fs.stat(resolved).catch(() => null);
    if (!stat) {
      return { kind: 'with_provenance', result: ToolResult.fromError(`File not found: ${file_path}`, 'read_file') };
    }
    if (!stat.isFile()) {
      return { kind: 'with_provenance', result: ToolResult.fromError(`Not a file: ${file_path}`, 'read_file') };
    }
    if (stat.size > FILE_READ_MAX_BYTES) {
      return {
        kind: 'with_provenance',
        result: ToolResult.fromError(
          `File too large (${stat.size} bytes > ${FILE_READ_MAX_BYTES} bytes): ${file_path}`,
          'read_file'
        )
      };
    }

    const content = await fs.readFile(resolved, 'utf-8');
    return {
      kind: 'with_provenance',
      result: ToolResult.fromSuccess(content, 'read_file', {
        confidence: 1.0,
        ttlSeconds: null,
        scope: `file:${resolved}`,
        metadata: { filePath: resolved, fileSize: stat.size }
      })
    };
  }
});

export const globTool: Tool = defineTool({
  name: 'glob',
  description: 'Find files by pattern such as "**/*.ts" or "*.md". Newest files are listed first.',
  category: 'filesystem',
  riskLevel: ToolRisk.SAFE,
  inputSchema: {
    type: 'object',
    properties: {
      pattern: { type: 'string', description: 'Glob pattern' },
      path: { type: 'string', description: 'Base directory (defaults to the working directory)' }
    },
    required: ['pattern']
  },
  argsSchema: z.object({
    pattern: z.string().min(1),
    path: z.string().optional()
  }),
  async execute({ pattern, path: basePath }, context) {
    const base = path.resolve(context.cwd, basePath ?? '.');

    const stat = await fs.stat(base).catch(() => null);
    if (!stat) {
      return { kind: 'with_provenance', result: ToolResult.fromError(`Path not found: ${base}`, 'glob') };
    }
    if (!stat.isDirectory()) {
      return { kind: 'with_provenance', result: ToolResult.fromError(`Not a directory: ${base}`, 'glob') };
    }

    const matches = await glob(pattern, {
      cwd: base,
      nodir: true,
      withFileTypes: true,
      stat: true,
      ignore: ['**/node_modules/**', '**/.git/**']
    });

    const sorted = matches
      .sort((a, b) => (b.mtimeMs ?? 0) - (a.mtimeMs ?? 0))
      .map(entry => entry.relative());
    const truncated = sorted.length > GLOB_MAX_RESULTS;
    const shown = sorted.slice(0, GLOB_MAX_RESULTS);

    let content = shown.length > 0 ? shown.join('\n') : `No files match '${pattern}'`;
    if (truncated) {
      content += `\n\n[Results truncated to the first ${GLOB_MAX_RESULTS} files]`;
    }

    return {
      kind: 'with_provenance',
      result: ToolResult.fromSuccess(content, 'glob', {
        confidence: 1.0,
        ttlSeconds: null,
        scope: `glob:${base}:${pattern}`,
        metadata: { pattern, basePath: base, matchCount: shown.length, truncated }
      })
    };
  }
});

export const FILESYSTEM_TOOLS: readonly Tool[] = [readFileTool, globTool];
