/**
 * Default tool set
 */

import { ToolRegistry } from './ToolRegistry.js';
import { FILESYSTEM_TOOLS } from './categories/filesystem.js';
import { createReadUrlTool, type FetchLike } from './categories/web.js';
import { bashTool, calculateTool } from './categories/compute.js';
import { askUserTool } from './categories/interaction.js';
import type { UserPrompter } from './types.js';

export interface DefaultToolOptions {
  cwd?: string;
  prompter?: UserPrompter;
  enableBash?: boolean;
  enableWeb?: boolean;
  fetchImpl?: FetchLike;
}

export function createDefaultToolRegistry(options: DefaultToolOptions = {}): ToolRegistry {
  const registry = new ToolRegistry({ cwd: options.cwd, prompter: options.prompter });

  for (const tool of FILESYSTEM_TOOLS) {
    registry.register(tool);
  }
  registry.register(calculateTool);
  if (options.enableWeb ?? true) {
    registry.register(createReadUrlTool(options.fetchImpl));
  }
  if (options.enableBash ?? true) {
    registry.register(bashTool);
  }
  if (options.prompter) {
    registry.register(askUserTool);
  }

  return registry;
}
