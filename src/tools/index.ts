export { ToolResult, OBSERVATION_CONTENT_LIMIT, PLAIN_OUTCOME_CONFIDENCE } from './ToolResult.js';
export type { ToolSuccessOptions } from './ToolResult.js';
export { ToolRegistry, defineTool, outcomeToObservation, outcomeText } from './ToolRegistry.js';
export { createDefaultToolRegistry } from './defaults.js';
export type { DefaultToolOptions } from './defaults.js';
export { readFileTool, globTool, FILESYSTEM_TOOLS, FILE_READ_MAX_BYTES, GLOB_MAX_RESULTS } from './categories/filesystem.js';
export { createReadUrlTool, extractTextFromHtml, WEB_PAGE_MAX_CHARS, WEB_PAGE_TTL_SECONDS } from './categories/web.js';
export type { FetchLike } from './categories/web.js';
export {
  bashTool,
  calculateTool,
  calculate,
  runCommand,
  findBlockedFragment,
  normalizeTimeout,
  BASH_COMMAND_BLACKLIST,
  BASH_MAX_BUFFER_BYTES
} from './categories/compute.js';
export type { CommandRun } from './categories/compute.js';
export { askUserTool, ReadlinePrompter } from './categories/interaction.js';
export * from './types.js';
