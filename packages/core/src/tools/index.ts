/**
 * Tools Module
 *
 * Helpers for analysis procedures backed by external commands.
 */

export {
  runProcess,
  DEFAULT_PROCESS_TIMEOUT_MS,
  type ProcessResult,
  type RunProcessOptions,
} from './process-runner.js';
export { createCommandTool, mergeJsonPayloads, DEFAULT_CHUNK_SIZE, type CommandToolOptions } from './command-tool.js';
