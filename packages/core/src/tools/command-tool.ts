/**
 * Command-backed analysis tools
 *
 * Builds an `analyze` function around an external command. A whole-project
 * run invokes the command once; a file subset is appended to the arguments
 * in chunks so long file lists stay under command-line length limits, and
 * the parsed chunk payloads are merged.
 */

import { ToolExecutionError } from '../utils/errors.js';
import { getLogger, type Logger } from '../utils/logger.js';
import type { JsonObject, JsonValue } from '../cache/types.js';
import type { AnalysisContext, AnalyzeFn } from '../incremental/tool-registry.js';
import { isJsonObject } from '../incremental/reducers.js';
import { runProcess, type ProcessResult } from './process-runner.js';

export const DEFAULT_CHUNK_SIZE = 50;

export interface CommandToolOptions {
  /** Tool name used in errors and logs */
  tool: string;
  command: string;
  args?: readonly string[];
  /** Turn one invocation's output into a payload */
  parse: (stdout: string, result: ProcessResult) => JsonValue;
  chunkSize?: number;
  /** Exit codes treated as success (default: [0]) */
  acceptExitCodes?: readonly number[];
  /** Combine chunk payloads (default: mergeJsonPayloads) */
  mergeChunks?: (payloads: JsonValue[]) => JsonValue;
  /** Payload for an empty file subset (default: {}) */
  emptyPayload?: JsonValue;
  /** Per-invocation process timeout (default: DEFAULT_PROCESS_TIMEOUT_MS) */
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Default chunk merge: arrays under the same key are concatenated, numbers
 * summed, nested objects shallow-merged, anything else keeps the last value
 */
export function mergeJsonPayloads(payloads: JsonValue[]): JsonValue {
  if (payloads.length === 0) {
    return {};
  }
  if (payloads.every((payload) => Array.isArray(payload))) {
    return payloads.flatMap((payload) => (Array.isArray(payload) ? payload : []));
  }

  const merged: JsonObject = {};
  for (const payload of payloads) {
    if (!isJsonObject(payload)) {
      continue;
    }
    for (const [key, value] of Object.entries(payload)) {
      const existing = merged[key];
      if (Array.isArray(existing) && Array.isArray(value)) {
        merged[key] = [...existing, ...value];
      } else if (typeof existing === 'number' && typeof value === 'number') {
        merged[key] = existing + value;
      } else if (isJsonObject(existing) && isJsonObject(value)) {
        merged[key] = { ...existing, ...value };
      } else {
        merged[key] = value;
      }
    }
  }
  return merged;
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export function createCommandTool(options: CommandToolOptions): AnalyzeFn {
  const {
    tool,
    command,
    args = [],
    parse,
    chunkSize = DEFAULT_CHUNK_SIZE,
    acceptExitCodes = [0],
    mergeChunks = mergeJsonPayloads,
    emptyPayload = {},
    timeoutMs,
  } = options;
  const logger = options.logger ?? getLogger(`tool.${tool}`);

  const invoke = async (extraArgs: readonly string[], context: AnalysisContext): Promise<JsonValue> => {
    const result = await runProcess(command, [...args, ...extraArgs], {
      cwd: context.projectRoot,
      signal: context.signal,
      timeoutMs,
    });

    if (!acceptExitCodes.includes(result.exitCode)) {
      throw new ToolExecutionError(`${tool} exited with code ${result.exitCode}`, {
        tool,
        exitCode: result.exitCode,
        stderr: result.stderr.slice(0, 2000),
      });
    }

    try {
      return parse(result.stdout, result);
    } catch (error) {
      throw new ToolExecutionError(`Could not parse ${tool} output`, {
        tool,
        operation: 'parse',
        exitCode: result.exitCode,
        cause: error instanceof Error ? error : undefined,
      });
    }
  };

  return async (context) => {
    if (context.files === undefined) {
      return invoke([], context);
    }
    if (context.files.length === 0) {
      return emptyPayload;
    }

    const chunks = chunk(context.files, chunkSize);
    if (chunks.length > 1) {
      logger.info('Splitting file list into chunks', { files: context.files.length, chunks: chunks.length });
    }

    const payloads: JsonValue[] = [];
    for (const files of chunks) {
      payloads.push(await invoke(files, context));
    }
    return payloads.length === 1 && payloads[0] !== undefined ? payloads[0] : mergeChunks(payloads);
  };
}
