/**
 * On-disk layout of the audit cache directory
 *
 *   <root>/<cacheDir>/index.json
 *   <root>/<cacheDir>/results/<tool>.json
 *   <root>/<cacheDir>/patterns/<tool>.json
 */

import { readdir } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { ValidationError } from '../utils/errors.js';
import { isErrnoException } from '../utils/atomic-write.js';

export const DEFAULT_CACHE_DIR = '.audit';
export const INDEX_FILE = 'index.json';
export const RESULTS_DIR = 'results';
export const PATTERNS_DIR = 'patterns';

const TOOL_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

export interface CacheLayout {
  projectRoot: string;
  cacheRoot: string;
  indexPath: string;
  resultsDir: string;
  patternsDir: string;
}

export function resolveCacheLayout(projectRoot: string, cacheDir: string = DEFAULT_CACHE_DIR): CacheLayout {
  const root = resolve(projectRoot);
  const cacheRoot = resolve(root, cacheDir);
  return {
    projectRoot: root,
    cacheRoot,
    indexPath: join(cacheRoot, INDEX_FILE),
    resultsDir: join(cacheRoot, RESULTS_DIR),
    patternsDir: join(cacheRoot, PATTERNS_DIR),
  };
}

export function isValidToolName(tool: string): boolean {
  return TOOL_NAME_PATTERN.test(tool);
}

/**
 * Tool names become file names, so they are restricted to a safe alphabet
 */
export function assertToolName(tool: string, component: string, operation: string): void {
  if (!isValidToolName(tool)) {
    throw new ValidationError(`Invalid tool name "${tool}"`, {
      component,
      operation,
      field: 'tool',
      value: tool,
      constraints: [TOOL_NAME_PATTERN.source],
      recoveryHint: 'Use letters, digits, "_", "." and "-", starting with a letter or digit',
    });
  }
}

export function toolArtifactPath(dir: string, tool: string): string {
  return join(dir, `${tool}.json`);
}

/**
 * Tool names with an artifact in `dir`, sorted; a missing dir has none
 */
export async function listToolArtifacts(dir: string): Promise<string[]> {
  let names: string[];
  try {
    names = await readdir(dir);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }

  return names
    .filter((name) => name.endsWith('.json'))
    .map((name) => name.slice(0, -'.json'.length))
    .filter(isValidToolName)
    .sort();
}
