/**
 * Centralized File Discovery
 *
 * Single module for file discovery and fingerprinting used by the
 * fingerprint index and the pattern cache.
 * - Uses fast-glob, with excluded directories applied as ignore globs so
 *   they are never descended into
 * - Dot-directories are skipped, dotfiles are not
 * - Paths are POSIX and relative to the project root, sorted
 *
 * @module discovery/file-walker
 */

import fg from 'fast-glob';
import * as path from 'node:path';
import * as fs from 'node:fs/promises';
import { constants as fsConstants, type Stats } from 'node:fs';
import { createHash } from 'node:crypto';
import { ProjectRootError } from '../utils/errors.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { runWithConcurrency } from '../utils/concurrency.js';

// ============================================================================
// Types
// ============================================================================

export interface FileWalkerOptions {
  /** Root directory to scan */
  rootDir: string;
  /** File extensions to include, with the leading dot */
  includeExtensions?: readonly string[];
  /** Directory names never descended into, at any depth */
  excludeDirs?: readonly string[];
  /** Additional root-relative ignore globs */
  ignore?: readonly string[];
  /** Follow symbolic links (default: false) */
  followSymlinks?: boolean;
}

export interface FileWalkerResult {
  /** Discovered paths, POSIX, relative to rootDir, sorted */
  files: string[];
  count: number;
  durationMs: number;
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_INCLUDE_EXTENSIONS = ['.py', '.ts', '.tsx', '.js', '.jsx', '.mjs', '.cjs'] as const;

export const DEFAULT_EXCLUDE_DIRS = [
  // Package managers and virtual environments
  'node_modules',
  '.venv',
  'venv',
  'env',
  'site-packages',
  '.eggs',
  'eggs',
  '.tox',

  // Build outputs
  'dist',
  'build',
  'coverage',
  'htmlcov',
  '.next',

  // Version control
  '.git',

  // IDE and editor
  '.idea',
  '.vscode',

  // Tool caches
  '__pycache__',
  '.pytest_cache',
  '.mypy_cache',
  '.ruff_cache',
] as const;

const HASH_CONCURRENCY = 32;

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Get POSIX path relative to root
 */
export function getRelativePath(filePath: string, rootDir: string): string {
  return path.relative(rootDir, filePath).split(path.sep).join('/');
}

/**
 * Normalize a path reported by a tool to a POSIX project-relative path.
 * Absolute paths under the root are relativized; others pass through.
 */
export function normalizeReportedPath(reported: string, rootDir: string): string {
  const unified = reported.replace(/\\/g, '/');
  if (path.isAbsolute(reported)) {
    const relative = getRelativePath(reported, rootDir);
    if (!relative.startsWith('..') && !path.isAbsolute(relative)) {
      return relative;
    }
    return unified;
  }
  return path.posix.normalize(unified).replace(/^\.\//, '');
}

function excludeGlobs(excludeDirs: readonly string[], ignore: readonly string[]): string[] {
  // `/**/*` needs a path segment below the dot-directory, so dotfiles survive
  return [...excludeDirs.map((dir) => `**/${dir}/**`), '**/.*/**/*', ...ignore];
}

/**
 * Ensure the project root is an existing, readable directory
 */
export async function assertProjectRoot(rootDir: string): Promise<void> {
  let stat: Stats;
  try {
    stat = await fs.stat(rootDir);
    await fs.access(rootDir, fsConstants.R_OK | fsConstants.X_OK);
  } catch (error) {
    throw new ProjectRootError(`Project root ${rootDir} is not accessible`, {
      projectRoot: rootDir,
      cause: error instanceof Error ? error : undefined,
    });
  }

  if (!stat.isDirectory()) {
    throw new ProjectRootError(`Project root ${rootDir} is not a directory`, { projectRoot: rootDir });
  }
}

// ============================================================================
// File Discovery
// ============================================================================

/**
 * Discover in-scope files under a directory
 */
export async function discoverFiles(options: FileWalkerOptions): Promise<FileWalkerResult> {
  const startTime = Date.now();

  const {
    rootDir,
    includeExtensions = DEFAULT_INCLUDE_EXTENSIONS,
    excludeDirs = DEFAULT_EXCLUDE_DIRS,
    ignore = [],
    followSymlinks = false,
  } = options;

  const files = await fg(
    includeExtensions.map((ext) => `**/*${ext}`),
    {
      cwd: rootDir,
      ignore: excludeGlobs(excludeDirs, ignore),
      followSymbolicLinks: followSymlinks,
      onlyFiles: true,
      dot: true,
      suppressErrors: true,
    }
  );

  // Sort for deterministic output
  files.sort();

  return {
    files,
    count: files.length,
    durationMs: Date.now() - startTime,
  };
}

/**
 * Resolve exact paths and globs under the root, honoring the same
 * exclusions as discovery
 */
export async function matchPatterns(
  rootDir: string,
  patterns: readonly string[],
  excludeDirs: readonly string[] = DEFAULT_EXCLUDE_DIRS,
  ignore: readonly string[] = []
): Promise<string[]> {
  if (patterns.length === 0) {
    return [];
  }

  const files = await fg([...patterns], {
    cwd: rootDir,
    ignore: excludeGlobs(excludeDirs, ignore),
    onlyFiles: true,
    dot: true,
    suppressErrors: true,
  });

  return [...new Set(files)].sort();
}

// ============================================================================
// Fingerprinting
// ============================================================================

/**
 * Content fingerprint: SHA-256, hex, first 16 chars
 */
export async function hashFile(filePath: string): Promise<string> {
  const content = await fs.readFile(filePath);
  return createHash('sha256').update(content).digest('hex').slice(0, 16);
}

/**
 * Fingerprint relative paths under rootDir. Unreadable files are skipped
 * with a warning.
 */
export async function fingerprintFiles(
  rootDir: string,
  relativePaths: readonly string[],
  logger: Logger = getLogger('file-walker')
): Promise<Map<string, string>> {
  const hashes = await runWithConcurrency(
    relativePaths,
    async (relativePath) => {
      try {
        return await hashFile(path.join(rootDir, relativePath));
      } catch (error) {
        logger.warn('Skipping unreadable file', {
          file: relativePath,
          reason: error instanceof Error ? error.message : String(error),
        });
        return null;
      }
    },
    HASH_CONCURRENCY
  );

  const result = new Map<string, string>();
  relativePaths.forEach((relativePath, index) => {
    const hash = hashes[index];
    if (hash) {
      result.set(relativePath, hash);
    }
  });
  return result;
}
