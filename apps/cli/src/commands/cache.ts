/**
 * Cache commands - inspect and clear the audit cache
 *
 * @module commands/cache
 *
 * @example
 * ```bash
 * auditor cache stats --root ./my-project
 * auditor cache stats --json
 * auditor cache clear ruff
 * auditor cache clear
 * ```
 */

import { resolve } from 'node:path';
import { createAuditCoordinator, type CoordinatorStats, type IncrementalCoordinator } from '@auditor/core';
import { createTheme, formatCount, formatDuration, padEnd, type Theme } from '../ui/theme.js';

export interface CommandIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

export interface CacheCommandOptions {
  /** Project root (default: the working directory) */
  root?: string;
  cacheDir?: string;
  json?: boolean;
  color?: boolean;
}

export interface CacheCommandDeps {
  io: CommandIO;
  createCoordinator?: (projectRoot: string, overrides: Record<string, string | undefined>) => IncrementalCoordinator;
}

const defaultCreateCoordinator = (projectRoot: string, overrides: Record<string, string | undefined>) =>
  createAuditCoordinator(projectRoot, { overrides });

function coordinatorFor(options: CacheCommandOptions, deps: CacheCommandDeps): IncrementalCoordinator {
  const projectRoot = resolve(options.root ?? process.cwd());
  const create = deps.createCoordinator ?? defaultCreateCoordinator;
  return create(projectRoot, { AUDIT_CACHE_DIR: options.cacheDir });
}

export function renderStats(stats: CoordinatorStats, theme: Theme): string[] {
  const lines = [
    `${theme.heading('Audit cache')} ${theme.path(stats.cacheRoot)}`,
    `  ${theme.label(padEnd('Tracked files', 14))}${stats.trackedFiles}`,
    `  ${theme.label(padEnd('Last updated', 14))}${stats.lastUpdated ?? theme.muted('never')}`,
    '',
  ];

  if (stats.tools.length === 0) {
    lines.push(theme.muted('No cached tool results'));
    return lines;
  }

  const width = Math.max(...stats.tools.map((entry) => entry.tool.length)) + 2;
  for (const entry of stats.tools) {
    const state = entry.valid ? theme.success('valid') : theme.warning('expired');
    lines.push(
      `  ${padEnd(entry.tool, width)}${padEnd(entry.store, 9)}${padEnd(formatCount(entry.filesCached, 'file'), 10)}` +
        `${padEnd(formatDuration(entry.ageMs), 10)}${state}`
    );
  }
  return lines;
}

export async function cacheStatsCommand(options: CacheCommandOptions, deps: CacheCommandDeps): Promise<void> {
  const stats = await coordinatorFor(options, deps).stats();

  if (options.json) {
    deps.io.out(JSON.stringify(stats, null, 2));
    return;
  }

  for (const line of renderStats(stats, createTheme(options.color ?? false))) {
    deps.io.out(line);
  }
}

export async function cacheClearCommand(
  tool: string | undefined,
  options: CacheCommandOptions,
  deps: CacheCommandDeps
): Promise<number> {
  const removed = await coordinatorFor(options, deps).clearCache(tool);
  const theme = createTheme(options.color ?? false);

  const target = tool === undefined ? '' : ` for ${tool}`;
  deps.io.out(theme.success(`Removed ${formatCount(removed, 'cache file')}${target}`));
  return removed;
}
