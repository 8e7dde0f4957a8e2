/**
 * Fingerprint Index
 *
 * Tracks a content fingerprint for every in-scope file so the next audit can
 * tell which files were added, modified, or removed. The index is the only
 * writer of `<cacheDir>/index.json`.
 */

import { access, appendFile, readFile } from 'node:fs/promises';
import { join, relative, sep } from 'node:path';
import { getLogger, type Logger } from '../utils/logger.js';
import { isErrnoException, removeFile, readJsonFile, writeJsonAtomic } from '../utils/atomic-write.js';
import {
  assertProjectRoot,
  discoverFiles,
  fingerprintFiles,
  DEFAULT_EXCLUDE_DIRS,
  DEFAULT_INCLUDE_EXTENSIONS,
} from '../discovery/file-walker.js';
import { resolveCacheLayout, type CacheLayout } from './layout.js';
import { diffFingerprints } from './change-set.js';
import { CACHE_VERSION, indexArtifactSchema, type ChangeSet, type PersistedIndex } from './types.js';

export interface FingerprintIndexOptions {
  projectRoot: string;
  /** Cache directory relative to the project root (default: .audit) */
  cacheDir?: string;
  includeExtensions?: readonly string[];
  /** Directory names excluded on top of the defaults */
  extraExcludeDirs?: readonly string[];
  logger?: Logger;
  now?: () => Date;
}

export interface FingerprintIndexStats {
  trackedFiles: number;
  lastUpdated: string | null;
  indexPath: string;
  exists: boolean;
}

export class FingerprintIndex {
  readonly layout: CacheLayout;
  readonly excludeDirs: readonly string[];
  private includeExtensions: readonly string[];
  private cacheIgnore: string[];
  /** Cache directory relative to the root; empty when it lies outside */
  private cacheRel: string;
  private logger: Logger;
  private now: () => Date;

  constructor(options: FingerprintIndexOptions) {
    this.layout = resolveCacheLayout(options.projectRoot, options.cacheDir);
    this.includeExtensions = options.includeExtensions ?? DEFAULT_INCLUDE_EXTENSIONS;
    this.excludeDirs = [...DEFAULT_EXCLUDE_DIRS, ...(options.extraExcludeDirs ?? [])];
    this.logger = options.logger ?? getLogger('fingerprint-index');
    this.now = options.now ?? (() => new Date());

    // The cache directory never fingerprints itself
    const cacheRel = relative(this.layout.projectRoot, this.layout.cacheRoot).split(sep).join('/');
    this.cacheRel = cacheRel && !cacheRel.startsWith('..') ? cacheRel : '';
    this.cacheIgnore = this.cacheRel ? [`${this.cacheRel}/**`] : [];
  }

  /**
   * Root-relative globs to ignore besides the excluded directories
   */
  get ignoreGlobs(): readonly string[] {
    return this.cacheIgnore;
  }

  /**
   * Fingerprint every in-scope file under the project root
   */
  async scan(): Promise<Map<string, string>> {
    await assertProjectRoot(this.layout.projectRoot);

    const discovered = await discoverFiles({
      rootDir: this.layout.projectRoot,
      includeExtensions: this.includeExtensions,
      excludeDirs: this.excludeDirs,
      ignore: this.cacheIgnore,
    });

    const fingerprints = await fingerprintFiles(this.layout.projectRoot, discovered.files, this.logger);

    this.logger.debug('Scanned project', {
      files: fingerprints.size,
      skipped: discovered.count - fingerprints.size,
      durationMs: discovered.durationMs,
    });

    return fingerprints;
  }

  /**
   * Load the persisted index; missing or corrupt yields null
   */
  async load(): Promise<PersistedIndex | null> {
    const result = await readJsonFile(this.layout.indexPath, indexArtifactSchema);
    if (result.ok) {
      return result.value;
    }

    if (result.reason === 'corrupt') {
      this.logger.warn('Ignoring corrupt fingerprint index', {
        path: this.layout.indexPath,
        detail: result.detail,
      });
    }
    return null;
  }

  diff(current: ReadonlyMap<string, string>, previous: PersistedIndex | null): ChangeSet {
    return diffFingerprints(current, previous ? FingerprintIndex.toFingerprintMap(previous) : null);
  }

  /**
   * Persist the given fingerprints as the new index, atomically. The first
   * commit also adds the cache directory to an existing .gitignore.
   */
  async commit(current: ReadonlyMap<string, string>): Promise<PersistedIndex> {
    const firstCommit = !(await this.exists());
    const lastUpdated = this.now().toISOString();
    const files: PersistedIndex['files'] = {};
    for (const file of [...current.keys()].sort()) {
      const fingerprint = current.get(file);
      if (fingerprint !== undefined) {
        files[file] = { fingerprint, lastSeen: lastUpdated };
      }
    }

    const index: PersistedIndex = {
      version: CACHE_VERSION,
      projectRoot: this.layout.projectRoot,
      lastUpdated,
      totalFiles: current.size,
      files,
    };

    await writeJsonAtomic(this.layout.indexPath, index);
    this.logger.debug('Committed fingerprint index', { files: current.size });

    if (firstCommit) {
      await this.ensureGitignored();
    }
    return index;
  }

  /**
   * Append `<cacheDir>/` to the project's .gitignore when it exists and does
   * not list the directory yet. Never creates the file; failures only warn.
   */
  async ensureGitignored(): Promise<boolean> {
    if (!this.cacheRel) {
      return false;
    }

    const gitignorePath = join(this.layout.projectRoot, '.gitignore');
    const entry = `${this.cacheRel}/`;

    try {
      const content = await readFile(gitignorePath, 'utf-8');
      const listed = content
        .split(/\r?\n/)
        .map((line) => line.trim().replace(/^\//, '').replace(/\/$/, ''))
        .includes(this.cacheRel);
      if (listed) {
        return false;
      }

      const separator = content.length > 0 && !content.endsWith('\n') ? '\n' : '';
      await appendFile(gitignorePath, `${separator}${entry}\n`);
      this.logger.info('Added cache directory to .gitignore', { entry });
      return true;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return false;
      }
      this.logger.warn('Could not update .gitignore', {
        path: gitignorePath,
        reason: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  async exists(): Promise<boolean> {
    try {
      await access(this.layout.indexPath);
      return true;
    } catch {
      return false;
    }
  }

  async clear(): Promise<boolean> {
    const removed = await removeFile(this.layout.indexPath);
    if (removed) {
      this.logger.info('Fingerprint index cleared');
    }
    return removed;
  }

  async stats(): Promise<FingerprintIndexStats> {
    const index = await this.load();
    return {
      trackedFiles: index?.totalFiles ?? 0,
      lastUpdated: index?.lastUpdated ?? null,
      indexPath: this.layout.indexPath,
      exists: index !== null,
    };
  }

  static toFingerprintMap(index: PersistedIndex): Map<string, string> {
    return new Map(Object.entries(index.files).map(([file, record]) => [file, record.fingerprint]));
  }
}
