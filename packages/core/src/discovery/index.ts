/**
 * Discovery Module
 *
 * File discovery and content fingerprints for the audit cache.
 *
 * @module discovery
 */

export {
  discoverFiles,
  matchPatterns,
  hashFile,
  fingerprintFiles,
  assertProjectRoot,
  getRelativePath,
  normalizeReportedPath,
  DEFAULT_EXCLUDE_DIRS,
  DEFAULT_INCLUDE_EXTENSIONS,
} from './file-walker.js';

export type { FileWalkerOptions, FileWalkerResult } from './file-walker.js';
