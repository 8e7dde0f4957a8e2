/**
 * @auditor/core - Incremental caching and concurrent orchestration for
 * source-tree audits
 *
 * - Fingerprint index: which files changed since the last audit
 * - Result store: per-file findings merged into stored aggregates
 * - Pattern cache: whole-project payloads keyed by their dependencies
 * - Task orchestrator: concurrent, failure-isolated, cancellable tool runs
 */

export * from './utils/index.js';
export * from './discovery/index.js';
export * from './cache/index.js';
export * from './orchestrator/index.js';
export * from './incremental/index.js';
export * from './tools/index.js';
