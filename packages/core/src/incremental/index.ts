/**
 * Incremental Module
 *
 * Tool registry, reducer strategies, and the coordinator that runs audits
 * over only what changed.
 */

export {
  IncrementalCoordinator,
  DEFAULT_LOCK_TIMEOUT_MS,
  DEFAULT_TOOL_TIMEOUT_MS,
  type AuditMode,
  type AuditOptions,
  type AuditResult,
  type CoordinatorStats,
  type IncrementalCoordinatorOptions,
  type ToolCacheStats,
  type ToolResult,
} from './incremental-coordinator.js';
export { createAuditCoordinator, type CreateCoordinatorOptions } from './create-coordinator.js';
export {
  ToolRegistry,
  type AnalysisContext,
  type AnalyzeFn,
  type FileDecomposableTool,
  type ToolDefinition,
  type WholeProjectTool,
} from './tool-registry.js';
export {
  categorizedStrategy,
  findingListStrategy,
  flattenFindings,
  isJsonObject,
  DEFAULT_STRATEGIES,
  LINT_CATEGORIES,
  type CategorizedOptions,
  type FindingListOptions,
} from './reducers.js';
