/**
 * Orchestrator Module
 *
 * Concurrent task execution with per-task failure isolation, cache guards,
 * and cancellation.
 */

export { TaskOrchestrator, type TaskOrchestratorOptions } from './task-orchestrator.js';
export { AuditRun } from './audit-run.js';
export type {
  AuditRunResult,
  CacheGuard,
  OrchestratorTask,
  RunOptions,
  TaskOutcome,
  TaskState,
  TerminalState,
  ToolStatus,
} from './types.js';
