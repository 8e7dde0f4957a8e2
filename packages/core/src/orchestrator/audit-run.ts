/**
 * Audit Run
 *
 * Per-run task state machine:
 *
 *   pending → running → succeeded | failed | cancelled
 *   pending → skipped | cancelled
 *
 * Any other transition throws StateTransitionError.
 */

import { randomUUID } from 'node:crypto';
import { StateTransitionError, type FailureRecord } from '../utils/errors.js';
import { getLogger, type Logger } from '../utils/logger.js';
import type { TaskState, ToolStatus } from './types.js';

const TRANSITIONS: Record<TaskState, readonly TaskState[]> = {
  pending: ['running', 'skipped', 'cancelled'],
  running: ['succeeded', 'failed', 'cancelled'],
  succeeded: [],
  failed: [],
  cancelled: [],
  skipped: [],
};

interface TaskRecord {
  state: TaskState;
  cached: boolean;
  startedAt?: number;
  finishedAt?: number;
  error?: FailureRecord;
}

export class AuditRun {
  readonly id: string;
  private tasks = new Map<string, TaskRecord>();
  private logger: Logger;

  constructor(toolNames: readonly string[], options: { id?: string; logger?: Logger } = {}) {
    this.id = options.id ?? randomUUID();
    this.logger = options.logger ?? getLogger('audit-run');
    for (const name of toolNames) {
      this.tasks.set(name, { state: 'pending', cached: false });
    }
  }

  get toolNames(): string[] {
    return [...this.tasks.keys()];
  }

  state(name: string): TaskState {
    return this.record(name).state;
  }

  isTerminal(name: string): boolean {
    return TRANSITIONS[this.state(name)].length === 0;
  }

  transition(name: string, to: TaskState, extra: { cached?: boolean; error?: FailureRecord } = {}): void {
    const task = this.record(name);
    const from = task.state;

    if (!TRANSITIONS[from].includes(to)) {
      throw new StateTransitionError({ task: name, from, to });
    }

    const now = Date.now();
    task.state = to;
    if (to === 'running') {
      task.startedAt = now;
    } else {
      task.finishedAt = now;
    }
    if (extra.cached !== undefined) {
      task.cached = extra.cached;
    }
    if (extra.error) {
      task.error = extra.error;
    }

    this.logger.debug('Task transition', { runId: this.id, task: name, from, to });
  }

  status(name: string): ToolStatus {
    const task = this.record(name);
    const durationMs =
      task.startedAt !== undefined && task.finishedAt !== undefined ? task.finishedAt - task.startedAt : 0;

    return {
      state: task.state,
      durationMs,
      cached: task.cached,
      startedAt: task.startedAt !== undefined ? new Date(task.startedAt).toISOString() : undefined,
      finishedAt: task.finishedAt !== undefined ? new Date(task.finishedAt).toISOString() : undefined,
      error: task.error,
    };
  }

  snapshot(): Record<string, ToolStatus> {
    const statuses: Record<string, ToolStatus> = {};
    for (const name of this.tasks.keys()) {
      statuses[name] = this.status(name);
    }
    return statuses;
  }

  private record(name: string): TaskRecord {
    const task = this.tasks.get(name);
    if (!task) {
      throw new StateTransitionError({ task: name, from: 'unregistered', to: 'any' });
    }
    return task;
  }
}
