/**
 * Custom Error Classes
 *
 * Structured error handling with error codes, context, and recovery hints.
 * Catastrophic errors (root, lock, state machine) propagate to the caller;
 * tool errors are captured as failure records by the orchestrator.
 */

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'CONFIG_INVALID'
  | 'TIMEOUT'
  | 'OPERATION_CANCELLED'
  | 'PROJECT_ROOT_INVALID'
  | 'LOCK_TIMEOUT'
  | 'INVALID_STATE_TRANSITION'
  | 'TOOL_FAILED'
  | 'DEPENDENCY_MISSING'
  | 'INTERNAL_ERROR';

export interface ErrorContext {
  code: ErrorCode;
  component: string;
  operation: string;
  details?: Record<string, unknown>;
  recoveryHint?: string;
  retryable?: boolean;
}

/**
 * Serializable description of a failed tool, as reported in audit results
 */
export interface FailureRecord {
  name: string;
  message: string;
  code: ErrorCode;
}

/**
 * Base error class for all audit errors
 */
export class AuditError extends Error {
  public readonly code: ErrorCode;
  public readonly component: string;
  public readonly operation: string;
  public readonly details: Record<string, unknown>;
  public readonly recoveryHint?: string;
  public readonly retryable: boolean;
  public readonly timestamp: Date;
  public readonly cause?: Error;

  constructor(message: string, context: ErrorContext, cause?: Error) {
    super(message);
    this.name = 'AuditError';
    this.code = context.code;
    this.component = context.component;
    this.operation = context.operation;
    this.details = context.details ?? {};
    this.recoveryHint = context.recoveryHint;
    this.retryable = context.retryable ?? false;
    this.timestamp = new Date();
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AuditError);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      component: this.component,
      operation: this.operation,
      details: this.details,
      recoveryHint: this.recoveryHint,
      retryable: this.retryable,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: this.cause?.message,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.component}.${this.operation}: ${this.message}`;
  }
}

/**
 * Validation error for invalid inputs
 */
export class ValidationError extends AuditError {
  public readonly field?: string;
  public readonly value?: unknown;
  public readonly constraints?: string[];

  constructor(
    message: string,
    options: {
      component: string;
      operation: string;
      field?: string;
      value?: unknown;
      constraints?: string[];
      recoveryHint?: string;
    }
  ) {
    super(message, {
      code: 'VALIDATION_ERROR',
      component: options.component,
      operation: options.operation,
      details: { field: options.field, constraints: options.constraints },
      recoveryHint: options.recoveryHint ?? `Check the ${options.field ?? 'input'} value`,
      retryable: false,
    });
    this.name = 'ValidationError';
    this.field = options.field;
    this.value = options.value;
    this.constraints = options.constraints;
  }
}

/**
 * Configuration error, including unknown tools and duplicate registrations
 */
export class ConfigError extends AuditError {
  public readonly configKey?: string;

  constructor(
    message: string,
    options: {
      component: string;
      operation?: string;
      configKey?: string;
      recoveryHint?: string;
    }
  ) {
    super(message, {
      code: 'CONFIG_INVALID',
      component: options.component,
      operation: options.operation ?? 'configure',
      details: { configKey: options.configKey },
      recoveryHint: options.recoveryHint ?? 'Check configuration values',
      retryable: false,
    });
    this.name = 'ConfigError';
    this.configKey = options.configKey;
  }
}

/**
 * Timeout error
 */
export class TimeoutError extends AuditError {
  public readonly timeoutMs: number;
  public readonly elapsed: number;

  constructor(
    message: string,
    options: {
      component: string;
      operation: string;
      timeoutMs: number;
      elapsed: number;
    }
  ) {
    super(message, {
      code: 'TIMEOUT',
      component: options.component,
      operation: options.operation,
      details: { timeoutMs: options.timeoutMs, elapsed: options.elapsed },
      recoveryHint: 'Consider increasing the timeout or narrowing the scanned files',
      retryable: true,
    });
    this.name = 'TimeoutError';
    this.timeoutMs = options.timeoutMs;
    this.elapsed = options.elapsed;
  }
}

/**
 * Raised when work is abandoned because its signal was aborted
 */
export class OperationCancelledError extends AuditError {
  constructor(
    message: string,
    options: {
      component: string;
      operation: string;
      reason?: string;
    }
  ) {
    super(message, {
      code: 'OPERATION_CANCELLED',
      component: options.component,
      operation: options.operation,
      details: { reason: options.reason },
      retryable: true,
    });
    this.name = 'OperationCancelledError';
  }
}

export class ProjectRootError extends AuditError {
  public readonly projectRoot: string;

  constructor(message: string, options: { projectRoot: string; cause?: Error }) {
    super(
      message,
      {
        code: 'PROJECT_ROOT_INVALID',
        component: 'FingerprintIndex',
        operation: 'scan',
        details: { projectRoot: options.projectRoot },
        recoveryHint: 'Point the audit at an existing, readable directory',
        retryable: false,
      },
      options.cause
    );
    this.name = 'ProjectRootError';
    this.projectRoot = options.projectRoot;
  }
}

export class LockTimeoutError extends AuditError {
  public readonly lockKey: string;
  public readonly waitedMs: number;

  constructor(message: string, options: { lockKey: string; waitedMs: number }) {
    super(message, {
      code: 'LOCK_TIMEOUT',
      component: 'ProjectLock',
      operation: 'acquire',
      details: { lockKey: options.lockKey, waitedMs: options.waitedMs },
      recoveryHint: 'Another audit of this project is still running; retry once it finishes',
      retryable: true,
    });
    this.name = 'LockTimeoutError';
    this.lockKey = options.lockKey;
    this.waitedMs = options.waitedMs;
  }
}

/**
 * Illegal task state transition. Indicates a programming error.
 */
export class StateTransitionError extends AuditError {
  public readonly from: string;
  public readonly to: string;

  constructor(options: { task: string; from: string; to: string }) {
    super(`Task "${options.task}" cannot move from ${options.from} to ${options.to}`, {
      code: 'INVALID_STATE_TRANSITION',
      component: 'AuditRun',
      operation: 'transition',
      details: { ...options },
      retryable: false,
    });
    this.name = 'StateTransitionError';
    this.from = options.from;
    this.to = options.to;
  }
}

/**
 * Analysis procedure failure (non-zero exit, unparsable output, thrown error)
 */
export class ToolExecutionError extends AuditError {
  public readonly tool: string;
  public readonly exitCode?: number;

  constructor(
    message: string,
    options: {
      tool: string;
      operation?: string;
      exitCode?: number;
      stderr?: string;
      cause?: Error;
    }
  ) {
    super(
      message,
      {
        code: 'TOOL_FAILED',
        component: 'Tool',
        operation: options.operation ?? 'analyze',
        details: { tool: options.tool, exitCode: options.exitCode, stderr: options.stderr },
        retryable: false,
      },
      options.cause
    );
    this.name = 'ToolExecutionError';
    this.tool = options.tool;
    this.exitCode = options.exitCode;
  }
}

export class DependencyMissingError extends AuditError {
  public readonly dependency: string;

  constructor(message: string, options: { dependency: string; cause?: Error }) {
    super(
      message,
      {
        code: 'DEPENDENCY_MISSING',
        component: 'ProcessRunner',
        operation: 'spawn',
        details: { dependency: options.dependency },
        recoveryHint: `Install ${options.dependency} and make sure it is on PATH`,
        retryable: false,
      },
      options.cause
    );
    this.name = 'DependencyMissingError';
    this.dependency = options.dependency;
  }
}

/**
 * Check if an error is an AuditError
 */
export function isAuditError(error: unknown): error is AuditError {
  return error instanceof AuditError;
}

/**
 * Wrap unknown errors in an AuditError
 */
export function wrapError(
  error: unknown,
  context: { component: string; operation: string; code?: ErrorCode }
): AuditError {
  if (isAuditError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new AuditError(
    message,
    {
      code: context.code ?? 'INTERNAL_ERROR',
      component: context.component,
      operation: context.operation,
      retryable: false,
    },
    cause
  );
}

/**
 * Assert a condition and throw if false
 */
export function assertCondition(
  condition: boolean,
  message: string,
  context: { component: string; operation: string; code?: ErrorCode }
): asserts condition {
  if (!condition) {
    throw new AuditError(message, {
      code: context.code ?? 'VALIDATION_ERROR',
      component: context.component,
      operation: context.operation,
    });
  }
}

/**
 * Reduce any thrown value to the record reported for a failed tool
 */
export function toFailureRecord(name: string, error: unknown): FailureRecord {
  if (isAuditError(error)) {
    return { name, message: error.message, code: error.code };
  }
  return {
    name,
    message: error instanceof Error ? error.message : String(error),
    code: 'TOOL_FAILED',
  };
}

/**
 * Normalize a thrown value into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
