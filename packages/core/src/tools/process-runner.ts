/**
 * Process Runner
 *
 * Runs an external analyzer without a shell and collects its output.
 * Abort and timeout both terminate the child with SIGTERM.
 */

import { spawn } from 'node:child_process';
import {
  DependencyMissingError,
  OperationCancelledError,
  TimeoutError,
  ToolExecutionError,
} from '../utils/errors.js';
import { abortReason } from '../utils/timeout.js';
import { isErrnoException } from '../utils/atomic-write.js';

export const DEFAULT_PROCESS_TIMEOUT_MS = 300_000; // 5 minutes

export interface RunProcessOptions {
  cwd: string;
  signal?: AbortSignal;
  /** Default: DEFAULT_PROCESS_TIMEOUT_MS */
  timeoutMs?: number;
  /** Merged over process.env */
  env?: Record<string, string>;
}

export interface ProcessResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
}

export async function runProcess(
  command: string,
  args: readonly string[],
  options: RunProcessOptions
): Promise<ProcessResult> {
  const { cwd, signal, timeoutMs = DEFAULT_PROCESS_TIMEOUT_MS, env } = options;
  const operation = `${command} ${args.join(' ')}`.trim();

  if (signal?.aborted) {
    throw new OperationCancelledError(`Process "${command}" cancelled before start`, {
      component: 'ProcessRunner',
      operation,
      reason: abortReason(signal),
    });
  }

  const start = Date.now();

  return new Promise<ProcessResult>((resolve, reject) => {
    const child = spawn(command, [...args], {
      cwd,
      env: env ? { ...process.env, ...env } : process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    let settled = false;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const finish = (outcome: { ok: true; result: ProcessResult } | { ok: false; error: Error }) => {
      if (settled) {
        return;
      }
      settled = true;
      if (timer) {
        clearTimeout(timer);
      }
      signal?.removeEventListener('abort', onAbort);
      if (outcome.ok) {
        resolve(outcome.result);
      } else {
        reject(outcome.error);
      }
    };

    const onAbort = () => {
      child.kill('SIGTERM');
      finish({
        ok: false,
        error: new OperationCancelledError(`Process "${command}" was cancelled`, {
          component: 'ProcessRunner',
          operation,
          reason: signal ? abortReason(signal) : undefined,
        }),
      });
    };

    signal?.addEventListener('abort', onAbort, { once: true });

    timer = setTimeout(() => {
      child.kill('SIGTERM');
      finish({
        ok: false,
        error: new TimeoutError(`Process "${command}" timed out after ${timeoutMs}ms`, {
          component: 'ProcessRunner',
          operation,
          timeoutMs,
          elapsed: Date.now() - start,
        }),
      });
    }, timeoutMs);

    child.stdout.setEncoding('utf-8');
    child.stderr.setEncoding('utf-8');
    child.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });

    child.on('error', (error) => {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        finish({
          ok: false,
          error: new DependencyMissingError(`Command not found: ${command}`, { dependency: command, cause: error }),
        });
        return;
      }
      finish({
        ok: false,
        error: new ToolExecutionError(`Failed to run ${command}: ${error.message}`, {
          tool: command,
          operation: 'spawn',
          cause: error,
        }),
      });
    });

    child.on('close', (code, killSignal) => {
      if (code === null) {
        finish({
          ok: false,
          error: new ToolExecutionError(`Process "${command}" was terminated by ${killSignal ?? 'a signal'}`, {
            tool: command,
            stderr,
          }),
        });
        return;
      }
      finish({ ok: true, result: { exitCode: code, stdout, stderr, durationMs: Date.now() - start } });
    });
  });
}
