/**
 * Theme: color roles and formatting helpers for command output
 */

import { Chalk, type ChalkInstance } from 'chalk';

export interface Theme {
  heading: ChalkInstance;
  label: ChalkInstance;
  value: ChalkInstance;
  success: ChalkInstance;
  warning: ChalkInstance;
  error: ChalkInstance;
  muted: ChalkInstance;
  path: ChalkInstance;
}

/**
 * Build a theme; with colors off every role returns its input unchanged
 */
export function createTheme(useColors: boolean): Theme {
  const chalk = new Chalk(useColors ? {} : { level: 0 });
  return {
    heading: chalk.bold,
    label: chalk.dim,
    value: chalk.white,
    success: chalk.green,
    warning: chalk.yellow,
    error: chalk.red,
    muted: chalk.dim,
    path: chalk.underline,
  };
}

/**
 * Colors are on unless NO_COLOR is set
 */
export function shouldUseColors(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.NO_COLOR === undefined;
}

export function formatDuration(ms: number): string {
  if (ms < 0) return '0ms';

  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }

  if (ms < 60000) {
    const seconds = ms / 1000;
    return `${seconds.toFixed(1)}s`;
  }

  if (ms < 3_600_000) {
    const minutes = Math.floor(ms / 60000);
    const seconds = Math.round((ms % 60000) / 1000);
    return `${minutes}m ${seconds}s`;
  }

  const hours = Math.floor(ms / 3_600_000);
  const minutes = Math.round((ms % 3_600_000) / 60000);
  return `${hours}h ${minutes}m`;
}

/**
 * Format a count with proper pluralization
 */
export function formatCount(count: number, singular: string, plural?: string): string {
  const word = count === 1 ? singular : (plural ?? `${singular}s`);
  return `${count} ${word}`;
}

export function padEnd(text: string, width: number): string {
  return text.length >= width ? text : text + ' '.repeat(width - text.length);
}
