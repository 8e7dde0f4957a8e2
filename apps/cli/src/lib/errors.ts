/**
 * Error rendering for the command line
 */

import { isAuditError } from '@auditor/core';
import type { Theme } from '../ui/theme.js';

/**
 * Lines describing a failure: the message, then the recovery hint when
 * the error carries one
 */
export function formatCliError(error: unknown, theme: Theme): string[] {
  if (isAuditError(error)) {
    const lines = [`${theme.error('Error')} [${error.code}] ${error.message}`];
    if (error.recoveryHint) {
      lines.push(`  ${theme.muted('Hint:')} ${error.recoveryHint}`);
    }
    return lines;
  }

  const message = error instanceof Error ? error.message : String(error);
  return [`${theme.error('Error')} ${message}`];
}
