/**
 * Standardized error formatting for CLI commands
 *
 * Format:
 *   ✗ Main error message (1 line, concise)
 *
 *   → Next action 1
 *   → Next action 2
 */

import { ConversionError } from '@linger2ibex/core';

/**
 * Render an error block as printed to stderr.
 */
export function formatError(title: string, nextSteps?: string[]): string {
  const lines = [`✗ ${title}`];

  if (nextSteps && nextSteps.length > 0) {
    lines.push('');
    for (const step of nextSteps) {
      lines.push(`→ ${step}`);
    }
  }

  return lines.join('\n');
}

/**
 * Title and next steps for any thrown value.
 *
 * Conversion errors are prefixed with `file:line` (or `line N`) when known, and the
 * offending line and suggestion become next steps.
 */
export function describeError(err: unknown): { title: string; nextSteps: string[] } {
  if (!(err instanceof ConversionError)) {
    return { title: err instanceof Error ? err.message : String(err), nextSteps: [] };
  }

  const { filePath, lineNumber, line } = err.context;
  const location = filePath !== undefined
    ? [filePath, lineNumber].filter(part => part !== undefined).join(':')
    : lineNumber !== undefined ? `line ${lineNumber}` : '';
  const nextSteps: string[] = [];

  if (line !== undefined) {
    nextSteps.push(`Offending line: ${line}`);
  }
  if (err.suggestion) {
    nextSteps.push(err.suggestion);
  }

  return {
    title: location ? `${location}: ${err.message}` : err.message,
    nextSteps,
  };
}

/**
 * Print a standardized error message and exit.
 *
 * @example
 * exitWithError('Input file not found', [
 *   'Check the path passed to linger2ibex convert'
 * ]);
 */
export function exitWithError(title: string, nextSteps?: string[]): never {
  console.error(formatError(title, nextSteps));
  process.exit(1);
}
