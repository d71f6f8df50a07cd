// CLI error handling utilities

import { PreflightError, ValidationError, ManifestError, NotFoundError } from '../../core/errors.js';
import { getLogger } from '../../core/logger.js';

/**
 * Format an error for CLI output
 */
export function formatError(error: unknown): string {
  if (error instanceof ValidationError) {
    const field = error.field ? ` (field: ${error.field})` : '';
    return `Validation Error${field}: ${error.message}`;
  }

  if (error instanceof ManifestError) {
    const issues = error.issues.map(issue => `\n  - ${issue}`).join('');
    return `Manifest Error (${error.source}): ${error.message}${issues}`;
  }

  if (error instanceof NotFoundError) {
    return `Not Found: ${error.message}`;
  }

  if (error instanceof PreflightError) {
    return `Error [${error.code}]: ${error.message}`;
  }

  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }

  return `Unknown error: ${String(error)}`;
}

/**
 * Exit code for an error: the error's own, or 1
 */
export function exitCodeForError(error: unknown): number {
  return error instanceof PreflightError ? error.exitCode : 1;
}

/**
 * Handle CLI errors with proper exit codes.
 * Errors outside the Preflight hierarchy are unexpected and logged with their stack.
 */
export function handleError(error: unknown): never {
  if (error instanceof Error && !(error instanceof PreflightError)) {
    getLogger().exception(error);
  }
  console.error(`\n❌ ${formatError(error)}\n`);
  process.exit(exitCodeForError(error));
}
