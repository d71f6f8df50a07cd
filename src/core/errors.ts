// Domain-specific error types for Preflight

/**
 * Base error class for all checker errors
 */
export abstract class PreflightError extends Error {
  abstract readonly code: string;
  abstract readonly exitCode: number;

  constructor(message: string, public readonly context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context
    };
  }
}

/**
 * Validation errors for invalid input (CLI options, manifest fields)
 */
export class ValidationError extends PreflightError {
  readonly code = 'VALIDATION_ERROR';
  readonly exitCode = 2;

  constructor(message: string, public readonly field?: string, context?: Record<string, unknown>) {
    super(message, { ...context, field });
  }
}

/**
 * Manifest could not be read or parsed
 */
export class ManifestError extends PreflightError {
  readonly code = 'MANIFEST_ERROR';
  readonly exitCode = 2;

  constructor(message: string, public readonly source: string, public readonly issues: string[] = []) {
    super(message, { source, issues });
  }
}

/**
 * Not found errors
 */
export class NotFoundError extends PreflightError {
  readonly code = 'NOT_FOUND';
  readonly exitCode = 4;

  constructor(resourceType: string, id: string) {
    super(`${resourceType} not found: ${id}`, { resourceType, id });
  }
}

/**
 * A component validator was driven through a transition its state machine forbids
 */
export class StateTransitionError extends PreflightError {
  readonly code = 'STATE_TRANSITION_ERROR';
  readonly exitCode = 70;

  constructor(public readonly from: string, public readonly to: string) {
    super(`Illegal component state transition: ${from} -> ${to}`, { from, to });
  }
}
