/**
 * Error taxonomy for stage failures.
 *
 * Each error carries a `kind` matching `ErrorKind`, so the stage boundary can
 * convert it into an `OperationResult` without inspecting messages.
 */

import type { ErrorKind } from '../types/result.js';

/**
 * Base class for classified stage errors.
 */
export abstract class StageError extends Error {
  abstract readonly kind: ErrorKind;
}

/**
 * A required input or expected output is missing.
 */
export class PathNotFoundError extends StageError {
  readonly kind = 'PathNotFound' as const;

  constructor(
    message: string,
    public readonly path: string
  ) {
    super(message);
    this.name = 'PathNotFoundError';
  }
}

/**
 * An external operation did not complete within its budget.
 */
export class TimeoutExceededError extends StageError {
  readonly kind = 'TimeoutExceeded' as const;

  constructor(
    message: string,
    public readonly timeoutMs: number
  ) {
    super(message);
    this.name = 'TimeoutExceededError';
  }
}

/**
 * Observable state never matched expectations.
 */
export class VerificationFailedError extends StageError {
  readonly kind = 'VerificationFailed' as const;

  constructor(message: string) {
    super(message);
    this.name = 'VerificationFailedError';
  }
}

/**
 * A spawned tool exited non-zero or could not be started.
 */
export class ExternalProcessError extends StageError {
  readonly kind = 'ExternalProcessError' as const;

  constructor(
    message: string,
    public readonly command: string,
    public readonly exitCode: number | null,
    public readonly stderr = ''
  ) {
    super(message);
    this.name = 'ExternalProcessError';
  }
}

/**
 * Renders any thrown value as a message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
