/**
 * Constructors for frozen OperationResult records.
 */

import type { ErrorKind, OperationResult } from '../types/result.js';
import { StageError, errorMessage } from './errors.js';

export interface ResultExtras {
  diagnostics?: readonly string[];
  details?: Record<string, string>;
}

function freeze(result: OperationResult): OperationResult {
  Object.freeze(result.diagnostics);
  if (result.details) Object.freeze(result.details);
  return Object.freeze(result);
}

export function succeed(message: string, extras: ResultExtras = {}): OperationResult {
  return freeze({
    success: true,
    message,
    diagnostics: [...(extras.diagnostics ?? [])],
    ...(extras.details ? { details: { ...extras.details } } : {}),
  });
}

export function fail(error: string, kind: ErrorKind, extras: ResultExtras = {}): OperationResult {
  return freeze({
    success: false,
    error,
    error_kind: kind,
    diagnostics: [...(extras.diagnostics ?? [])],
    ...(extras.details ? { details: { ...extras.details } } : {}),
  });
}

/**
 * Converts a thrown value into a failed result. Unclassified errors are
 * reported as external process errors, since every stage side effect is a
 * spawned tool or filesystem call.
 */
export function failFromError(error: unknown, prefix: string, extras: ResultExtras = {}): OperationResult {
  const kind: ErrorKind = error instanceof StageError ? error.kind : 'ExternalProcessError';
  return fail(`${prefix}: ${errorMessage(error)}`, kind, extras);
}
