/**
 * Result types shared by every pipeline stage and CLI entry point.
 *
 * A result is produced at the end of one attempt or one full pipeline run and
 * consumed by the caller (the next stage, or the process exit boundary).
 */

/**
 * Codes classifying why an operation did not succeed.
 */
export type ErrorKind =
  | 'PathNotFound'
  | 'TimeoutExceeded'
  | 'VerificationFailed'
  | 'ExternalProcessError'
  | 'AllStrategiesExhausted';

/**
 * Flat, serializable outcome of an operation.
 *
 * Instances are frozen by the constructors in `lib/result.ts`.
 */
export interface OperationResult {
  /** Whether the goal state was observed */
  readonly success: boolean;
  /** Human-readable summary on success */
  readonly message?: string;
  /** Human-readable explanation on failure */
  readonly error?: string;
  /** Classification of the failure, if any */
  readonly error_kind?: ErrorKind;
  /** Ordered record of every failed attempt and verification */
  readonly diagnostics: readonly string[];
  /** Stage outputs (paths, versions) for the next stage */
  readonly details?: Readonly<Record<string, string>>;
}
