/**
 * Pipeline building blocks: strategies and verification probes.
 */

/**
 * Outcome of one verification check.
 */
export type ProbeVerdict = { ok: true } | { ok: false; reason: string };

/**
 * One concrete method of reaching a goal state.
 *
 * The action may return captured output; it is kept only when the attempt is
 * not verified. The signal is aborted when `timeout_ms` elapses, and the
 * pipeline waits for the action to settle before moving on, so an action
 * must stop its work once the signal fires.
 */
export interface Strategy {
  name: string;
  action: (signal: AbortSignal) => Promise<string | void>;
  timeout_ms: number;
}

/**
 * Independent check confirming a goal state was reached.
 */
export interface VerificationProbe {
  name: string;
  check: () => Promise<ProbeVerdict>;
  /** Extra checks after the first failed one */
  retries: number;
  interval_ms: number;
}
