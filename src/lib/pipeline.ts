/**
 * Verified multi-strategy operation pipeline.
 *
 * Tries each strategy in order and, after every attempt, confirms the goal
 * state through an independent probe. The first verified attempt wins; later
 * strategies never run. A strategy's own success report is never trusted.
 */

import { setTimeout as delay } from 'node:timers/promises';
import type { OperationResult } from '../types/result.js';
import type { ProbeVerdict, Strategy, VerificationProbe } from '../types/pipeline.js';
import { StageError, errorMessage } from './errors.js';
import type { Logger } from './log.js';
import { fail, succeed } from './result.js';

/** Longest stretch of captured output kept per diagnostic. */
const MAX_OUTPUT_CHARS = 1000;

export interface PipelineDeps {
  logger: Logger;
  sleep: Sleep;
}

/** Waits `ms`; rejects with an `AbortError` once `signal` aborts. */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return delay(ms, undefined, { signal });
}

type AttemptOutcome =
  | { kind: 'returned'; output: string }
  | { kind: 'threw'; error: unknown }
  | { kind: 'timed_out'; timeoutMs: number };

/**
 * Runs a strategy action under its timeout. A timeout aborts the action's
 * signal, then waits for the action to settle so that its cleanup finishes
 * before the next strategy starts. Whatever it returns after the abort is
 * reported as the timeout.
 */
export async function runAction(strategy: Strategy): Promise<AttemptOutcome> {
  const controller = new AbortController();
  let timedOut = false;
  const timer =
    strategy.timeout_ms > 0
      ? setTimeout(() => {
          timedOut = true;
          controller.abort();
        }, strategy.timeout_ms)
      : null;

  let outcome: AttemptOutcome;
  try {
    const output = await strategy.action(controller.signal);
    outcome = { kind: 'returned', output: typeof output === 'string' ? output : '' };
  } catch (error) {
    outcome = { kind: 'threw', error };
  } finally {
    if (timer) clearTimeout(timer);
  }

  return timedOut ? { kind: 'timed_out', timeoutMs: strategy.timeout_ms } : outcome;
}

async function checkOnce(probe: VerificationProbe): Promise<ProbeVerdict> {
  try {
    return await probe.check();
  } catch (error) {
    return { ok: false, reason: `probe threw: ${errorMessage(error)}` };
  }
}

/**
 * Checks a probe, retrying a failed check `probe.retries` more times.
 */
export async function awaitVerdict(
  probe: VerificationProbe,
  sleep: Sleep
): Promise<ProbeVerdict> {
  let verdict = await checkOnce(probe);
  for (let retry = 0; retry < probe.retries && !verdict.ok; retry++) {
    await sleep(probe.interval_ms);
    verdict = await checkOnce(probe);
  }
  return verdict;
}

function describeOutcome(outcome: AttemptOutcome): string {
  switch (outcome.kind) {
    case 'returned': {
      const output = outcome.output.trim();
      if (output.length === 0) return 'completed';
      return output.length > MAX_OUTPUT_CHARS ? `...${output.slice(-MAX_OUTPUT_CHARS)}` : output;
    }
    case 'timed_out':
      return `TimeoutExceeded after ${outcome.timeoutMs}ms`;
    case 'threw': {
      const kind = outcome.error instanceof StageError ? outcome.error.kind : 'Error';
      return `${kind}: ${errorMessage(outcome.error)}`;
    }
  }
}

/**
 * Runs strategies in order until one is verified.
 *
 * On success the diagnostics hold one record per earlier failed strategy. When
 * every strategy fails verification the result is `AllStrategiesExhausted`
 * with one record per attempted strategy.
 *
 * @throws Error if `strategies` is empty
 */
export async function runPipeline(
  strategies: readonly Strategy[],
  probe: VerificationProbe,
  deps: PipelineDeps
): Promise<OperationResult> {
  if (strategies.length === 0) {
    throw new Error(`Pipeline for '${probe.name}' has no strategies`);
  }

  const { logger, sleep } = deps;
  const diagnostics: string[] = [];

  for (const [index, strategy] of strategies.entries()) {
    logger.info(`[${probe.name}] attempt ${index + 1}/${strategies.length}: ${strategy.name}`);
    const outcome = await runAction(strategy);
    if (outcome.kind !== 'returned') {
      logger.warn(`[${probe.name}] ${strategy.name}: ${describeOutcome(outcome)}`);
    }

    const verdict = await awaitVerdict(probe, sleep);
    if (verdict.ok) {
      logger.info(`[${probe.name}] verified after ${strategy.name}`);
      return succeed(`${probe.name} verified after strategy '${strategy.name}'`, {
        diagnostics,
        details: { strategy: strategy.name },
      });
    }

    const record = `${strategy.name}: ${describeOutcome(outcome)}; verification '${probe.name}' failed: ${verdict.reason}`;
    logger.warn(`[${probe.name}] ${record}`);
    diagnostics.push(record);
  }

  return fail(
    `All ${strategies.length} strategies exhausted without passing '${probe.name}'`,
    'AllStrategiesExhausted',
    { diagnostics }
  );
}
