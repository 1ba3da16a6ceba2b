/**
 * Functional-execution verifier.
 *
 * Launches the application, waits for it to settle, then polls for both the
 * process and the automation endpoint. The launched process is terminated on
 * every exit path.
 */

import { errorMessage } from './errors.js';
import type { Logger } from './log.js';
import type { NetworkProbe } from './network.js';
import type { Sleep } from './pipeline.js';
import type { ProcessHandle, ProcessLauncher } from './process.js';

export interface EndpointTarget {
  host: string;
  port: number;
  /** When set, an HTTP GET on this path replaces the TCP connect */
  http_path: string | null;
  connect_timeout_ms: number;
}

export interface VerifyRunningOptions {
  executable: string;
  args: string[];
  /** Image name the running process is found by */
  process_name: string;
  endpoint: EndpointTarget;
  settle_ms: number;
  tries: number;
  interval_ms: number;
  /** Overall polling budget measured from launch; unlimited when omitted */
  budget_ms?: number;
}

export interface RunningDeps {
  launcher: ProcessLauncher;
  network: NetworkProbe;
  logger: Logger;
  sleep: Sleep;
  now?: () => number;
}

export interface RunningCheck {
  /** Process and endpoint were both observed on the same poll */
  running: boolean;
  process_seen: boolean;
  endpoint_reachable: boolean;
  /** Polls performed */
  attempts: number;
  diagnostics: string[];
}

export function endpointLabel(endpoint: EndpointTarget): string {
  return endpoint.http_path === null
    ? `tcp://${endpoint.host}:${endpoint.port}`
    : `http://${endpoint.host}:${endpoint.port}${endpoint.http_path}`;
}

async function probeEndpoint(network: NetworkProbe, endpoint: EndpointTarget): Promise<boolean> {
  if (endpoint.http_path === null) {
    return network.tcpConnect(endpoint.host, endpoint.port, endpoint.connect_timeout_ms);
  }
  const status = await network.httpGet(endpointLabel(endpoint), endpoint.connect_timeout_ms);
  return status !== null && status < 500;
}

async function release(handle: ProcessHandle, logger: Logger): Promise<void> {
  try {
    await handle.terminate();
    logger.info(`Stopped ${handle.name}${handle.pid !== null ? ` (pid ${handle.pid})` : ''}`);
  } catch (error) {
    logger.warn(`Failed to stop ${handle.name}: ${errorMessage(error)}`);
  }
}

/**
 * Launches the executable and waits until it is running with a reachable
 * endpoint.
 */
export async function verifyRunning(options: VerifyRunningOptions, deps: RunningDeps): Promise<RunningCheck> {
  const { launcher, network, logger, sleep } = deps;
  const now = deps.now ?? Date.now;
  const label = endpointLabel(options.endpoint);
  const diagnostics: string[] = [];
  const check: RunningCheck = {
    running: false,
    process_seen: false,
    endpoint_reachable: false,
    attempts: 0,
    diagnostics,
  };

  let handle: ProcessHandle;
  try {
    handle = await launcher.spawn(options.executable, options.args, { detached: true });
  } catch (error) {
    diagnostics.push(`launch failed: ${errorMessage(error)}`);
    return check;
  }
  logger.info(`Launched ${options.executable} ${options.args.join(' ')}`.trimEnd());
  const startedAt = now();

  try {
    await sleep(options.settle_ms);

    for (let attempt = 1; attempt <= options.tries; attempt++) {
      if (options.budget_ms !== undefined && now() - startedAt > options.budget_ms) {
        diagnostics.push(`budget of ${options.budget_ms}ms exhausted after ${check.attempts} polls`);
        break;
      }
      check.attempts = attempt;

      const processUp = (await launcher.findProcess(options.process_name)) !== null;
      const endpointUp = await probeEndpoint(network, options.endpoint);
      if (processUp) check.process_seen = true;
      if (endpointUp) check.endpoint_reachable = true;

      if (processUp && endpointUp) {
        check.running = true;
        logger.info(`${options.process_name} running and ${label} reachable (poll ${attempt}/${options.tries})`);
        return check;
      }

      const waiting = [processUp ? null : `process ${options.process_name} not found`, endpointUp ? null : `${label} unreachable`]
        .filter((part): part is string => part !== null)
        .join(', ');
      logger.debug(`poll ${attempt}/${options.tries}: ${waiting}`);
      if (attempt === options.tries) {
        diagnostics.push(`after ${attempt} polls: ${waiting}`);
      } else {
        await sleep(options.interval_ms);
      }
    }

    return check;
  } finally {
    await release(handle, logger);
  }
}
