/**
 * Collaborators shared by every stage.
 */

import type { BuilderConfig } from '../types/config.js';
import { resolvePaths, type ResolvedPaths } from './config.js';
import { nodeFileProber, type FileProber } from './fs.js';
import type { Logger } from './log.js';
import { nodeNetworkProbe, type NetworkProbe } from './network.js';
import { defaultSleep, type Sleep } from './pipeline.js';
import { nodeProcessLauncher, type ProcessLauncher } from './process.js';

/**
 * Minimal HTTP response used for release lookups and downloads.
 */
export interface HttpResponse {
  ok: boolean;
  status: number;
  text(): Promise<string>;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export type HttpFetch = (url: string, init: { signal: AbortSignal }) => Promise<HttpResponse>;

export interface StageContext {
  config: BuilderConfig;
  paths: ResolvedPaths;
  logger: Logger;
  launcher: ProcessLauncher;
  prober: FileProber;
  network: NetworkProbe;
  fetch: HttpFetch;
  sleep: Sleep;
  cwd: string;
  env: NodeJS.ProcessEnv;
}

export function createStageContext(
  config: BuilderConfig,
  logger: Logger,
  overrides: Partial<Omit<StageContext, 'config' | 'logger'>> = {}
): StageContext {
  const env = overrides.env ?? process.env;
  return {
    config,
    logger,
    paths: overrides.paths ?? resolvePaths(config, env),
    launcher: overrides.launcher ?? nodeProcessLauncher,
    prober: overrides.prober ?? nodeFileProber,
    network: overrides.network ?? nodeNetworkProbe,
    fetch: overrides.fetch ?? ((url, init) => fetch(url, init)),
    sleep: overrides.sleep ?? defaultSleep,
    cwd: overrides.cwd ?? process.cwd(),
    env,
  };
}

/**
 * Probe retry settings from the config, in milliseconds.
 */
export function verificationTuning(config: BuilderConfig): { retries: number; interval_ms: number } {
  return {
    retries: config.probe.verify_retries,
    interval_ms: config.probe.verify_interval_seconds * 1000,
  };
}
