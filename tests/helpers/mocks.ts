/**
 * Test helpers and fakes for stage tests.
 *
 * Provides an in-memory process launcher and network probe, an instant sleep,
 * and builders for temporary image trees and stage contexts.
 */

import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DEFAULT_CONFIG, mergeConfig, type ConfigFile } from '@/lib/config.js';
import { createStageContext, type HttpFetch, type HttpResponse, type StageContext } from '@/lib/context.js';
import { createLogger, createMemoryLogSink, type MemoryLogSink } from '@/lib/log.js';
import type { NetworkProbe } from '@/lib/network.js';
import type { Sleep } from '@/lib/pipeline.js';
import type { ProcessHandle, ProcessLauncher, RunOptions, RunResult } from '@/lib/process.js';
import type { BuilderConfig, ImageLayout } from '@/types/index.js';

export function okRun(stdout = ''): RunResult {
  return { exit_code: 0, stdout, stderr: '', duration_ms: 1, timed_out: false };
}

export function failedRun(exitCode: number, stderr = ''): RunResult {
  return { exit_code: exitCode, stdout: '', stderr, duration_ms: 1, timed_out: false };
}

export function timedOutRun(): RunResult {
  return { exit_code: null, stdout: '', stderr: '', duration_ms: 1, timed_out: true };
}

export type RunHandler = (executable: string, args: string[], options: RunOptions) => RunResult | Promise<RunResult>;

function nextValue<T>(sequence: T[], index: number, fallback: T): T {
  if (sequence.length === 0) return fallback;
  return sequence[Math.min(index, sequence.length - 1)];
}

/**
 * Launcher that records every call. `run` answers through a handler;
 * `findProcess` answers from `processSequence` (last value repeats).
 */
export class FakeLauncher implements ProcessLauncher {
  readonly runs: Array<{ executable: string; args: string[] }> = [];
  readonly spawned: Array<{ executable: string; args: string[]; detached: boolean }> = [];
  readonly killed: string[] = [];
  /** `run <first arg>` and `killByName <name>` calls in order */
  readonly events: string[] = [];
  processSequence: boolean[] = [];
  spawnError: Error | null = null;
  terminateError: Error | null = null;
  terminateCalls = 0;
  private findCalls = 0;

  constructor(private readonly onRun: RunHandler = () => okRun()) {}

  async spawn(executable: string, args: string[], options: { detached: boolean }): Promise<ProcessHandle> {
    this.spawned.push({ executable, args, detached: options.detached });
    if (this.spawnError) throw this.spawnError;
    return {
      pid: 4242,
      name: executable,
      terminate: async () => {
        this.terminateCalls++;
        if (this.terminateError) throw this.terminateError;
      },
    };
  }

  async run(executable: string, args: string[], options: RunOptions = {}): Promise<RunResult> {
    this.runs.push({ executable, args });
    this.events.push(`run ${args[0] ?? executable}`);
    return this.onRun(executable, args, options);
  }

  async findProcess(name: string): Promise<ProcessHandle | null> {
    const up = nextValue(this.processSequence, this.findCalls++, false);
    return up ? { pid: 4242, name, terminate: async () => undefined } : null;
  }

  async killByName(name: string): Promise<boolean> {
    this.killed.push(name);
    this.events.push(`killByName ${name}`);
    return true;
  }
}

/**
 * Network probe answering from sequences (last value repeats).
 */
export class FakeNetwork implements NetworkProbe {
  tcpSequence: boolean[] = [];
  httpSequence: Array<number | null> = [];
  tcpError: Error | null = null;
  readonly tcpTargets: string[] = [];
  readonly httpUrls: string[] = [];

  async tcpConnect(host: string, port: number): Promise<boolean> {
    this.tcpTargets.push(`${host}:${port}`);
    if (this.tcpError) throw this.tcpError;
    return nextValue(this.tcpSequence, this.tcpTargets.length - 1, false);
  }

  async httpGet(url: string): Promise<number | null> {
    this.httpUrls.push(url);
    return nextValue(this.httpSequence, this.httpUrls.length - 1, null);
  }
}

/**
 * Sleep that returns immediately and records the requested delays.
 */
export function createInstantSleep(): { sleep: Sleep; sleeps: number[] } {
  const sleeps: number[] = [];
  return {
    sleeps,
    sleep: async (ms: number, signal?: AbortSignal) => {
      sleeps.push(ms);
      signal?.throwIfAborted();
    },
  };
}

export function textResponse(status: number, body: string): HttpResponse {
  return {
    ok: status >= 200 && status < 300,
    status,
    text: async () => body,
    arrayBuffer: async () => {
      const bytes = new TextEncoder().encode(body);
      const buffer = new ArrayBuffer(bytes.byteLength);
      new Uint8Array(buffer).set(bytes);
      return buffer;
    },
  };
}

/**
 * Fetch stub that records requested URLs and answers through a handler.
 */
export function createFakeFetch(handler: (url: string) => HttpResponse | Promise<HttpResponse>): {
  fetch: HttpFetch;
  urls: string[];
} {
  const urls: string[] = [];
  return {
    urls,
    fetch: async (url) => {
      urls.push(url);
      return handler(url);
    },
  };
}

export async function makeTempDir(prefix = 'nvda-portable-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  try {
    await rm(dir, { recursive: true, force: true });
  } catch {
    // Ignore cleanup errors
  }
}

export interface ImageTreeOptions {
  /** Layout members to leave out */
  omit?: string[];
  /** Contents of the flag file */
  flagText?: string;
  /** Add-on directories to create, each with a manifest */
  addons?: string[];
}

/**
 * Writes an image tree under `root` following `layout`.
 */
export async function createImageTree(
  root: string,
  layout: ImageLayout = DEFAULT_CONFIG.image,
  options: ImageTreeOptions = {}
): Promise<void> {
  const omit = new Set(options.omit ?? []);
  await mkdir(root, { recursive: true });
  if (!omit.has(layout.executable)) await writeFile(join(root, layout.executable), 'MZ');
  if (!omit.has(layout.flag_file)) await writeFile(join(root, layout.flag_file), options.flagText ?? `${layout.flag_marker}\n`);
  if (!omit.has(layout.library_archive)) await writeFile(join(root, layout.library_archive), 'PK');
  for (const dir of [layout.synth_drivers_dir, layout.locale_dir]) {
    if (!omit.has(dir)) await mkdir(join(root, dir), { recursive: true });
  }
  if (!omit.has(layout.addons_dir)) {
    await mkdir(join(root, layout.addons_dir), { recursive: true });
    for (const addon of options.addons ?? ['at-automation']) {
      await mkdir(join(root, layout.addons_dir, addon), { recursive: true });
      await writeFile(join(root, layout.addons_dir, addon, 'manifest.ini'), `name = ${addon}\n`);
    }
  }
}

/**
 * Config with instant retries and polls, rooted in a temp directory.
 */
export function createTestConfig(root: string, overrides: ConfigFile = {}): BuilderConfig {
  return mergeConfig({
    ...overrides,
    app: { install_dir: join(root, 'install'), user_config_dir: join(root, 'appdata', 'nvda'), ...overrides.app },
    timeouts: { settle_seconds: 0, ...overrides.timeouts },
    probe: { verify_retries: 0, verify_interval_seconds: 0, ...overrides.probe },
    endpoint: { tries: 3, interval_seconds: 0, connect_timeout_seconds: 1, ...overrides.endpoint },
    log: { file: join(root, 'run.log'), ...overrides.log },
  });
}

export interface TestContext {
  ctx: StageContext;
  launcher: FakeLauncher;
  network: FakeNetwork;
  log: MemoryLogSink;
  sleeps: number[];
}

export interface TestContextOptions {
  config?: ConfigFile;
  launcher?: FakeLauncher;
  fetch?: HttpFetch;
  env?: NodeJS.ProcessEnv;
}

/**
 * Stage context over fakes, with `root` as cwd and temp dir.
 */
export async function createTestContext(root: string, options: TestContextOptions = {}): Promise<TestContext> {
  const tempDir = join(root, 'tmp');
  await mkdir(tempDir, { recursive: true });
  const launcher = options.launcher ?? new FakeLauncher();
  const network = new FakeNetwork();
  const log = createMemoryLogSink();
  const { sleep, sleeps } = createInstantSleep();
  const fetch =
    options.fetch ??
    (async (url: string) => {
      throw new Error(`unexpected fetch of ${url}`);
    });
  const ctx = createStageContext(createTestConfig(root, options.config), createLogger([log]), {
    launcher,
    network,
    fetch,
    sleep,
    cwd: root,
    env: { TEMP: tempDir, ...options.env },
  });
  return { ctx, launcher, network, log, sleeps };
}
