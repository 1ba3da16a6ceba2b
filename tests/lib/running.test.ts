import { describe, it, expect } from 'vitest';
import { endpointLabel, verifyRunning, type VerifyRunningOptions } from '@/lib/running.js';
import { createLogger, createMemoryLogSink } from '@/lib/log.js';
import { FakeLauncher, FakeNetwork, createInstantSleep } from '../helpers/mocks.js';

function options(overrides: Partial<VerifyRunningOptions> = {}): VerifyRunningOptions {
  return {
    executable: 'nvda.exe',
    args: ['-m'],
    process_name: 'nvda.exe',
    endpoint: { host: '127.0.0.1', port: 8765, http_path: null, connect_timeout_ms: 1000 },
    settle_ms: 500,
    tries: 10,
    interval_ms: 100,
    ...overrides,
  };
}

function setup() {
  const launcher = new FakeLauncher();
  const network = new FakeNetwork();
  const log = createMemoryLogSink();
  const { sleep, sleeps } = createInstantSleep();
  return { launcher, network, log, sleeps, deps: { launcher, network, logger: createLogger([log]), sleep } };
}

describe('endpointLabel', () => {
  it('renders tcp and http targets', () => {
    expect(endpointLabel({ host: '127.0.0.1', port: 8765, http_path: null, connect_timeout_ms: 1 })).toBe(
      'tcp://127.0.0.1:8765'
    );
    expect(endpointLabel({ host: 'localhost', port: 80, http_path: '/status', connect_timeout_ms: 1 })).toBe(
      'http://localhost:80/status'
    );
  });
});

describe('verifyRunning', () => {
  it('succeeds when the endpoint comes up on the tenth poll and stops the process once', async () => {
    const { launcher, network, sleeps, deps } = setup();
    launcher.processSequence = [true];
    network.tcpSequence = [false, false, false, false, false, false, false, false, false, true];

    const check = await verifyRunning(options(), deps);

    expect(check.running).toBe(true);
    expect(check.attempts).toBe(10);
    expect(check.diagnostics).toEqual([]);
    expect(launcher.spawned).toEqual([{ executable: 'nvda.exe', args: ['-m'], detached: true }]);
    expect(launcher.terminateCalls).toBe(1);
    expect(sleeps).toEqual([500, 100, 100, 100, 100, 100, 100, 100, 100, 100]);
  });

  it('fails after the last poll when the endpoint never answers', async () => {
    const { launcher, deps } = setup();
    launcher.processSequence = [true];

    const check = await verifyRunning(options({ tries: 3 }), deps);

    expect(check).toEqual({
      running: false,
      process_seen: true,
      endpoint_reachable: false,
      attempts: 3,
      diagnostics: ['after 3 polls: tcp://127.0.0.1:8765 unreachable'],
    });
    expect(launcher.terminateCalls).toBe(1);
  });

  it('names both missing signals', async () => {
    const { deps } = setup();

    const check = await verifyRunning(options({ tries: 2 }), deps);

    expect(check.diagnostics).toEqual(['after 2 polls: process nvda.exe not found, tcp://127.0.0.1:8765 unreachable']);
  });

  it('requires both signals on the same poll', async () => {
    const { launcher, network, deps } = setup();
    launcher.processSequence = [true, false];
    network.tcpSequence = [false, true];

    const check = await verifyRunning(options({ tries: 2 }), deps);

    expect(check.running).toBe(false);
    expect(check.process_seen).toBe(true);
    expect(check.endpoint_reachable).toBe(true);
  });

  it('treats any HTTP status below 500 as reachable', async () => {
    const { launcher, network, deps } = setup();
    launcher.processSequence = [true];
    network.httpSequence = [503, 404];

    const check = await verifyRunning(
      options({ endpoint: { host: '127.0.0.1', port: 8765, http_path: '/status', connect_timeout_ms: 1000 } }),
      deps
    );

    expect(check.running).toBe(true);
    expect(check.attempts).toBe(2);
    expect(network.httpUrls).toEqual(['http://127.0.0.1:8765/status', 'http://127.0.0.1:8765/status']);
    expect(network.tcpTargets).toEqual([]);
  });

  it('reports a launch failure without terminating anything', async () => {
    const { launcher, deps } = setup();
    launcher.spawnError = new Error('no such file');

    const check = await verifyRunning(options(), deps);

    expect(check.running).toBe(false);
    expect(check.attempts).toBe(0);
    expect(check.diagnostics).toEqual(['launch failed: no such file']);
    expect(launcher.terminateCalls).toBe(0);
  });

  it('logs a failed termination as a warning', async () => {
    const { launcher, network, log, deps } = setup();
    launcher.processSequence = [true];
    network.tcpSequence = [true];
    launcher.terminateError = new Error('access denied');

    const check = await verifyRunning(options(), deps);

    expect(check.running).toBe(true);
    expect(launcher.terminateCalls).toBe(1);
    expect(log.lines.some((line) => line.endsWith('[WARN ] Failed to stop nvda.exe: access denied'))).toBe(true);
  });

  it('stops the process when an endpoint check throws, and rethrows', async () => {
    const { launcher, network, deps } = setup();
    launcher.processSequence = [true];
    network.tcpError = new Error('socket layer exploded');

    await expect(verifyRunning(options(), deps)).rejects.toThrow('socket layer exploded');

    expect(network.tcpTargets).toEqual(['127.0.0.1:8765']);
    expect(launcher.terminateCalls).toBe(1);
  });

  it('stops polling once the budget is spent', async () => {
    const { launcher, deps } = setup();
    let clock = 0;
    const check = await verifyRunning(options({ settle_ms: 0, interval_ms: 600, tries: 5, budget_ms: 1000 }), {
      ...deps,
      now: () => clock,
      sleep: async (ms: number) => {
        clock += ms;
      },
    });

    expect(check.attempts).toBe(2);
    expect(check.diagnostics).toEqual(['budget of 1000ms exhausted after 2 polls']);
    expect(launcher.terminateCalls).toBe(1);
  });
});
