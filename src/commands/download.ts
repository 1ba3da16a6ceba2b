import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';

import type { OperationResult } from '../types/result.js';
import type { Strategy, VerificationProbe } from '../types/pipeline.js';
import { verificationTuning, type StageContext } from '../lib/context.js';
import { ExternalProcessError } from '../lib/errors.js';
import { runPipeline } from '../lib/pipeline.js';
import { runOrThrow } from '../lib/process.js';
import { succeed } from '../lib/result.js';

export const DEFAULT_INSTALLER_FILE = 'nvda_installer.exe';

/**
 * Downloads the installer. Success means the file exists and is not empty.
 */
export async function downloadCommand(
  url: string,
  ctx: StageContext,
  destination: string = DEFAULT_INSTALLER_FILE
): Promise<OperationResult> {
  const { config, launcher, prober, logger } = ctx;
  const target = resolve(ctx.cwd, destination);
  const timeoutMs = config.timeouts.download_seconds * 1000;

  const strategies: Strategy[] = [
    {
      name: 'http-fetch',
      timeout_ms: timeoutMs,
      action: async (signal) => {
        const response = await ctx.fetch(url, { signal });
        if (!response.ok) {
          throw new ExternalProcessError(`GET ${url} returned HTTP ${response.status}`, `GET ${url}`, response.status);
        }
        const body = Buffer.from(await response.arrayBuffer());
        await mkdir(dirname(target), { recursive: true });
        await writeFile(target, body);
        return `wrote ${body.length} bytes`;
      },
    },
    {
      name: 'curl',
      timeout_ms: timeoutMs,
      action: async (signal) => {
        await mkdir(dirname(target), { recursive: true });
        return runOrThrow(launcher, 'curl', ['-fsSL', '--retry', '2', '-o', target, url], {
          timeout_ms: timeoutMs,
          signal,
        });
      },
    },
  ];

  const probe: VerificationProbe = {
    name: 'installer-downloaded',
    ...verificationTuning(config),
    async check() {
      const size = await prober.size(target);
      if (size === null) return { ok: false, reason: `${target} does not exist` };
      if (size === 0) return { ok: false, reason: `${target} is empty` };
      return { ok: true };
    },
  };

  logger.info(`Downloading ${url} to ${target}`);
  const result = await runPipeline(strategies, probe, ctx);
  if (!result.success) {
    return result;
  }
  return succeed(`Downloaded ${url}`, {
    diagnostics: result.diagnostics,
    details: { ...result.details, installer_path: target },
  });
}
