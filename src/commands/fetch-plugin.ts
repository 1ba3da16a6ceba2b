import { cp, mkdtemp, rm } from 'node:fs/promises';
import { join, resolve } from 'node:path';

import type { OperationResult } from '../types/result.js';
import type { Strategy, VerificationProbe } from '../types/pipeline.js';
import { verificationTuning, type StageContext } from '../lib/context.js';
import { MANIFEST_FILE_NAME } from '../lib/manifest.js';
import { runPipeline } from '../lib/pipeline.js';
import { runOrThrow } from '../lib/process.js';
import { succeed } from '../lib/result.js';

/**
 * Where the add-on sources land when no destination is given.
 */
export function defaultPluginDir(cwd: string, sourceDir: string): string {
  return join(cwd, sourceDir);
}

/**
 * Fetches the automation add-on sources.
 *
 * Shallow-clones the plugin repository into a staging directory and copies
 * its add-on directory over `destination`, replacing what was there. Success
 * means the destination holds a manifest.
 */
export async function fetchPluginCommand(ctx: StageContext, destination?: string): Promise<OperationResult> {
  const { config, launcher, prober, logger } = ctx;
  const { repository_url, source_dir } = config.plugin;
  const target = destination ? resolve(ctx.cwd, destination) : defaultPluginDir(ctx.cwd, source_dir);
  const timeoutMs = config.timeouts.clone_seconds * 1000;

  const strategies: Strategy[] = [
    {
      name: 'git-clone',
      timeout_ms: timeoutMs,
      action: async (signal) => {
        const staging = await mkdtemp(join(ctx.paths.temp_dir, 'nvda-plugin-'));
        try {
          const output = await runOrThrow(launcher, 'git', ['clone', '--depth', '1', repository_url, staging], {
            timeout_ms: timeoutMs,
            signal,
          });
          await rm(target, { recursive: true, force: true });
          await cp(join(staging, source_dir), target, { recursive: true });
          return output;
        } finally {
          await rm(staging, { recursive: true, force: true });
        }
      },
    },
  ];

  const manifest = join(target, MANIFEST_FILE_NAME);
  const probe: VerificationProbe = {
    name: 'plugin-fetched',
    ...verificationTuning(config),
    async check() {
      return (await prober.exists(manifest)) ? { ok: true } : { ok: false, reason: `${manifest} does not exist` };
    },
  };

  logger.info(`Fetching ${source_dir} from ${repository_url}`);
  const result = await runPipeline(strategies, probe, ctx);
  if (!result.success) {
    return result;
  }
  return succeed(`Add-on sources fetched to ${target}`, {
    diagnostics: result.diagnostics,
    details: { ...result.details, plugin_dir: target },
  });
}
