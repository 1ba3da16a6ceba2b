import { cp, mkdir, mkdtemp, rm } from 'node:fs/promises';
import { join, resolve } from 'node:path';

import type { OperationResult } from '../types/result.js';
import type { Strategy, VerificationProbe } from '../types/pipeline.js';
import { verificationTuning, type StageContext } from '../lib/context.js';
import { PathNotFoundError } from '../lib/errors.js';
import { matchesAddonToken } from '../lib/image.js';
import { MANIFEST_FILE_NAME, readAddonName } from '../lib/manifest.js';
import { runPipeline } from '../lib/pipeline.js';
import { runOrThrow } from '../lib/process.js';
import { succeed } from '../lib/result.js';

export interface InstallAddonOptions {
  /** Install into this portable image instead of the user configuration */
  image?: string;
}

/**
 * Quotes a value for a single-quoted PowerShell string.
 */
export function powershellQuote(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * Add-ons directory the stage installs into.
 */
export function addonTargetDir(ctx: StageContext, options: InstallAddonOptions): string {
  return options.image
    ? join(resolve(ctx.cwd, options.image), ctx.config.image.addons_dir)
    : join(ctx.paths.user_config_dir, 'addons');
}

/**
 * Installs the automation add-on from an unpacked directory or an
 * `.nvda-addon` archive.
 *
 * The destination directory is named after the manifest `name`. Success
 * means the add-ons directory holds a token-matching directory with a
 * manifest.
 *
 * @throws {PathNotFoundError} If the add-on source does not exist
 */
export async function installAddonCommand(
  addonPath: string,
  ctx: StageContext,
  options: InstallAddonOptions = {}
): Promise<OperationResult> {
  const { config, launcher, prober, logger } = ctx;
  const source = resolve(ctx.cwd, addonPath);
  const targetDir = addonTargetDir(ctx, options);
  const timeoutMs = config.timeouts.addon_seconds * 1000;

  if (!(await prober.exists(source))) {
    throw new PathNotFoundError(`Add-on not found: ${source}`, source);
  }
  const sourceIsDirectory = await prober.isDirectory(source);

  const installFrom = async (dir: string): Promise<string> => {
    const name = await readAddonName(dir, prober);
    const destination = join(targetDir, name);
    await mkdir(targetDir, { recursive: true });
    await rm(destination, { recursive: true, force: true });
    await cp(dir, destination, { recursive: true });
    return `copied to ${destination}`;
  };

  const extractWith = async (extract: (staging: string) => Promise<string>): Promise<string> => {
    if (sourceIsDirectory) {
      throw new Error(`${source} is a directory, not an archive`);
    }
    const staging = await mkdtemp(join(ctx.paths.temp_dir, 'nvda-addon-'));
    try {
      const output = await extract(staging);
      const copied = await installFrom(staging);
      return [output, copied].filter(Boolean).join('\n');
    } finally {
      await rm(staging, { recursive: true, force: true });
    }
  };

  const strategies: Strategy[] = [
    {
      name: 'copy-directory',
      timeout_ms: timeoutMs,
      action: async () => {
        if (!sourceIsDirectory) {
          throw new Error(`${source} is an archive, not a directory`);
        }
        return installFrom(source);
      },
    },
    {
      name: 'tar-extract',
      timeout_ms: timeoutMs,
      action: (signal) =>
        extractWith((staging) =>
          runOrThrow(launcher, 'tar', ['-xf', source, '-C', staging], { timeout_ms: timeoutMs, signal })
        ),
    },
    {
      name: 'powershell-expand',
      timeout_ms: timeoutMs,
      action: (signal) =>
        extractWith((staging) =>
          runOrThrow(
            launcher,
            'powershell',
            [
              '-NoProfile',
              '-NonInteractive',
              '-Command',
              `Expand-Archive -LiteralPath ${powershellQuote(source)} -DestinationPath ${powershellQuote(staging)} -Force`,
            ],
            { timeout_ms: timeoutMs, signal }
          )
        ),
    },
  ];

  const probe: VerificationProbe = {
    name: 'addon-installed',
    ...verificationTuning(config),
    async check() {
      const matching = (await prober.listDirectories(targetDir)).filter((name) =>
        matchesAddonToken(name, config.image.addon_tokens)
      );
      for (const name of matching) {
        if (await prober.exists(join(targetDir, name, MANIFEST_FILE_NAME))) {
          return { ok: true };
        }
      }
      return {
        ok: false,
        reason:
          matching.length === 0
            ? `no directory matching ${config.image.addon_tokens.join(' or ')} in ${targetDir}`
            : `${matching.join(', ')} in ${targetDir} has no ${MANIFEST_FILE_NAME}`,
      };
    },
  };

  logger.info(`Installing add-on ${source} into ${targetDir}`);
  const result = await runPipeline(strategies, probe, ctx);
  if (!result.success) {
    return result;
  }
  return succeed(`Add-on installed into ${targetDir}`, {
    diagnostics: result.diagnostics,
    details: { ...result.details, addons_dir: targetDir },
  });
}
