import { cp, mkdir, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';

import type { OperationResult } from '../types/result.js';
import type { Strategy } from '../types/pipeline.js';
import { verificationTuning, type StageContext } from '../lib/context.js';
import { PathNotFoundError } from '../lib/errors.js';
import { imageProbe } from '../lib/image.js';
import { runPipeline } from '../lib/pipeline.js';
import { runOrThrow } from '../lib/process.js';
import { succeed } from '../lib/result.js';

export interface CreatePortableOptions {
  /** Output directory; defaults to `nvda_<version>_portable` in the cwd */
  outputDir?: string;
}

export function defaultPortableDir(cwd: string, version: string): string {
  return join(cwd, `nvda_${version}_portable`);
}

/**
 * Creates a portable image from the installed application.
 *
 * Tries the launcher's silent export, then its interactive export, then a
 * plain copy of the install directory and user configuration. Each strategy
 * ends by stamping the flag file. Success means the output validates as an
 * image.
 *
 * @throws {PathNotFoundError} If the installed executable does not exist
 */
export async function createPortableCommand(
  version: string,
  ctx: StageContext,
  options: CreatePortableOptions = {}
): Promise<OperationResult> {
  const { config, paths, launcher, prober, logger } = ctx;
  const layout = config.image;
  const outputDir = options.outputDir ? resolve(ctx.cwd, options.outputDir) : defaultPortableDir(ctx.cwd, version);
  const timeoutMs = config.timeouts.portable_seconds * 1000;

  if (!(await prober.exists(paths.installed_executable))) {
    throw new PathNotFoundError(
      `Installed executable not found: ${paths.installed_executable}`,
      paths.installed_executable
    );
  }

  const stampFlag = async (): Promise<void> => {
    await mkdir(outputDir, { recursive: true });
    await writeFile(join(outputDir, layout.flag_file), `${layout.flag_marker}\nversion = ${version}\n`, 'utf-8');
  };

  const launcherExport = (flag: string) => async (signal: AbortSignal) => {
    try {
      return await runOrThrow(launcher, paths.installed_executable, [flag, `--portable-path=${outputDir}`], {
        timeout_ms: timeoutMs,
        signal,
      });
    } finally {
      await launcher.killByName(config.app.process_name);
      await stampFlag();
    }
  };

  const strategies: Strategy[] = [
    {
      name: 'create-portable-silent',
      timeout_ms: timeoutMs,
      action: launcherExport('--create-portable-silent'),
    },
    {
      name: 'create-portable',
      timeout_ms: timeoutMs,
      action: launcherExport('--create-portable'),
    },
    {
      name: 'copy-installation',
      timeout_ms: timeoutMs,
      action: async () => {
        await launcher.killByName(config.app.process_name);
        await mkdir(outputDir, { recursive: true });
        await cp(paths.install_dir, outputDir, { recursive: true, force: true });
        const userConfigTarget = join(outputDir, 'userConfig');
        if (await prober.isDirectory(paths.user_config_dir)) {
          await cp(paths.user_config_dir, userConfigTarget, { recursive: true, force: true });
        }
        await stampFlag();
        return `copied ${paths.install_dir} and ${paths.user_config_dir} to ${outputDir}`;
      },
    },
  ];

  logger.info(`Creating portable image ${outputDir} (version ${version})`);
  const result = await runPipeline(
    strategies,
    imageProbe(outputDir, layout, prober, verificationTuning(config)),
    ctx
  );
  if (!result.success) {
    return result;
  }
  return succeed(`Portable image created at ${outputDir}`, {
    diagnostics: result.diagnostics,
    details: { ...result.details, portable_path: outputDir, version },
  });
}
