import { resolve } from 'node:path';

import type { OperationResult } from '../types/result.js';
import type { Strategy, VerificationProbe } from '../types/pipeline.js';
import { verificationTuning, type StageContext } from '../lib/context.js';
import { PathNotFoundError } from '../lib/errors.js';
import { runPipeline } from '../lib/pipeline.js';
import { runOrThrow } from '../lib/process.js';
import { succeed } from '../lib/result.js';

/**
 * Installs the application from its installer.
 *
 * `--install-silent` installs without starting the app. The fallback uses
 * `--install --silent`, which starts the app afterwards, so that process is
 * stopped again. Success means the installed executable exists.
 *
 * @throws {PathNotFoundError} If the installer does not exist
 */
export async function installCommand(installerPath: string, ctx: StageContext): Promise<OperationResult> {
  const { config, paths, launcher, prober, logger } = ctx;
  const installer = resolve(ctx.cwd, installerPath);

  if (!(await prober.exists(installer))) {
    throw new PathNotFoundError(`Installer not found: ${installer}`, installer);
  }

  const timeoutMs = config.timeouts.install_seconds * 1000;

  const strategies: Strategy[] = [
    {
      name: 'install-silent',
      timeout_ms: timeoutMs,
      action: (signal) => runOrThrow(launcher, installer, ['--install-silent'], { timeout_ms: timeoutMs, signal }),
    },
    {
      name: 'install-then-stop',
      timeout_ms: timeoutMs,
      action: async (signal) => {
        const output = await runOrThrow(launcher, installer, ['--install', '--silent'], {
          timeout_ms: timeoutMs,
          signal,
        });
        await ctx.sleep(config.timeouts.settle_seconds * 1000, signal);
        const stopped = await launcher.killByName(config.app.process_name);
        logger.info(`Post-install stop of ${config.app.process_name}: ${stopped ? 'stopped' : 'not running'}`);
        return output;
      },
    },
  ];

  const probe: VerificationProbe = {
    name: 'installed-executable',
    ...verificationTuning(config),
    async check() {
      return (await prober.exists(paths.installed_executable))
        ? { ok: true }
        : { ok: false, reason: `${paths.installed_executable} does not exist` };
    },
  };

  logger.info(`Installing from ${installer}`);
  const result = await runPipeline(strategies, probe, ctx);
  if (!result.success) {
    return result;
  }
  return succeed(`Installed to ${paths.install_dir}`, {
    diagnostics: result.diagnostics,
    details: { ...result.details, install_dir: paths.install_dir, executable: paths.installed_executable },
  });
}
