import { appendFile, mkdir } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';

import type { OperationResult } from '../types/result.js';
import { BUILD_RESULT_FILE } from '../lib/branding.js';
import type { StageContext } from '../lib/context.js';
import { errorMessage } from '../lib/errors.js';
import { atomicWriteJson } from '../lib/fs.js';
import { fail, failFromError, succeed } from '../lib/result.js';
import { configureCommand } from './configure.js';
import { createPortableCommand } from './create-portable.js';
import { DEFAULT_INSTALLER_FILE, downloadCommand } from './download.js';
import { fetchPluginCommand } from './fetch-plugin.js';
import { installAddonCommand } from './install-addon.js';
import { installCommand } from './install.js';
import { resolveCommand } from './resolve.js';
import { testCommand } from './test.js';
import { verifyImageCommand } from './verify-image.js';

export interface BuildOptions {
  /** Add-on directory or `.nvda-addon` archive; fetched from the plugin repository when omitted */
  addon?: string;
  /** Version to package; resolved from the release listing when omitted */
  version?: string;
  /** Local installer; skips the download stage */
  installer?: string;
  /** Portable image directory */
  output?: string;
  /** Skip launching the image */
  skipTest?: boolean;
  /** Where the final result is recorded */
  resultFile?: string;
}

type Stage = () => Promise<OperationResult>;

/**
 * Runs every stage from release resolution to the functional test, stopping
 * at the first failure. On success the version and image path are handed to
 * CI through `GITHUB_ENV` when it is set. The final result is always written
 * to the build record; when that write fails the returned result says so.
 */
export async function buildCommand(options: BuildOptions, ctx: StageContext): Promise<OperationResult> {
  const { logger } = ctx;
  const diagnostics: string[] = [];
  const details: Record<string, string> = {};
  const completed: string[] = [];

  const runStage = async (name: string, stage: Stage): Promise<OperationResult> => {
    logger.info(`== ${name} ==`);
    let result: OperationResult;
    try {
      result = await stage();
    } catch (error) {
      logger.error(`${name} aborted: ${errorMessage(error)}`);
      result = failFromError(error, name);
    }
    diagnostics.push(...result.diagnostics.map((line) => `${name}: ${line}`));
    if (result.success) {
      completed.push(name);
    }
    return result;
  };

  const stopped = (name: string, result: OperationResult): OperationResult =>
    fail(`Build stopped at ${name}: ${result.error ?? 'unknown failure'}`, result.error_kind ?? 'ExternalProcessError', {
      diagnostics,
      details: { ...details, stage: name, completed: completed.join(',') },
    });

  const record = async (result: OperationResult): Promise<OperationResult> => {
    const resultFile = resolve(ctx.cwd, options.resultFile ?? BUILD_RESULT_FILE);
    try {
      await mkdir(dirname(resultFile), { recursive: true });
      await atomicWriteJson(resultFile, result);
    } catch (error) {
      logger.error(`Build record not written to ${resultFile}: ${errorMessage(error)}`);
      return failFromError(error, 'Build record not written', {
        diagnostics: [...result.diagnostics, `build result: ${result.success ? 'succeeded' : (result.error ?? 'failed')}`],
        details: result.details,
      });
    }
    logger.info(`Build record written to ${resultFile}`);
    return result;
  };

  const resolved = await runStage('resolve', () => resolveCommand(options.version, ctx));
  if (!resolved.success) return record(stopped('resolve', resolved));
  const version = resolved.details?.version ?? '';
  details.version = version;

  let installer = options.installer;
  if (installer === undefined) {
    const url = resolved.details?.url ?? '';
    const downloaded = await runStage('download', () => downloadCommand(url, ctx, DEFAULT_INSTALLER_FILE));
    if (!downloaded.success) return record(stopped('download', downloaded));
    installer = downloaded.details?.installer_path ?? resolve(ctx.cwd, DEFAULT_INSTALLER_FILE);
  }
  const installerPath = installer;
  details.installer_path = resolve(ctx.cwd, installerPath);

  let addonPath = options.addon ?? '';
  const stages: Array<[string, Stage]> = [['install', () => installCommand(installerPath, ctx)]];
  if (options.addon === undefined) {
    stages.push(['fetch-plugin', () => fetchPluginCommand(ctx)]);
  }
  stages.push(
    ['install-addon', () => installAddonCommand(addonPath, ctx)],
    ['configure', () => configureCommand(ctx)],
    ['create-portable', () => createPortableCommand(version, ctx, { outputDir: options.output })]
  );
  for (const [name, stage] of stages) {
    const result = await runStage(name, stage);
    if (!result.success) return record(stopped(name, result));
    if (result.details?.plugin_dir) {
      addonPath = result.details.plugin_dir;
      details.plugin_dir = addonPath;
    }
    if (result.details?.portable_path) {
      details.portable_path = result.details.portable_path;
    }
  }

  const portablePath = details.portable_path ?? '';
  const verified = await runStage('verify-image', () => verifyImageCommand(portablePath, ctx));
  if (!verified.success) return record(stopped('verify-image', verified));

  if (options.skipTest) {
    logger.info('Functional test skipped');
  } else {
    const tested = await runStage('test', () => testCommand(portablePath, ctx));
    if (!tested.success) return record(stopped('test', tested));
  }

  const githubEnv = ctx.env.GITHUB_ENV;
  if (githubEnv) {
    const exported = await runStage('ci-export', async () => {
      await appendFile(githubEnv, `NVDA_VERSION=${version}\nPORTABLE_PATH=${portablePath}\n`, 'utf-8');
      logger.info(`Exported NVDA_VERSION and PORTABLE_PATH to ${githubEnv}`);
      return succeed(`Exported to ${githubEnv}`);
    });
    if (!exported.success) return record(stopped('ci-export', exported));
  }

  return record(
    succeed(`Built portable image ${portablePath} (version ${version})`, {
      diagnostics,
      details: { ...details, completed: completed.join(',') },
    })
  );
}
