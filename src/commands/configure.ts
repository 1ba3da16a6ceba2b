import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';

import type { OperationResult } from '../types/result.js';
import type { Strategy, VerificationProbe } from '../types/pipeline.js';
import { verificationTuning, type StageContext } from '../lib/context.js';
import { PathNotFoundError, VerificationFailedError } from '../lib/errors.js';
import {
  NVDA_INI_FILE_NAME,
  REQUIRED_SETTINGS,
  loadDefaultIni,
  patchIniSettings,
  unmetSettings,
} from '../lib/nvda_ini.js';
import { runPipeline } from '../lib/pipeline.js';
import { succeed } from '../lib/result.js';

export interface ConfigureOptions {
  /** Configuration directory; defaults to the user configuration directory */
  configDir?: string;
}

/**
 * Disables update checks and selects the capture-speech synthesizer.
 *
 * An existing nvda.ini is patched in place; when it is missing or lacks a
 * key, the bundled default is written instead.
 */
export async function configureCommand(ctx: StageContext, options: ConfigureOptions = {}): Promise<OperationResult> {
  const { config, prober, logger } = ctx;
  const configDir = options.configDir ? resolve(ctx.cwd, options.configDir) : ctx.paths.user_config_dir;
  const iniPath = join(configDir, NVDA_INI_FILE_NAME);

  const strategies: Strategy[] = [
    {
      name: 'patch-existing',
      timeout_ms: 10_000,
      action: async () => {
        let current: string;
        try {
          current = await readFile(iniPath, 'utf-8');
        } catch {
          throw new PathNotFoundError(`${iniPath} does not exist`, iniPath);
        }
        const { text, missing } = patchIniSettings(current, REQUIRED_SETTINGS);
        if (missing.length > 0) {
          throw new VerificationFailedError(
            `keys absent: ${missing.map((s) => `${s.section}.${s.key}`).join(', ')}`
          );
        }
        await writeFile(iniPath, text, 'utf-8');
        return `patched ${iniPath}`;
      },
    },
    {
      name: 'write-default',
      timeout_ms: 10_000,
      action: async () => {
        await mkdir(configDir, { recursive: true });
        await writeFile(iniPath, await loadDefaultIni(), 'utf-8');
        return `wrote ${iniPath}`;
      },
    },
  ];

  const probe: VerificationProbe = {
    name: 'nvda-ini-settings',
    ...verificationTuning(config),
    async check() {
      const text = await prober.readText(iniPath);
      if (text === null) {
        return { ok: false, reason: `${iniPath} is not readable` };
      }
      const unmet = unmetSettings(text, REQUIRED_SETTINGS);
      return unmet.length === 0
        ? { ok: true }
        : {
            ok: false,
            reason: `unmet: ${unmet.map((s) => `${s.section}.${s.key} = ${s.value}`).join(', ')}`,
          };
    },
  };

  logger.info(`Configuring ${iniPath}`);
  const result = await runPipeline(strategies, probe, ctx);
  if (!result.success) {
    return result;
  }
  return succeed(`Configured ${iniPath}`, {
    diagnostics: result.diagnostics,
    details: { ...result.details, ini_path: iniPath },
  });
}
