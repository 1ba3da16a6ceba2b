/**
 * Configuration loading and validation utilities.
 *
 * The config file is optional. When present it is validated against
 * `schemas/config.schema.json` and merged section by section over the
 * defaults.
 */

import { access } from 'node:fs/promises';
import { homedir, tmpdir } from 'node:os';
import { join, dirname, resolve } from 'node:path';
import type {
  AppConfig,
  BuilderConfig,
  EndpointConfig,
  LogConfig,
  PluginConfig,
  ProbeConfig,
  ReleaseConfig,
  TimeoutsConfig,
} from '../types/config.js';
import type { ImageLayout } from '../types/image.js';
import { CONFIG_FILE_NAME, DEFAULT_LOG_FILE } from './branding.js';
import { atomicReadJson, AtomicFsError } from './fs.js';
import { DEFAULT_IMAGE_LAYOUT } from './image.js';
import { loadSchema, validateWithSchema } from './schema.js';

const CONFIG_SCHEMA_URL = new URL('../../schemas/config.schema.json', import.meta.url);

/**
 * Error thrown when configuration loading or validation fails.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly configPath?: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Shape of the config file: every section and field optional.
 */
export interface ConfigFile {
  version?: string;
  app?: Partial<AppConfig>;
  image?: Partial<ImageLayout>;
  timeouts?: Partial<TimeoutsConfig>;
  probe?: Partial<ProbeConfig>;
  endpoint?: Partial<EndpointConfig>;
  release?: Partial<ReleaseConfig>;
  plugin?: Partial<PluginConfig>;
  log?: Partial<LogConfig>;
}

export const DEFAULT_CONFIG: BuilderConfig = {
  version: '1.0',
  app: {
    executable_name: 'nvda.exe',
    process_name: 'nvda.exe',
    install_dir: null,
    user_config_dir: null,
  },
  image: DEFAULT_IMAGE_LAYOUT,
  timeouts: {
    install_seconds: 300,
    addon_seconds: 120,
    portable_seconds: 300,
    download_seconds: 300,
    clone_seconds: 120,
    settle_seconds: 15,
  },
  probe: {
    verify_retries: 3,
    verify_interval_seconds: 2,
  },
  endpoint: {
    host: '127.0.0.1',
    port: 8765,
    http_path: null,
    launch_args: ['-m'],
    tries: 10,
    interval_seconds: 3,
    connect_timeout_seconds: 2,
  },
  release: {
    base_url: 'https://download.nvaccess.org/releases',
    fallback_version: '2024.4.2',
  },
  plugin: {
    repository_url: 'https://github.com/Prime-Access-Consulting/nvda-at-automation.git',
    source_dir: 'NVDAPlugin',
  },
  log: {
    file: DEFAULT_LOG_FILE,
  },
};

/**
 * Searches for a configuration file by walking upward from a directory.
 * Stops at the filesystem root if not found.
 *
 * @returns Path to the config file if found, null otherwise
 */
export async function findConfigFile(startDir: string = process.cwd()): Promise<string | null> {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    try {
      await access(configPath);
      return configPath;
    } catch {
      // Keep walking up.
    }

    if (currentDir === dirname(currentDir)) {
      return null;
    }
    currentDir = dirname(currentDir);
  }
}

/**
 * Merges a validated config file over the defaults.
 */
export function mergeConfig(file: ConfigFile, defaults: BuilderConfig = DEFAULT_CONFIG): BuilderConfig {
  return {
    version: file.version ?? defaults.version,
    app: { ...defaults.app, ...file.app },
    image: { ...defaults.image, ...file.image },
    timeouts: { ...defaults.timeouts, ...file.timeouts },
    probe: { ...defaults.probe, ...file.probe },
    endpoint: { ...defaults.endpoint, ...file.endpoint },
    release: { ...defaults.release, ...file.release },
    plugin: { ...defaults.plugin, ...file.plugin },
    log: { ...defaults.log, ...file.log },
  };
}

/**
 * Loads the configuration.
 *
 * @param configPath - Explicit config file; when omitted, searches upward and
 *                     falls back to the defaults if nothing is found
 * @throws {ConfigError} If an explicit file is missing, or any file is unreadable or invalid
 *
 * @example
 * ```typescript
 * const config = await loadConfig();
 * const custom = await loadConfig('ci/nvda-portable.config.json');
 * ```
 */
export async function loadConfig(configPath?: string): Promise<BuilderConfig> {
  const resolvedPath = configPath ? resolve(configPath) : await findConfigFile();
  if (!resolvedPath) {
    return mergeConfig({});
  }

  let rawConfig: unknown;
  try {
    rawConfig = await atomicReadJson(resolvedPath);
  } catch (error) {
    if (error instanceof AtomicFsError) {
      throw new ConfigError(`Failed to read configuration file: ${error.message}`, resolvedPath, error);
    }
    throw error;
  }

  const schema = await loadSchema(CONFIG_SCHEMA_URL);
  const result = validateWithSchema<ConfigFile>(rawConfig, schema);
  if (!result.valid) {
    throw new ConfigError(`Invalid configuration file: ${result.errors.join('; ')}`, resolvedPath);
  }

  return mergeConfig(result.data);
}

/**
 * Platform locations derived from the config and environment.
 */
export interface ResolvedPaths {
  install_dir: string;
  installed_executable: string;
  user_config_dir: string;
  temp_dir: string;
}

/**
 * Resolves install, user-config and temp directories.
 *
 * Install dir: `app.install_dir`, else `%ProgramFiles(x86)%\NVDA` (or
 * `%ProgramFiles%\NVDA`). User config: `app.user_config_dir`, else
 * `%APPDATA%\nvda`.
 */
export function resolvePaths(config: BuilderConfig, env: NodeJS.ProcessEnv = process.env): ResolvedPaths {
  const programFiles = env['ProgramFiles(x86)'] ?? env.ProgramFiles ?? 'C:\\Program Files (x86)';
  const appData = env.APPDATA ?? join(homedir(), 'AppData', 'Roaming');
  const installDir = config.app.install_dir ?? join(programFiles, 'NVDA');
  return {
    install_dir: installDir,
    installed_executable: join(installDir, config.app.executable_name),
    user_config_dir: config.app.user_config_dir ?? join(appData, 'nvda'),
    temp_dir: env.TEMP ?? env.TMP ?? tmpdir(),
  };
}
