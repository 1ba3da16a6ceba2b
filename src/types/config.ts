/**
 * TypeScript interfaces for nvda-portable.config.json.
 *
 * Every section is optional in the file; `lib/config.ts` merges the file over
 * the defaults to produce a complete `BuilderConfig`.
 */

import type { ImageLayout } from './image.js';

/**
 * Where the target application lives once installed.
 */
export interface AppConfig {
  /** Executable file name inside the install directory and the image */
  executable_name: string;
  /** Process image name used to find and stop running instances */
  process_name: string;
  /** Install directory; derived from ProgramFiles when null */
  install_dir: string | null;
  /** User configuration directory; derived from APPDATA when null */
  user_config_dir: string | null;
}

/**
 * Per-stage time budgets, in seconds.
 */
export interface TimeoutsConfig {
  install_seconds: number;
  addon_seconds: number;
  portable_seconds: number;
  download_seconds: number;
  clone_seconds: number;
  /** Wait after launching the app before polling starts */
  settle_seconds: number;
}

/**
 * Verification probe tuning.
 */
export interface ProbeConfig {
  /** Extra verification checks after a failed one */
  verify_retries: number;
  verify_interval_seconds: number;
}

/**
 * Functional test settings for the automation endpoint.
 */
export interface EndpointConfig {
  host: string;
  port: number;
  /** When set, an HTTP GET on this path replaces the TCP connect */
  http_path: string | null;
  /** Arguments passed to the executable when launched for testing */
  launch_args: string[];
  tries: number;
  interval_seconds: number;
  connect_timeout_seconds: number;
}

/**
 * Release discovery settings.
 */
export interface ReleaseConfig {
  base_url: string;
  fallback_version: string;
}

/**
 * Source of the automation add-on when the build is given none.
 */
export interface PluginConfig {
  /** Git repository holding the add-on sources */
  repository_url: string;
  /** Add-on directory inside the repository */
  source_dir: string;
}

export interface LogConfig {
  /** Append-only run log */
  file: string;
}

/**
 * Complete builder configuration.
 */
export interface BuilderConfig {
  version: string;
  app: AppConfig;
  image: ImageLayout;
  timeouts: TimeoutsConfig;
  probe: ProbeConfig;
  endpoint: EndpointConfig;
  release: ReleaseConfig;
  plugin: PluginConfig;
  log: LogConfig;
}
