/**
 * Add-on manifest reader.
 *
 * Manifests are `key = value` lines. Only `name` is read; it decides the
 * directory the add-on is installed under.
 */

import { join } from 'node:path';
import type { FileProber } from './fs.js';

export const MANIFEST_FILE_NAME = 'manifest.ini';

/** Installed directory name when the manifest has no usable `name`. */
export const DEFAULT_ADDON_NAME = 'at-automation';

/**
 * Parses `key = value` lines. Blank lines, `#`/`;` comments and lines without
 * `=` are skipped; surrounding double quotes are stripped from values. The
 * first occurrence of a key wins.
 */
export function parseManifest(text: string): Map<string, string> {
  const entries = new Map<string, string>();
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line === '' || line.startsWith('#') || line.startsWith(';')) continue;
    const eq = line.indexOf('=');
    if (eq <= 0) continue;
    const key = line.slice(0, eq).trim();
    let value = line.slice(eq + 1).trim();
    if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
      value = value.slice(1, -1);
    }
    if (!entries.has(key)) entries.set(key, value);
  }
  return entries;
}

/**
 * Add-on name from manifest text, or the default name.
 */
export function addonNameFromManifest(text: string | null): string {
  if (text === null) return DEFAULT_ADDON_NAME;
  const name = parseManifest(text).get('name');
  return name && name.length > 0 ? name : DEFAULT_ADDON_NAME;
}

/**
 * Reads the add-on name from `<addonDir>/manifest.ini`.
 */
export async function readAddonName(addonDir: string, prober: FileProber): Promise<string> {
  return addonNameFromManifest(await prober.readText(join(addonDir, MANIFEST_FILE_NAME)));
}
