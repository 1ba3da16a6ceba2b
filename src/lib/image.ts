/**
 * Installation image validation.
 *
 * `validateImage` is the single predicate for "this directory is a usable
 * portable image". It runs after an image is produced and again before the
 * image is launched for testing.
 */

import micromatch from 'micromatch';
import { join } from 'node:path';
import type { ImageLayout, ImageValidation } from '../types/image.js';
import type { VerificationProbe } from '../types/pipeline.js';
import type { FileProber } from './fs.js';

/**
 * Default layout of a portable NVDA copy.
 */
export const DEFAULT_IMAGE_LAYOUT: ImageLayout = {
  executable: 'nvda.exe',
  flag_file: 'portable.ini',
  flag_marker: '[portable]',
  library_archive: 'library.zip',
  synth_drivers_dir: 'synthDrivers',
  locale_dir: 'locale',
  addons_dir: 'userConfig/addons',
  addon_tokens: ['CommandSocket', 'at-automation'],
};

/**
 * Required members in the order they are reported.
 */
export function requiredMembers(layout: ImageLayout): string[] {
  return [
    layout.executable,
    layout.flag_file,
    layout.library_archive,
    layout.synth_drivers_dir,
    layout.locale_dir,
    layout.addons_dir,
  ];
}

/**
 * Checks if a directory name contains any of the add-on tokens.
 *
 * Matching is case-sensitive; tokens are OR-combined.
 *
 * @example
 * ```typescript
 * matchesAddonToken('CommandSocket-addon', ['CommandSocket', 'at-automation']); // true
 * matchesAddonToken('speech-addon', ['CommandSocket', 'at-automation']); // false
 * ```
 */
export function matchesAddonToken(name: string, tokens: string[]): boolean {
  if (tokens.length === 0) {
    return false;
  }
  const patterns = tokens.map((token) => `*${escapeGlob(token)}*`);
  return micromatch.isMatch(name, patterns, { dot: true });
}

function escapeGlob(token: string): string {
  return token.replace(/[*?[\]{}()!+@|\\]/g, (ch) => `\\${ch}`);
}

/**
 * Validates an image directory against a layout.
 *
 * Read-only; two calls on an unchanged directory return equal results.
 */
export async function validateImage(
  root: string,
  layout: ImageLayout,
  prober: FileProber
): Promise<ImageValidation> {
  const missing: string[] = [];
  for (const member of requiredMembers(layout)) {
    if (!(await prober.exists(join(root, member)))) {
      missing.push(member);
    }
  }

  const flagText = await prober.readText(join(root, layout.flag_file));
  const hasFlag = flagText !== null && flagText.includes(layout.flag_marker);

  const addonDirs = (await prober.listDirectories(join(root, layout.addons_dir))).filter((name) =>
    matchesAddonToken(name, layout.addon_tokens)
  );
  const hasAddon = addonDirs.length > 0;

  return {
    ok: missing.length === 0 && hasFlag && hasAddon,
    missing,
    has_flag: hasFlag,
    has_addon: hasAddon,
    addon_dirs: addonDirs,
  };
}

/**
 * Explains why a validation is not ok.
 */
export function describeValidation(validation: ImageValidation, layout: ImageLayout): string {
  if (validation.ok) {
    return `image valid (add-ons: ${validation.addon_dirs.join(', ')})`;
  }
  const problems: string[] = [];
  if (validation.missing.length > 0) {
    problems.push(`missing ${validation.missing.join(', ')}`);
  }
  if (!validation.has_flag) {
    problems.push(`${layout.flag_file} lacks marker ${layout.flag_marker}`);
  }
  if (!validation.has_addon) {
    problems.push(`no add-on matching ${layout.addon_tokens.join(' or ')} in ${layout.addons_dir}`);
  }
  return problems.join('; ');
}

/**
 * Wraps `validateImage` as a verification probe.
 */
export function imageProbe(
  root: string,
  layout: ImageLayout,
  prober: FileProber,
  tuning: { retries: number; interval_ms: number }
): VerificationProbe {
  return {
    name: 'portable-image',
    retries: tuning.retries,
    interval_ms: tuning.interval_ms,
    async check() {
      const validation = await validateImage(root, layout, prober);
      return validation.ok ? { ok: true } : { ok: false, reason: describeValidation(validation, layout) };
    },
  };
}
