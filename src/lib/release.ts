/**
 * Release discovery from the NV Access download listing.
 */

const VERSION_RE = /^\d+\.\d+(\.\d+)?$/;

export interface ReleaseInfo {
  version: string;
  url: string;
  /** Where the version came from */
  source: 'requested' | 'stable-link' | 'listing' | 'fallback';
}

export function isValidVersion(version: string): boolean {
  return VERSION_RE.test(version);
}

/**
 * Picks the latest stable version from a directory listing.
 *
 * Prefers the `stable -> x.y.z` symlink entry; otherwise takes the first
 * `YYYY.N.N` entry that is not a beta or release candidate. Tags are
 * stripped from HTML listings before matching.
 *
 * @returns The version and how it was found, or null if neither form matched
 */
export function parseStableVersion(
  listing: string
): { version: string; source: 'stable-link' | 'listing' } | null {
  const lines = listing.split(/\r?\n/).map((line) => line.replace(/<[^>]*>/g, '').trim());

  for (const line of lines) {
    if (!line.includes('stable') || !line.includes('->')) continue;
    const match = line.match(/stable\s+\\?->\s+[./]*(\d+\.\d+\.\d+)/);
    if (match) {
      return { version: match[1], source: 'stable-link' };
    }
  }

  for (const line of lines) {
    const match = line.match(/^(\d{4}\.\d+\.\d+)(\/|\s|$)/);
    if (match && !/beta|rc/i.test(line)) {
      return { version: match[1], source: 'listing' };
    }
  }

  return null;
}

/**
 * Installer URL for a version.
 *
 * @example
 * ```typescript
 * installerUrl('https://download.nvaccess.org/releases', '2024.4.2');
 * // 'https://download.nvaccess.org/releases/2024.4.2/nvda_2024.4.2.exe'
 * ```
 */
export function installerUrl(baseUrl: string, version: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${version}/nvda_${version}.exe`;
}
