import type { OperationResult } from '../types/result.js';
import type { StageContext } from '../lib/context.js';
import { errorMessage } from '../lib/errors.js';
import { installerUrl, isValidVersion, parseStableVersion, type ReleaseInfo } from '../lib/release.js';
import { fail, succeed } from '../lib/result.js';

const LISTING_TIMEOUT_MS = 30_000;

/**
 * Determines the version to package and its installer URL.
 *
 * A requested version is used as given. Otherwise the release listing is
 * read; if it cannot be fetched or parsed the configured fallback version is
 * used and the reason kept in the diagnostics.
 */
export async function resolveCommand(requested: string | undefined, ctx: StageContext): Promise<OperationResult> {
  const { config, logger } = ctx;
  const baseUrl = config.release.base_url;

  const resolved = (info: ReleaseInfo, diagnostics: string[] = []): OperationResult => {
    logger.info(`Version ${info.version} (${info.source}): ${info.url}`);
    return succeed(`Resolved version ${info.version}`, {
      diagnostics,
      details: { version: info.version, url: info.url, source: info.source },
    });
  };

  if (requested !== undefined && requested.trim() !== '') {
    const version = requested.trim();
    if (!isValidVersion(version)) {
      return fail(`Invalid version '${version}': expected YEAR.MAJOR[.MINOR]`, 'VerificationFailed');
    }
    return resolved({ version, url: installerUrl(baseUrl, version), source: 'requested' });
  }

  const listingUrl = `${baseUrl.replace(/\/+$/, '')}/`;
  let reason: string;
  try {
    const response = await ctx.fetch(listingUrl, { signal: AbortSignal.timeout(LISTING_TIMEOUT_MS) });
    if (!response.ok) {
      reason = `listing ${listingUrl} returned HTTP ${response.status}`;
    } else {
      const parsed = parseStableVersion(await response.text());
      if (parsed) {
        return resolved({ ...parsed, url: installerUrl(baseUrl, parsed.version) });
      }
      reason = `no stable version found in ${listingUrl}`;
    }
  } catch (error) {
    reason = `listing ${listingUrl} unavailable: ${errorMessage(error)}`;
  }

  const version = config.release.fallback_version;
  logger.warn(`${reason}; using fallback version ${version}`);
  return resolved({ version, url: installerUrl(baseUrl, version), source: 'fallback' }, [reason]);
}
