import { resolve } from 'node:path';

import type { OperationResult } from '../types/result.js';
import type { StageContext } from '../lib/context.js';
import { describeValidation, validateImage } from '../lib/image.js';
import { fail, succeed } from '../lib/result.js';

/**
 * Checks that a directory is a complete portable image.
 */
export async function verifyImageCommand(imagePath: string, ctx: StageContext): Promise<OperationResult> {
  const { config, prober, logger } = ctx;
  const root = resolve(ctx.cwd, imagePath);

  if (!(await prober.isDirectory(root))) {
    return fail(`Image directory not found: ${root}`, 'PathNotFound');
  }

  const validation = await validateImage(root, config.image, prober);
  const summary = describeValidation(validation, config.image);
  const details = {
    image_path: root,
    has_flag: String(validation.has_flag),
    has_addon: String(validation.has_addon),
    missing: validation.missing.join(','),
  };

  if (!validation.ok) {
    logger.warn(`Image ${root} invalid: ${summary}`);
    return fail(`Image ${root} is not valid: ${summary}`, 'VerificationFailed', {
      diagnostics: [summary],
      details,
    });
  }

  logger.info(`Image ${root}: ${summary}`);
  return succeed(`Image ${root} is valid`, {
    details: { ...details, addon_dirs: validation.addon_dirs.join(',') },
  });
}
