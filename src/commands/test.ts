import { join, resolve } from 'node:path';

import type { OperationResult } from '../types/result.js';
import type { StageContext } from '../lib/context.js';
import { errorMessage } from '../lib/errors.js';
import { endpointLabel, verifyRunning } from '../lib/running.js';
import { fail, failFromError, succeed } from '../lib/result.js';
import { verifyImageCommand } from './verify-image.js';

/**
 * Launches a portable image and confirms the automation endpoint comes up.
 *
 * The image must pass the same validation as `verify-image` first.
 */
export async function testCommand(imagePath: string, ctx: StageContext): Promise<OperationResult> {
  const { config, logger } = ctx;
  const root = resolve(ctx.cwd, imagePath);

  const gate = await verifyImageCommand(root, ctx);
  if (!gate.success) {
    return gate;
  }

  const endpoint = {
    host: config.endpoint.host,
    port: config.endpoint.port,
    http_path: config.endpoint.http_path,
    connect_timeout_ms: config.endpoint.connect_timeout_seconds * 1000,
  };
  const settleMs = config.timeouts.settle_seconds * 1000;
  const intervalMs = config.endpoint.interval_seconds * 1000;
  const budgetMs = settleMs + config.endpoint.tries * (intervalMs + endpoint.connect_timeout_ms);

  try {
    const check = await verifyRunning(
      {
        executable: join(root, config.image.executable),
        args: config.endpoint.launch_args,
        process_name: config.app.process_name,
        endpoint,
        settle_ms: settleMs,
        tries: config.endpoint.tries,
        interval_ms: intervalMs,
        budget_ms: budgetMs,
      },
      ctx
    );

    const details = {
      image_path: root,
      endpoint: endpointLabel(endpoint),
      attempts: String(check.attempts),
      process_seen: String(check.process_seen),
      endpoint_reachable: String(check.endpoint_reachable),
    };
    if (!check.running) {
      return fail(`Image ${root} did not reach a running state with ${details.endpoint}`, 'VerificationFailed', {
        diagnostics: check.diagnostics,
        details,
      });
    }
    return succeed(`Automation endpoint ${details.endpoint} is reachable`, { details });
  } catch (error) {
    logger.error(`Functional test aborted: ${errorMessage(error)}`);
    return failFromError(error, 'Functional test aborted');
  }
}
