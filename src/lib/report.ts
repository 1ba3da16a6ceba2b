/**
 * Console rendering of stage results.
 */

import type { OperationResult } from '../types/result.js';

/**
 * Renders a result for the terminal, or as JSON for scripts.
 *
 * @example
 * ```typescript
 * renderResult(succeed('Installed'), false); // "[OK] Installed"
 * ```
 */
export function renderResult(result: OperationResult, json: boolean): string {
  if (json) {
    return JSON.stringify(result, null, 2);
  }

  const lines: string[] = [];
  if (result.success) {
    lines.push(`[OK] ${result.message ?? ''}`.trimEnd());
  } else {
    lines.push(`[FAIL] ${result.error_kind ?? 'Error'}: ${result.error ?? ''}`.trimEnd());
  }

  const details = Object.entries(result.details ?? {});
  if (details.length > 0) {
    const width = Math.max(...details.map(([key]) => key.length));
    for (const [key, value] of details) {
      lines.push(`  ${key.padEnd(width)}  ${value}`);
    }
  }

  if (result.diagnostics.length > 0) {
    lines.push('Diagnostics:');
    for (const line of result.diagnostics) {
      lines.push(`  - ${line}`);
    }
  }
  return lines.join('\n');
}
