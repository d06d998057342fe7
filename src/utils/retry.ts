import type { Logger } from '../logger.js';
import type { ExportResult } from '../interfaces/exporter.js';
import { sleep } from './async.js';
import { errMsg } from './error.js';

export interface RetryOptions {
  /** Maximum number of retry attempts (default: 2). Total attempts = maxRetries + 1. */
  maxRetries?: number;
  /** Delay before each retry, multiplied by the attempt number (default: 0). */
  delayMs?: number;
  log: Logger;
  /** Label for log messages (e.g. 'MQTT publish', 'webhook'). */
  label: string;
}

/**
 * Execute an async operation with retries, returning an ExportResult.
 *
 * `fn` should throw on failure. A returned `{ success: false }` is retried too.
 */
export async function withRetry(
  fn: () => Promise<ExportResult>,
  opts: RetryOptions,
): Promise<ExportResult> {
  const maxRetries = opts.maxRetries ?? 2;
  const delayMs = opts.delayMs ?? 0;
  let lastError: string | undefined;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    if (attempt > 0) {
      opts.log.info(`Retrying ${opts.label} (${attempt}/${maxRetries})...`);
      if (delayMs > 0) await sleep(delayMs * attempt);
    }

    try {
      const result = await fn();
      if (result.success) return result;
      lastError = result.error;
      opts.log.error(`${opts.label} failed: ${lastError}`);
    } catch (err) {
      lastError = errMsg(err);
      opts.log.error(`${opts.label} failed: ${lastError}`);
    }
  }

  return { success: false, error: lastError ?? `All ${opts.label} attempts failed` };
}
