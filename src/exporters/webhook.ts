import { createLogger } from '../logger.js';
import type { Exporter, ExportResult, MeterReport } from '../interfaces/exporter.js';
import type { WebhookConfig } from './config.js';
import { toReportPayload } from './config.js';
import { withRetry } from '../utils/retry.js';
import { errMsg } from '../utils/error.js';

const log = createLogger('Webhook');

export class WebhookExporter implements Exporter {
  readonly name = 'webhook';
  private readonly config: WebhookConfig;

  constructor(config: WebhookConfig) {
    this.config = config;
  }

  async healthcheck(): Promise<ExportResult> {
    try {
      const response = await fetch(this.config.url, {
        method: 'HEAD',
        signal: AbortSignal.timeout(5000),
      });
      if (!response.ok) {
        return { success: false, error: `HTTP ${response.status}` };
      }
      return { success: true };
    } catch (err) {
      return { success: false, error: errMsg(err) };
    }
  }

  async export(reports: MeterReport[]): Promise<ExportResult> {
    const { url, method, headers, timeout } = this.config;
    const body = JSON.stringify({ meters: reports.map(toReportPayload) });

    return withRetry(
      async () => {
        const response = await fetch(url, {
          method,
          headers: { 'Content-Type': 'application/json', ...headers },
          body,
          signal: AbortSignal.timeout(timeout),
        });

        if (!response.ok) {
          throw new Error(`HTTP ${response.status}`);
        }

        log.info(`Webhook delivered ${reports.length} reading(s) (HTTP ${response.status}).`);
        return { success: true };
      },
      { log, label: 'webhook', delayMs: 1_000 },
    );
  }
}
