import type { MqttClient } from 'mqtt';
import { createLogger } from '../logger.js';
import type { Exporter, ExportResult, MeterReport } from '../interfaces/exporter.js';
import type { MqttConfig } from './config.js';
import { toReportPayload } from './config.js';
import { withRetry } from '../utils/retry.js';
import { errMsg } from '../utils/error.js';

const log = createLogger('MQTT');

const CONNECT_TIMEOUT_MS = 10_000;

export class MqttExporter implements Exporter {
  readonly name = 'mqtt';
  private readonly config: MqttConfig;

  constructor(config: MqttConfig) {
    this.config = config;
  }

  private async connect(clientId: string, timeoutMessage: string): Promise<MqttClient> {
    const { connectAsync } = await import('mqtt');
    const { brokerUrl, username, password } = this.config;
    let timer: ReturnType<typeof setTimeout> | undefined;
    try {
      return await Promise.race([
        connectAsync(brokerUrl, {
          clientId,
          username,
          password,
          connectTimeout: CONNECT_TIMEOUT_MS,
        }),
        new Promise<never>((_resolve, reject) => {
          timer = setTimeout(() => reject(new Error(timeoutMessage)), CONNECT_TIMEOUT_MS + 2_000);
        }),
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  async healthcheck(): Promise<ExportResult> {
    try {
      const client = await this.connect(
        `${this.config.clientId}-healthcheck`,
        'MQTT healthcheck timed out',
      );
      await client.endAsync();
      return { success: true };
    } catch (err) {
      return { success: false, error: errMsg(err) };
    }
  }

  async export(reports: MeterReport[]): Promise<ExportResult> {
    const { topic, qos, retain, clientId } = this.config;

    return withRetry(
      async () => {
        const client = await this.connect(clientId, 'MQTT connection timed out');
        try {
          for (const report of reports) {
            const meterTopic = `${topic}/${report.meter.id}`;
            await client.publishAsync(meterTopic, JSON.stringify(toReportPayload(report)), {
              qos,
              retain,
            });
          }
          log.info(`Published ${reports.length} reading(s) under ${topic}/ (qos=${qos}).`);
          return { success: true };
        } finally {
          await client.endAsync();
        }
      },
      { log, label: 'MQTT publish' },
    );
  }
}
