import type { Exporter } from '../interfaces/exporter.js';
import type { ExporterEntry } from '../config/schema.js';
import { toMqttConfig, toWebhookConfig } from './config.js';
import { MqttExporter } from './mqtt.js';
import { WebhookExporter } from './webhook.js';

export { runHealthchecks, dispatchExports } from './dispatch.js';

export function createExporters(entries: ExporterEntry[]): Exporter[] {
  const exporters: Exporter[] = [];

  for (const entry of entries) {
    switch (entry.type) {
      case 'mqtt':
        exporters.push(new MqttExporter(toMqttConfig(entry)));
        break;
      case 'webhook':
        exporters.push(new WebhookExporter(toWebhookConfig(entry)));
        break;
      default: {
        const _exhaustive: never = entry;
        throw new Error(`Unhandled exporter: ${JSON.stringify(_exhaustive)}`);
      }
    }
  }

  return exporters;
}
