import type { MqttExporterEntry, WebhookExporterEntry } from '../config/schema.js';
import type { MeterReport } from '../interfaces/exporter.js';

export interface MqttConfig {
  brokerUrl: string;
  /** Base topic; each meter publishes to `<topic>/<id>`. */
  topic: string;
  qos: 0 | 1 | 2;
  retain: boolean;
  username?: string;
  password?: string;
  clientId: string;
}

export interface WebhookConfig {
  url: string;
  method: 'POST' | 'PUT';
  headers: Record<string, string>;
  timeout: number;
}

export function toMqttConfig(entry: MqttExporterEntry): MqttConfig {
  return {
    brokerUrl: entry.broker_url,
    topic: entry.topic.replace(/\/+$/, ''),
    qos: entry.qos,
    retain: entry.retain,
    username: entry.username,
    password: entry.password,
    clientId: entry.client_id,
  };
}

export function toWebhookConfig(entry: WebhookExporterEntry): WebhookConfig {
  return {
    url: entry.url,
    method: entry.method,
    headers: entry.headers,
    timeout: entry.timeout,
  };
}

// --- Wire payload ---

export interface ReportPayload {
  id: string;
  name: string;
  type: string;
  family: string;
  counter_value: number;
  counter_raw: number;
  unit: string;
  temperature?: number;
  battery_level?: number;
  tariff_1?: number;
  tariff_2?: number;
  active_tariff?: number;
  rssi: number;
  last_seen: string;
}

/** Flatten a report into the JSON object exporters send. Absent fields are omitted. */
export function toReportPayload({ meter, family, reading }: MeterReport): ReportPayload {
  const payload: ReportPayload = {
    id: meter.id,
    name: meter.name,
    type: meter.type,
    family,
    counter_value: reading.counterValue,
    counter_raw: reading.counterRaw,
    unit: reading.unit,
    rssi: reading.signalStrength,
    last_seen: new Date(reading.observedAt).toISOString(),
  };
  if (reading.temperature !== undefined) payload.temperature = reading.temperature;
  if (reading.batteryPercent !== undefined) payload.battery_level = reading.batteryPercent;
  if (reading.tariff1 !== undefined) payload.tariff_1 = reading.tariff1;
  if (reading.tariff2 !== undefined) payload.tariff_2 = reading.tariff2;
  if (reading.activeTariff !== undefined) payload.active_tariff = reading.activeTariff;
  return payload;
}
