import type { ConfiguredMeter, MeterFamily, Reading } from './meter.js';

/** One meter's latest reading, as handed to exporters. */
export interface MeterReport {
  meter: ConfiguredMeter;
  family: MeterFamily;
  reading: Reading;
}

export interface ExportResult {
  success: boolean;
  error?: string;
}

export interface Exporter {
  readonly name: string;
  export(reports: MeterReport[]): Promise<ExportResult>;
  healthcheck?(): Promise<ExportResult>;
}
