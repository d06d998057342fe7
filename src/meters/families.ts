import type { CounterUnit, MeterFamily } from '../interfaces/meter.js';

// ─── Payload layouts ──────────────────────────────────────────────────────────

export type ByteOrder = 'le' | 'be';

/** An integer field at a fixed offset. */
export interface IntField {
  offset: number;
  /** 1–4 bytes. */
  length: number;
  order: ByteOrder;
  signed?: boolean;
}

export interface PacketLayout {
  readonly family: MeterFamily;
  /** Expected value of byte 0. */
  readonly marker: number;
  readonly minLength: number;
  readonly serial: IntField;
  readonly counter: IntField;
  /** Second tariff counter; when present the counter field is tariff 1. */
  readonly tariff2?: IntField;
  /** Raw counter ÷ scale = value in `unit`. */
  readonly counterScale: number;
  readonly unit: CounterUnit;
  readonly battery?: { offset: number };
  /** Raw temperature ÷ scale = °C. */
  readonly temperature?: IntField & { scale: number };
  /** Optional trailing byte naming the active tariff; defaults to 1 when absent. */
  readonly tariffSelector?: { offset: number };
}

/**
 * One record per family. Offsets are 0-based from the start of the
 * manufacturer (or service) payload, company id already stripped.
 */
export const PACKET_LAYOUTS: Readonly<Record<MeterFamily, PacketLayout>> = {
  gas: {
    family: 'gas',
    marker: 0x80,
    minLength: 13,
    serial: { offset: 6, length: 3, order: 'le' },
    counter: { offset: 9, length: 4, order: 'le' },
    counterScale: 1000,
    unit: 'm3',
  },
  water_temperature: {
    family: 'water_temperature',
    marker: 0x80,
    minLength: 16,
    serial: { offset: 6, length: 3, order: 'be' },
    counter: { offset: 9, length: 4, order: 'le' },
    counterScale: 10,
    unit: 'l',
    battery: { offset: 13 },
    temperature: { offset: 14, length: 2, order: 'be', signed: true, scale: 10 },
  },
  water_dual_tariff: {
    family: 'water_dual_tariff',
    marker: 0x0e,
    minLength: 17,
    serial: { offset: 6, length: 3, order: 'le' },
    counter: { offset: 9, length: 4, order: 'le' },
    tariff2: { offset: 13, length: 4, order: 'le' },
    counterScale: 1000,
    unit: 'm3',
    tariffSelector: { offset: 17 },
  },
};

/** Every marker byte a known layout starts with. */
export const KNOWN_MARKERS: ReadonlySet<number> = new Set(
  Object.values(PACKET_LAYOUTS).map((l) => l.marker),
);

// ─── Address prefix tables ────────────────────────────────────────────────────

export interface PrefixTable {
  family: MeterFamily;
  /** Lowercase colon-separated address prefixes (first three octets). */
  prefixes: readonly string[];
}

/** Checked in order; the first table with a matching prefix wins. */
export const PREFIX_TABLES: readonly PrefixTable[] = [
  {
    // SGBT-1.8, SGBT-3.2, SGBT-4.0, SGBT-4.0 TK, SONIK G4TK
    family: 'gas',
    prefixes: ['b0:10:01', 'b0:11:01', 'b0:12:01', 'b0:32:01', 'b0:42:01'],
  },
  {
    // SVD-15, SVD-20 and their hot-water variants
    family: 'water_temperature',
    prefixes: ['b0:01:02', 'b0:02:02', 'b0:03:02', 'b0:04:02', 'b0:05:02', 'b0:06:02'],
  },
  {
    // SVT-15, SVT-20
    family: 'water_dual_tariff',
    prefixes: ['b0:11:02', 'b0:12:02'],
  },
];

// ─── Vendor signature ────────────────────────────────────────────────────────

export const ELEHANT_MANUFACTURER_ID = 0xffff;
export const ELEHANT_SERVICE_UUID = '0000fff000001000800000805f9b34fb';
export const ELEHANT_NAME_TAG = 'ELEHANT';
