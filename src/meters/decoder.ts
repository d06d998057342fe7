import type { MeterFamily, MeterPayload } from '../interfaces/meter.js';
import type { IntField, PacketLayout } from './families.js';
import { PACKET_LAYOUTS } from './families.js';

// ─── Result types ─────────────────────────────────────────────────────────────

export type DecodeError =
  | { kind: 'too_short'; length: number; minLength: number }
  | { kind: 'marker_mismatch'; expected: number; actual: number }
  | { kind: 'field_out_of_range'; field: string; value: number };

export type DecodeResult =
  | { ok: true; value: MeterPayload }
  | { ok: false; error: DecodeError };

const TEMPERATURE_MIN_C = -40;
const TEMPERATURE_MAX_C = 125;

function fail(error: DecodeError): DecodeResult {
  return { ok: false, error };
}

/** Read an integer field. Callers guarantee the field lies within the buffer. */
function readField(data: Buffer, field: IntField): number {
  if (field.signed) {
    return field.order === 'le'
      ? data.readIntLE(field.offset, field.length)
      : data.readIntBE(field.offset, field.length);
  }
  return field.order === 'le'
    ? data.readUIntLE(field.offset, field.length)
    : data.readUIntBE(field.offset, field.length);
}

function hex(byte: number): string {
  return `0x${byte.toString(16).padStart(2, '0')}`;
}

export function describeDecodeError(error: DecodeError): string {
  switch (error.kind) {
    case 'too_short':
      return `payload too short: ${error.length} bytes (need ${error.minLength})`;
    case 'marker_mismatch':
      return `marker ${hex(error.actual)} (expected ${hex(error.expected)})`;
    case 'field_out_of_range':
      return `${error.field} out of range: ${error.value}`;
  }
}

// ─── Decoder ──────────────────────────────────────────────────────────────────

/**
 * Decode a payload against an explicit layout.
 *
 * Length and marker are checked before any field is read, so truncated or
 * foreign payloads produce an error instead of a partial reading.
 */
export function decodeWithLayout(payload: Buffer, layout: PacketLayout): DecodeResult {
  if (payload.length < layout.minLength) {
    return fail({ kind: 'too_short', length: payload.length, minLength: layout.minLength });
  }
  if (payload[0] !== layout.marker) {
    return fail({ kind: 'marker_mismatch', expected: layout.marker, actual: payload[0] });
  }

  const serial = String(readField(payload, layout.serial));
  const tariff1Raw = readField(payload, layout.counter);

  const value: MeterPayload = {
    serial,
    counterRaw: tariff1Raw,
    counterValue: tariff1Raw / layout.counterScale,
    unit: layout.unit,
  };

  if (layout.tariff2) {
    const tariff2Raw = readField(payload, layout.tariff2);
    // Sum the raw integers so the total carries no extra rounding.
    value.counterRaw = tariff1Raw + tariff2Raw;
    value.counterValue = value.counterRaw / layout.counterScale;
    value.tariff1 = tariff1Raw / layout.counterScale;
    value.tariff2 = tariff2Raw / layout.counterScale;

    let activeTariff = 1;
    if (layout.tariffSelector && payload.length > layout.tariffSelector.offset) {
      activeTariff = payload[layout.tariffSelector.offset];
    }
    if (activeTariff !== 1 && activeTariff !== 2) {
      return fail({ kind: 'field_out_of_range', field: 'activeTariff', value: activeTariff });
    }
    value.activeTariff = activeTariff;
  }

  if (layout.battery) {
    const battery = payload[layout.battery.offset];
    if (battery > 100) {
      return fail({ kind: 'field_out_of_range', field: 'batteryPercent', value: battery });
    }
    value.batteryPercent = battery;
  }

  if (layout.temperature) {
    const temperature = readField(payload, layout.temperature) / layout.temperature.scale;
    if (temperature < TEMPERATURE_MIN_C || temperature > TEMPERATURE_MAX_C) {
      return fail({ kind: 'field_out_of_range', field: 'temperature', value: temperature });
    }
    value.temperature = temperature;
  }

  return { ok: true, value };
}

/** Decode a payload for a known family. Never throws. */
export function decode(payload: Buffer, family: MeterFamily): DecodeResult {
  return decodeWithLayout(payload, PACKET_LAYOUTS[family]);
}
