import type { RawAdvertisement } from '../interfaces/meter.js';
import { normalizeUuid } from './types.js';

// ─── noble → RawAdvertisement ─────────────────────────────────────────────────

/** The parts of a noble Peripheral this module reads. */
export interface NoblePeripheralLike {
  id: string;
  address: string;
  rssi: number;
  advertisement?: {
    localName?: string;
    manufacturerData?: Buffer;
    serviceData?: { uuid: string; data: Buffer }[];
    serviceUuids?: string[];
  };
}

/**
 * Split noble's raw manufacturer data into company id (first two bytes, LE)
 * and payload. Returns an empty map when fewer than two bytes are present.
 */
export function splitManufacturerData(raw: Buffer | undefined): Map<number, Buffer> {
  const map = new Map<number, Buffer>();
  if (!raw || raw.length < 2) return map;
  map.set(raw.readUInt16LE(0), raw.subarray(2));
  return map;
}

/** Get a stable device address: MAC on Windows/Linux, peripheral.id on macOS. */
export function peripheralAddress(peripheral: NoblePeripheralLike): string {
  // On macOS, peripheral.address is often empty or '<unknown>'.
  if (peripheral.address && !['', 'unknown', '<unknown>'].includes(peripheral.address)) {
    return peripheral.address.toUpperCase();
  }
  return peripheral.id;
}

export function fromNoblePeripheral(peripheral: NoblePeripheralLike): RawAdvertisement {
  const ad = peripheral.advertisement;
  const serviceData = new Map<string, Buffer>();
  for (const entry of ad?.serviceData ?? []) {
    serviceData.set(normalizeUuid(entry.uuid), entry.data);
  }
  return {
    address: peripheralAddress(peripheral),
    name: ad?.localName || undefined,
    rssi: peripheral.rssi,
    manufacturerData: splitManufacturerData(ad?.manufacturerData),
    serviceData,
    serviceUuids: (ad?.serviceUuids ?? []).map(normalizeUuid),
  };
}

// ─── BlueZ (node-ble) → RawAdvertisement ──────────────────────────────────────

/**
 * Extract bytes from a BlueZ property value. D-Bus hands byte arrays over
 * either as a Buffer, a plain number array, or wrapped in a Variant.
 */
export function variantBytes(value: unknown): Buffer | null {
  if (Buffer.isBuffer(value)) return value;
  if (Array.isArray(value) && value.every((v) => typeof v === 'number')) {
    return Buffer.from(value);
  }
  if (typeof value === 'object' && value !== null && 'value' in value) {
    return variantBytes(value.value);
  }
  return null;
}

/** Convert a BlueZ `ManufacturerData` dictionary (keys are decimal company ids). */
export function bluezManufacturerData(dict: Record<string, unknown>): Map<number, Buffer> {
  const map = new Map<number, Buffer>();
  for (const [key, value] of Object.entries(dict)) {
    const id = Number(key);
    const bytes = variantBytes(value);
    if (Number.isInteger(id) && bytes) map.set(id, bytes);
  }
  return map;
}

/** Convert a BlueZ `ServiceData` dictionary (keys are UUID strings). */
export function bluezServiceData(dict: Record<string, unknown>): Map<string, Buffer> {
  const map = new Map<string, Buffer>();
  for (const [key, value] of Object.entries(dict)) {
    const bytes = variantBytes(value);
    if (bytes) map.set(normalizeUuid(key), bytes);
  }
  return map;
}

/** A string that changes whenever anything the pipeline reads changes. */
export function advertisementFingerprint(adv: RawAdvertisement): string {
  const parts: string[] = [String(adv.rssi)];
  for (const [id, data] of adv.manufacturerData ?? []) parts.push(`m${id}=${data.toString('hex')}`);
  for (const [uuid, data] of adv.serviceData ?? []) parts.push(`s${uuid}=${data.toString('hex')}`);
  return parts.join('|');
}
