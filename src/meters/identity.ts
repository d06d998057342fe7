import type { DeviceIdentity, MeterFamily } from '../interfaces/meter.js';
import type { PrefixTable } from './families.js';
import { PREFIX_TABLES } from './families.js';

const MAC_SEPARATED = /^[0-9a-f]{2}([:-][0-9a-f]{2}){5}$/;
const MAC_BARE = /^[0-9a-f]{12}$/;

/** Largest serial a 3-byte field can carry. */
export const MAX_SERIAL = 0xffffff;

/**
 * Parse a BLE address into its six octets.
 * Accepts `AA:BB:CC:DD:EE:FF`, `aa-bb-cc-dd-ee-ff` and `aabbccddeeff`.
 */
export function parseMac(address: string): number[] | null {
  const lower = address.trim().toLowerCase();
  if (!MAC_SEPARATED.test(lower) && !MAC_BARE.test(lower)) return null;
  const hex = lower.replace(/[:-]/g, '');
  const octets: number[] = [];
  for (let i = 0; i < 12; i += 2) {
    octets.push(parseInt(hex.slice(i, i + 2), 16));
  }
  return octets;
}

/** Canonical lowercase colon-separated address, or null if malformed. */
export function normalizeAddress(address: string): string | null {
  const octets = parseMac(address);
  if (!octets) return null;
  return octets.map((o) => o.toString(16).padStart(2, '0')).join(':');
}

/** Match an address against ordered prefix tables; first match wins. */
export function classifyFamily(
  address: string,
  tables: readonly PrefixTable[] = PREFIX_TABLES,
): MeterFamily | null {
  const normalized = normalizeAddress(address);
  if (!normalized) return null;
  for (const table of tables) {
    if (table.prefixes.some((p) => normalized.startsWith(p.toLowerCase()))) {
      return table.family;
    }
  }
  return null;
}

/** The last three address octets read as a big-endian integer, in decimal. */
export function extractIdentityFromAddress(address: string): DeviceIdentity | null {
  const octets = parseMac(address);
  if (!octets) return null;
  return String((octets[3] << 16) | (octets[4] << 8) | octets[5]);
}

/**
 * Canonical form of a serial given as text or number: decimal, no leading
 * zeros. Null if it is not an integer in 0..MAX_SERIAL.
 */
export function canonicalIdentity(raw: string | number): DeviceIdentity | null {
  const text = String(raw).trim();
  if (!/^\d+$/.test(text)) return null;
  const n = Number(text);
  if (!Number.isSafeInteger(n) || n > MAX_SERIAL) return null;
  return String(n);
}
