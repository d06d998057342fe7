import type { RawAdvertisement } from '../interfaces/meter.js';
import { normalizeUuid } from '../ble/types.js';
import {
  KNOWN_MARKERS,
  ELEHANT_MANUFACTURER_ID,
  ELEHANT_NAME_TAG,
  ELEHANT_SERVICE_UUID,
} from './families.js';

/** Non-empty buffers of a data map; anything that is not a map yields nothing. */
function buffersOf<K>(map: ReadonlyMap<K, Buffer> | undefined): Buffer[] {
  if (!map || typeof map.values !== 'function') return [];
  return [...map.values()].filter((v) => Buffer.isBuffer(v) && v.length > 0);
}

function keysOf<K>(map: ReadonlyMap<K, Buffer> | undefined): K[] {
  if (!map || typeof map.keys !== 'function') return [];
  return [...map.keys()];
}

function payloadsOf(adv: RawAdvertisement): Buffer[] {
  return [...buffersOf(adv.manufacturerData), ...buffersOf(adv.serviceData)];
}

/**
 * Cheap pre-check run on every advertisement: some manufacturer or service
 * payload must start with a known marker byte.
 */
export function isCandidate(
  adv: RawAdvertisement,
  markers: ReadonlySet<number> = KNOWN_MARKERS,
): boolean {
  return payloadsOf(adv).some((p) => markers.has(p[0]));
}

/**
 * Vendor hints: Elehant service UUID, manufacturer id 0xFFFF or a name
 * containing "ELEHANT". Only used to flag devices during discovery.
 */
export function hasVendorSignature(adv: RawAdvertisement): boolean {
  if (keysOf(adv.manufacturerData).includes(ELEHANT_MANUFACTURER_ID)) return true;
  const uuids = [...keysOf(adv.serviceData), ...(adv.serviceUuids ?? [])];
  if (uuids.some((u) => normalizeUuid(u) === ELEHANT_SERVICE_UUID)) return true;
  return (adv.name ?? '').toUpperCase().includes(ELEHANT_NAME_TAG);
}

/**
 * The payload to decode for a layout: the first entry starting with the
 * layout's marker, else the first non-empty entry (which will then fail the
 * marker check with a precise error).
 */
export function selectPayload(adv: RawAdvertisement, marker: number): Buffer | null {
  const payloads = payloadsOf(adv);
  return payloads.find((p) => p[0] === marker) ?? payloads[0] ?? null;
}
