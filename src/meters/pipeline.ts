import type { DeviceIdentity, MeterFamily, RawAdvertisement, Reading } from '../interfaces/meter.js';
import type { DecodeError } from './decoder.js';
import type { PacketLayout, PrefixTable } from './families.js';
import { decodeWithLayout } from './decoder.js';
import { KNOWN_MARKERS, PACKET_LAYOUTS, PREFIX_TABLES } from './families.js';
import { isCandidate, selectPayload } from './filter.js';
import { classifyFamily, extractIdentityFromAddress } from './identity.js';

export type PipelineOutcome =
  | { status: 'filtered' }
  | { status: 'unknown_family'; address: string }
  | { status: 'bad_address'; address: string; family: MeterFamily }
  | { status: 'decode_failed'; family: MeterFamily; identity: DeviceIdentity; error: DecodeError }
  | {
      status: 'identity_mismatch';
      family: MeterFamily;
      addressIdentity: DeviceIdentity;
      payloadIdentity: DeviceIdentity;
    }
  | { status: 'accepted'; family: MeterFamily; identity: DeviceIdentity; reading: Reading };

export interface PipelineOptions {
  tables?: readonly PrefixTable[];
  layouts?: Readonly<Record<MeterFamily, PacketLayout>>;
  markers?: ReadonlySet<number>;
  now?: () => number;
}

/**
 * Run one advertisement through Filter → classify → address identity →
 * decode → cross-check. Pure apart from the clock; short-circuits on the
 * first failing step.
 */
export function processAdvertisement(
  adv: RawAdvertisement,
  opts: PipelineOptions = {},
): PipelineOutcome {
  const layouts = opts.layouts ?? PACKET_LAYOUTS;

  if (!isCandidate(adv, opts.markers ?? KNOWN_MARKERS)) return { status: 'filtered' };

  const family = classifyFamily(adv.address, opts.tables ?? PREFIX_TABLES);
  if (!family) return { status: 'unknown_family', address: adv.address };

  const identity = extractIdentityFromAddress(adv.address);
  if (!identity) return { status: 'bad_address', address: adv.address, family };

  const layout = layouts[family];
  const payload = selectPayload(adv, layout.marker) ?? Buffer.alloc(0);
  const decoded = decodeWithLayout(payload, layout);
  if (!decoded.ok) return { status: 'decode_failed', family, identity, error: decoded.error };

  if (decoded.value.serial !== identity) {
    return {
      status: 'identity_mismatch',
      family,
      addressIdentity: identity,
      payloadIdentity: decoded.value.serial,
    };
  }

  const reading: Reading = {
    ...decoded.value,
    signalStrength: adv.rssi,
    observedAt: (opts.now ?? Date.now)(),
  };
  return { status: 'accepted', family, identity, reading };
}
