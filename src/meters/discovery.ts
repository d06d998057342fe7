import type { RawAdvertisement } from '../interfaces/meter.js';
import { FAMILY_TYPE } from '../interfaces/meter.js';
import { describeDecodeError } from './decoder.js';
import { hasVendorSignature } from './filter.js';
import { classifyFamily } from './identity.js';
import type { PipelineOutcome } from './pipeline.js';

export type AcceptedOutcome = Extract<PipelineOutcome, { status: 'accepted' }>;

/** True when an advertisement looks like it came from an Elehant meter. */
export function isLikelyMeter(adv: RawAdvertisement): boolean {
  return classifyFamily(adv.address) !== null || hasVendorSignature(adv);
}

/** One-line summary of what the pipeline made of an advertisement. */
export function describeOutcome(outcome: PipelineOutcome): string {
  switch (outcome.status) {
    case 'filtered':
      return 'not a meter advertisement';
    case 'unknown_family':
      return 'unknown address prefix';
    case 'bad_address':
      return `malformed address (${outcome.family})`;
    case 'decode_failed':
      return `${outcome.family} ${outcome.identity}: ${describeDecodeError(outcome.error)}`;
    case 'identity_mismatch':
      return `serial mismatch (address ${outcome.addressIdentity}, payload ${outcome.payloadIdentity})`;
    case 'accepted':
      return `${outcome.family} ${outcome.identity}: ${outcome.reading.counterValue} ${outcome.reading.unit}`;
  }
}

/** `meters:` block for config.yaml, one entry per decoded meter. */
export function formatMetersYaml(found: readonly AcceptedOutcome[]): string {
  const lines = ['meters:'];
  for (const o of found) {
    lines.push(`  - id: ${o.identity}`);
    lines.push(`    type: ${FAMILY_TYPE[o.family]}`);
    lines.push(`    name: Meter ${o.identity}`);
  }
  return lines.join('\n');
}
