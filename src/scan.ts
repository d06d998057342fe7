#!/usr/bin/env node

import './env.js';

import { createAdvertisementSource } from './ble/index.js';
import { sleep } from './utils/async.js';
import type { AcceptedOutcome } from './meters/discovery.js';
import { describeOutcome, formatMetersYaml, isLikelyMeter } from './meters/discovery.js';
import { normalizeAddress } from './meters/identity.js';
import type { PipelineOutcome } from './meters/pipeline.js';
import { processAdvertisement } from './meters/pipeline.js';
import { errMsg } from './utils/error.js';

const SCAN_DURATION_MS = 15_000;

async function main(): Promise<void> {
  const source = await createAdvertisementSource({ driver: 'auto' });
  const seen = new Map<string, PipelineOutcome>();

  console.log(`Scanning for Elehant meters... (${SCAN_DURATION_MS / 1000} seconds)\n`);

  await source.start({
    onAdvertisement(adv) {
      if (!isLikelyMeter(adv)) return;
      const address = normalizeAddress(adv.address) ?? adv.address;
      const previous = seen.get(address);
      if (previous?.status === 'accepted') return;

      const outcome = processAdvertisement(adv);
      if (!previous || outcome.status === 'accepted') {
        console.log(`  ${address}  RSSI ${adv.rssi}  ${describeOutcome(outcome)}`);
      }
      seen.set(address, outcome);
    },
    onError(err) {
      console.error(`Scan error: ${err.message}`);
    },
  });

  try {
    await sleep(SCAN_DURATION_MS);
  } finally {
    await source.stop();
  }

  const decoded = [...seen.values()].filter(
    (o): o is AcceptedOutcome => o.status === 'accepted',
  );

  console.log(`\nDone. Found ${seen.size} candidate device(s).`);
  if (decoded.length === 0) {
    console.log('\nNo meters decoded. Make sure the meters are within range.');
    return;
  }

  console.log(`\n--- Decoded meters (${decoded.length}) ---`);
  for (const o of decoded) {
    console.log(`  ${o.identity}  ${o.family}  ${o.reading.counterValue} ${o.reading.unit}`);
  }
  console.log('\nAdd to config.yaml:\n');
  console.log(formatMetersYaml(decoded));
}

main().catch((err: unknown) => {
  console.error(`Error: ${errMsg(err)}`);
  process.exit(1);
});
