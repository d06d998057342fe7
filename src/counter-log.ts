import type { ConfiguredMeter, DeviceIdentity } from './interfaces/meter.js';
import type { Logger } from './logger.js';
import type { StoreListener } from './store.js';

/**
 * Store listener that logs a meter's counter at info level when it moves and
 * at debug level when a rebroadcast repeats it.
 */
export function logCounterChanges(
  meters: readonly ConfiguredMeter[],
  log: Logger,
): StoreListener {
  const names = new Map(meters.map((m) => [m.id, m.name]));
  const lastRaw = new Map<DeviceIdentity, number>();

  return ({ identity, reading }) => {
    const line = `${names.get(identity) ?? identity}: ${reading.counterValue} ${reading.unit}`;
    if (lastRaw.get(identity) === reading.counterRaw) {
      log.debug(`${line} (unchanged)`);
      return;
    }
    lastRaw.set(identity, reading.counterRaw);
    log.info(line);
  };
}
