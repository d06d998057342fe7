import type { AdvertisementSource, BleDriver } from './types.js';
import { bleLog } from './types.js';

export type { AdvertisementSource, AdvertisementHandlers, BleDriver } from './types.js';

export interface SourceOptions {
  /** 'auto' picks node-ble on Linux and noble elsewhere. */
  driver: BleDriver | 'auto';
  /** BlueZ adapter name (e.g. 'hci1'); node-ble only. */
  adapter?: string | null;
}

/** Resolve the configured driver (with BLE_DRIVER env override) to a concrete one. */
export function resolveDriver(
  configured: BleDriver | 'auto',
  platform: NodeJS.Platform = process.platform,
): BleDriver {
  const override = process.env.BLE_DRIVER?.toLowerCase();
  if (override === 'noble' || override === 'node-ble') return override;
  if (configured !== 'auto') return configured;
  return platform === 'linux' ? 'node-ble' : 'noble';
}

/**
 * Create the advertisement source for this host.
 * Dynamic import() ensures the unused BLE library is never loaded.
 */
export async function createAdvertisementSource(opts: SourceOptions): Promise<AdvertisementSource> {
  const driver = resolveDriver(opts.driver);

  if (driver === 'node-ble') {
    const { BlueZAdvertisementSource } = await import('./handler-node-ble.js');
    const source = new BlueZAdvertisementSource(opts.adapter ?? undefined);
    bleLog.debug(`BLE handler: ${source.name}`);
    return source;
  }

  if (opts.adapter) {
    bleLog.warn(`ble.adapter '${opts.adapter}' is ignored by the noble driver`);
  }
  const { NobleAdvertisementSource } = await import('./handler-noble.js');
  const source = new NobleAdvertisementSource();
  bleLog.debug(`BLE handler: ${source.name}`);
  return source;
}
