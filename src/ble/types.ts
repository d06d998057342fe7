import type { RawAdvertisement } from '../interfaces/meter.js';
import { createLogger } from '../logger.js';
export { errMsg } from '../utils/error.js';

// ─── Constants ────────────────────────────────────────────────────────────────

export const BT_BASE_UUID_SUFFIX = '00001000800000805f9b34fb';

/** How long to wait for the adapter to report 'poweredOn'. */
export const POWER_ON_TIMEOUT_MS = 10_000;

/** Interval between BlueZ device-cache reads while discovery runs. */
export const BLUEZ_POLL_MS = 1_000;

/** Delay after stopping a stale BlueZ discovery before starting it again. */
export const DISCOVERY_RESET_DELAY_MS = 500;

// ─── Types ────────────────────────────────────────────────────────────────────

export type BleDriver = 'noble' | 'node-ble';

export interface AdvertisementHandlers {
  /** Called synchronously for every observed advertisement. */
  onAdvertisement(adv: RawAdvertisement): void;
  /** Called when the subscription fails after start() resolved. */
  onError(err: Error): void;
}

/**
 * The radio layer as seen by the scan orchestrator: a stream of
 * advertisements with explicit start and stop.
 */
export interface AdvertisementSource {
  readonly name: string;
  /** Resolves once advertisements are flowing; rejects if the radio is unavailable. */
  start(handlers: AdvertisementHandlers): Promise<void>;
  /** Detach handlers and release the radio. Safe to call when not started. */
  stop(): Promise<void>;
}

// ─── Pure utilities ───────────────────────────────────────────────────────────

export const bleLog = createLogger('BLE');

/** Normalize a UUID to lowercase 32-char (no dashes) form for comparison. */
export function normalizeUuid(uuid: string): string {
  const stripped = uuid.replace(/-/g, '').toLowerCase();
  if (stripped.length === 4) {
    return `0000${stripped}${BT_BASE_UUID_SUFFIX}`;
  }
  return stripped;
}
