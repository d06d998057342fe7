import type { DeviceIdentity, MeterFamily, Reading } from './interfaces/meter.js';
import { createLogger } from './logger.js';
import { errMsg } from './utils/error.js';

const log = createLogger('Store');

export interface StoreEntry {
  identity: DeviceIdentity;
  family: MeterFamily;
  reading: Reading;
  /** Position of this update among all updates to the store; strictly increasing. */
  sequence: number;
}

export type StoreListener = (entry: StoreEntry) => void;

/**
 * Latest reading per meter for one scan session. Last write wins; entries
 * are never evicted. All access happens on the event loop, so updates need
 * no further guarding.
 */
export class ReadingStore {
  private readonly entries = new Map<DeviceIdentity, StoreEntry>();
  private readonly listeners = new Set<StoreListener>();
  private sequence = 0;

  update(identity: DeviceIdentity, reading: Reading, family: MeterFamily): void {
    const entry: StoreEntry = { identity, family, reading, sequence: ++this.sequence };
    this.entries.set(identity, entry);

    for (const listener of this.listeners) {
      try {
        listener(entry);
      } catch (err) {
        log.error(`Store listener failed for ${identity}: ${errMsg(err)}`);
      }
    }
  }

  get(identity: DeviceIdentity): Reading | undefined {
    return this.entries.get(identity)?.reading;
  }

  getEntry(identity: DeviceIdentity): StoreEntry | undefined {
    return this.entries.get(identity);
  }

  /** Snapshot of all current entries. */
  getAll(): ReadonlyMap<DeviceIdentity, StoreEntry> {
    return new Map(this.entries);
  }

  get size(): number {
    return this.entries.size;
  }

  /** Register for update notifications. Returns an unsubscribe function. */
  subscribe(listener: StoreListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
