import type { ConfiguredMeter, DeviceIdentity } from './interfaces/meter.js';
import type { Exporter, MeterReport } from './interfaces/exporter.js';
import type { ReadingStore } from './store.js';
import { dispatchExports } from './exporters/dispatch.js';
import { createLogger } from './logger.js';
import { errMsg } from './utils/error.js';

const log = createLogger('Publish');

export interface ReadingPublisherOptions {
  store: ReadingStore;
  meters: readonly ConfiguredMeter[];
  exporters: Exporter[];
  intervalMs: number;
}

export interface PendingReport extends MeterReport {
  sequence: number;
}

/**
 * Periodically hands readings that changed since the last successful
 * dispatch to the exporters. A failed dispatch leaves them pending for the
 * next tick.
 */
export class ReadingPublisher {
  private readonly store: ReadingStore;
  private readonly meters: ReadonlyMap<DeviceIdentity, ConfiguredMeter>;
  private readonly exporters: Exporter[];
  private readonly intervalMs: number;
  /** Store sequence of the last entry each meter had delivered. */
  private readonly lastPublished = new Map<DeviceIdentity, number>();

  private timer: ReturnType<typeof setInterval> | undefined;
  private inFlight: Promise<boolean> | null = null;

  constructor(opts: ReadingPublisherOptions) {
    this.store = opts.store;
    this.meters = new Map(opts.meters.map((m) => [m.id, m]));
    this.exporters = opts.exporters;
    this.intervalMs = opts.intervalMs;
  }

  start(): void {
    if (this.timer) return;
    log.debug(`Publishing every ${this.intervalMs / 1000}s`);
    this.timer = setInterval(() => {
      this.tick().catch((err: unknown) => {
        log.error(`Publish failed: ${errMsg(err)}`);
      });
    }, this.intervalMs);
  }

  /** Reports for configured meters updated since the last reading delivered. */
  pendingReports(): PendingReport[] {
    const reports: PendingReport[] = [];
    for (const [identity, entry] of this.store.getAll()) {
      const meter = this.meters.get(identity);
      if (!meter) continue;
      const last = this.lastPublished.get(identity);
      if (last !== undefined && entry.sequence <= last) continue;
      reports.push({ meter, family: entry.family, reading: entry.reading, sequence: entry.sequence });
    }
    return reports;
  }

  /** Publish pending readings. Overlapping calls share the dispatch in flight. */
  tick(): Promise<boolean> {
    if (!this.inFlight) {
      this.inFlight = this.publish().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private async publish(): Promise<boolean> {
    const reports = this.pendingReports();
    if (reports.length === 0) {
      log.debug('No new readings to publish.');
      return true;
    }

    const ok = await dispatchExports(this.exporters, reports);
    if (ok) {
      for (const { meter, sequence } of reports) {
        this.lastPublished.set(meter.id, sequence);
      }
    }
    return ok;
  }

  /** Stop the timer, wait for any dispatch in flight, then publish what is left. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    if (this.inFlight) await this.inFlight;
    await this.tick();
  }
}
