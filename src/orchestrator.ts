import type { AdvertisementSource } from './ble/types.js';
import type {
  ConfiguredMeter,
  DeviceIdentity,
  MeterFamily,
  RawAdvertisement,
  Reading,
} from './interfaces/meter.js';
import type { PipelineOptions } from './meters/pipeline.js';
import { FAMILY_TYPE } from './interfaces/meter.js';
import { abortableSleep, withTimeout } from './utils/async.js';
import { describeDecodeError } from './meters/decoder.js';
import { canonicalIdentity } from './meters/identity.js';
import { processAdvertisement } from './meters/pipeline.js';
import { ReadingStore } from './store.js';
import { createLogger } from './logger.js';
import { AlreadyRunningError, TransportError, errMsg } from './utils/error.js';

const log = createLogger('Scan');

export type ScanState = 'idle' | 'starting' | 'running' | 'stopping' | 'error';

export interface RestartBackoff {
  /** Delay before the first restart attempt. */
  initialMs: number;
  /** Upper bound for the doubling delay. */
  maxMs: number;
}

export const DEFAULT_BACKOFF: RestartBackoff = { initialMs: 1_000, maxMs: 60_000 };
export const DEFAULT_STOP_TIMEOUT_MS = 5_000;

export interface ScanOrchestratorOptions {
  source: AdvertisementSource;
  meters: readonly ConfiguredMeter[];
  store?: ReadingStore;
  backoff?: Partial<RestartBackoff>;
  /** Upper bound on waiting for the radio layer to tear down. */
  stopTimeoutMs?: number;
  pipeline?: PipelineOptions;
}

export interface ScanStats {
  accepted: number;
  dropped: number;
  restarts: number;
}

/**
 * Owns one scan session: the radio subscription, the configured meter set
 * and the reading store.
 *
 *   idle → starting → running → stopping → idle
 *   running → error → starting   (transport failure, restart with backoff)
 */
export class ScanOrchestrator {
  readonly store: ReadingStore;
  readonly stats: ScanStats = { accepted: 0, dropped: 0, restarts: 0 };

  private readonly source: AdvertisementSource;
  private readonly meters: ReadonlyMap<DeviceIdentity, ConfiguredMeter>;
  private readonly backoff: RestartBackoff;
  private readonly stopTimeoutMs: number;
  private readonly pipeline: PipelineOptions;
  private readonly stateListeners = new Set<(state: ScanState) => void>();
  private readonly typeWarned = new Set<DeviceIdentity>();

  private _state: ScanState = 'idle';
  /** Bumped on every (re)subscription and on stop; stale callbacks compare against it. */
  private generation = 0;
  private abort: AbortController | null = null;
  /** Start or restart work in flight, awaited by stop(). Never rejects. */
  private pending: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;
  /** Deferred release of a subscription that settled after stop() stopped waiting for it. */
  private releasing: Promise<void> | null = null;
  /** Counts source.start() calls; a deferred release only applies while it is unchanged. */
  private subscriptions = 0;

  constructor(opts: ScanOrchestratorOptions) {
    this.source = opts.source;
    this.store = opts.store ?? new ReadingStore();
    this.backoff = { ...DEFAULT_BACKOFF, ...opts.backoff };
    this.stopTimeoutMs = opts.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS;
    this.pipeline = opts.pipeline ?? {};

    const meters = new Map<DeviceIdentity, ConfiguredMeter>();
    for (const meter of opts.meters) {
      const id = canonicalIdentity(meter.id) ?? meter.id;
      meters.set(id, { ...meter, id });
    }
    this.meters = meters;
  }

  get state(): ScanState {
    return this._state;
  }

  get configuredMeters(): ConfiguredMeter[] {
    return [...this.meters.values()];
  }

  /** Register for state changes; 'idle' after stop() is the session-stopped signal. */
  onStateChange(listener: (state: ScanState) => void): () => void {
    this.stateListeners.add(listener);
    return () => {
      this.stateListeners.delete(listener);
    };
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────────────

  /**
   * Subscribe to the radio. Rejects with AlreadyRunningError unless idle, and
   * with TransportError if the first subscription cannot be established.
   */
  async start(): Promise<void> {
    if (this._state !== 'idle') throw new AlreadyRunningError(this._state);

    const abort = new AbortController();
    this.abort = abort;
    const gen = ++this.generation;
    this.setState('starting');
    log.info(`Starting scan via ${this.source.name} for ${this.meters.size} meter(s)`);

    const attempt = this.subscribeAfterRelease(gen, abort.signal);
    this.pending = attempt.then(
      () => undefined,
      () => undefined,
    );

    try {
      await attempt;
    } catch (err) {
      // After stop(), teardown owns the subscription and `pending` may belong to a newer session.
      if (abort.signal.aborted) return;
      this.pending = null;
      this.abort = null;
      this.setState('idle');
      throw err instanceof TransportError
        ? err
        : new TransportError(`Failed to start scanning: ${errMsg(err)}`, { cause: err });
    }

    if (abort.signal.aborted) return;
    this.pending = null;
    this.setState('running');
    log.info('Scanning for meter advertisements...');
  }

  /** Cancel the session and release the radio. Idempotent; concurrent calls share one teardown. */
  stop(): Promise<void> {
    if (this._state === 'idle') return Promise.resolve();
    if (!this.stopping) {
      this.stopping = this.teardown().finally(() => {
        this.stopping = null;
      });
    }
    return this.stopping;
  }

  private async teardown(): Promise<void> {
    this.setState('stopping');
    this.abort?.abort();
    this.abort = null;
    // Events still queued by the old subscription are dropped from here on.
    this.generation++;

    const pending = this.pending;
    this.pending = null;
    if (pending) {
      try {
        await withTimeout(pending, this.stopTimeoutMs, 'Pending subscription did not settle');
      } catch (err) {
        log.warn(`${errMsg(err)}; it will be released once it does`);
        const subscriptions = this.subscriptions;
        this.releasing = pending.then(() => this.releaseAbandoned(subscriptions));
      }
    }
    await this.releaseSource();

    this.setState('idle');
    log.info(
      `Scan stopped (${this.stats.accepted} reading(s), ${this.stats.restarts} restart(s)).`,
    );
  }

  private subscribe(gen: number): Promise<void> {
    this.subscriptions++;
    return this.source.start({
      onAdvertisement: (adv) => this.handleAdvertisement(adv, gen),
      onError: (err) => this.handleTransportFailure(err, gen),
    });
  }

  /** Subscribe after any deferred release has run, waiting at most stopTimeoutMs. */
  private subscribeAfterRelease(gen: number, signal: AbortSignal): Promise<void> {
    const releasing = this.releasing;
    if (!releasing) return this.subscribe(gen);
    return withTimeout(releasing, this.stopTimeoutMs, 'Previous subscription was not released')
      .catch((err: unknown) => {
        log.warn(`${errMsg(err)}; starting anyway`);
      })
      .then(() => {
        if (this.releasing === releasing) this.releasing = null;
        return signal.aborted ? undefined : this.subscribe(gen);
      });
  }

  private async releaseAbandoned(subscriptions: number): Promise<void> {
    if (subscriptions !== this.subscriptions) {
      log.warn('A stale subscription settled after a new one was started; not releasing it');
      return;
    }
    log.debug('Releasing a subscription that settled after stop');
    await this.releaseSource();
  }

  private async releaseSource(): Promise<void> {
    try {
      await withTimeout(this.source.stop(), this.stopTimeoutMs, 'Radio teardown timed out');
    } catch (err) {
      log.warn(`${errMsg(err)}; continuing`);
    }
  }

  // ─── Transport failure / restart ───────────────────────────────────────────

  private handleTransportFailure(err: Error, gen: number): void {
    if (gen !== this.generation || this._state !== 'running' || !this.abort) {
      log.debug(`Ignoring transport error from a superseded subscription: ${err.message}`);
      return;
    }
    this.setState('error');
    log.warn(`Transport failure: ${err.message}. Restarting scan...`);

    const signal = this.abort.signal;
    this.pending = this.restartLoop(signal).catch((e: unknown) => {
      log.error(`Restart loop failed: ${errMsg(e)}`);
    });
  }

  private async restartLoop(signal: AbortSignal): Promise<void> {
    for (let attempt = 0; !signal.aborted; attempt++) {
      const delayMs = Math.min(this.backoff.initialMs * 2 ** attempt, this.backoff.maxMs);
      log.info(`Restart attempt ${attempt + 1} in ${delayMs}ms`);
      try {
        await abortableSleep(delayMs, signal);
      } catch {
        return;
      }

      await this.releaseSource();
      if (signal.aborted) return;

      const gen = ++this.generation;
      this.setState('starting');
      try {
        await this.subscribe(gen);
      } catch (err) {
        if (signal.aborted) return;
        this.setState('error');
        log.warn(`Restart failed: ${errMsg(err)}`);
        continue;
      }

      if (signal.aborted) return;
      this.stats.restarts++;
      this.setState('running');
      log.info('Scanning resumed.');
      return;
    }
  }

  // ─── Event processing ──────────────────────────────────────────────────────

  private handleAdvertisement(adv: RawAdvertisement, gen: number): void {
    if (gen !== this.generation || this._state !== 'running') return;

    try {
      const outcome = processAdvertisement(adv, this.pipeline);
      switch (outcome.status) {
        case 'filtered':
          log.trace(`Filtered ${adv.address}`);
          return;
        case 'unknown_family':
          log.trace(`No family for ${adv.address}`);
          return;
        case 'bad_address':
          this.stats.dropped++;
          log.debug(`Malformed address '${adv.address}' (${outcome.family})`);
          return;
        case 'decode_failed':
          this.stats.dropped++;
          log.debug(
            `Dropped ${outcome.family} ${outcome.identity}: ${describeDecodeError(outcome.error)}`,
          );
          return;
        case 'identity_mismatch':
          this.stats.dropped++;
          log.warn(
            `Identity mismatch from ${adv.address}: address says ${outcome.addressIdentity}, ` +
              `payload says ${outcome.payloadIdentity}. Dropped.`,
          );
          return;
        case 'accepted':
          this.accept(outcome.identity, outcome.family, outcome.reading);
          return;
      }
    } catch (err) {
      // The pipeline is total; this only guards the radio callback.
      log.error(`Unexpected error processing ${adv.address}: ${errMsg(err)}`);
    }
  }

  private accept(identity: DeviceIdentity, family: MeterFamily, reading: Reading): void {
    const meter = this.meters.get(identity);
    if (!meter) {
      log.debug(`Ignoring unconfigured ${family} meter ${identity}`);
      return;
    }
    if (FAMILY_TYPE[family] !== meter.type) {
      this.stats.dropped++;
      if (!this.typeWarned.has(identity)) {
        this.typeWarned.add(identity);
        log.warn(
          `Meter ${identity} (${meter.name}) is configured as ${meter.type} ` +
            `but advertises as ${family}. Ignoring its readings.`,
        );
      }
      return;
    }

    this.stats.accepted++;
    this.store.update(identity, reading, family);
    log.debug(
      `${meter.name} [${identity}]: ${reading.counterValue} ${reading.unit} (RSSI ${reading.signalStrength})`,
    );
  }

  private setState(next: ScanState): void {
    if (this._state === next) return;
    log.debug(`State: ${this._state} → ${next}`);
    this._state = next;
    for (const listener of this.stateListeners) {
      try {
        listener(next);
      } catch (err) {
        log.error(`State listener failed: ${errMsg(err)}`);
      }
    }
  }
}
