import noble from '@abandonware/noble';
import type { Peripheral } from '@abandonware/noble';
import type { AdvertisementHandlers, AdvertisementSource } from './types.js';
import { fromNoblePeripheral } from './shared.js';
import { bleLog, errMsg, POWER_ON_TIMEOUT_MS } from './types.js';
import { TransportError } from '../utils/error.js';

// ─── Noble state management ───────────────────────────────────────────────────

/** Wait for the Bluetooth adapter to reach 'poweredOn' state. */
function waitForPoweredOn(): Promise<void> {
  if (noble._state === 'poweredOn') return Promise.resolve();
  return new Promise<void>((resolve, reject) => {
    const timeout = setTimeout(() => {
      noble.removeListener('stateChange', onState);
      reject(
        new TransportError(`Bluetooth adapter state: '${noble._state}' (expected 'poweredOn')`),
      );
    }, POWER_ON_TIMEOUT_MS);

    const onState = (state: string): void => {
      if (state === 'poweredOn') {
        clearTimeout(timeout);
        noble.removeListener('stateChange', onState);
        resolve();
      }
    };
    noble.on('stateChange', onState);
  });
}

// ─── Source ───────────────────────────────────────────────────────────────────

/**
 * Continuous advertisement stream over noble (HCI socket on Linux,
 * CoreBluetooth on macOS, WinRT on Windows). Duplicates are allowed so every
 * broadcast of a meter reaches the pipeline.
 */
export class NobleAdvertisementSource implements AdvertisementSource {
  readonly name = 'noble (@abandonware/noble)';
  private handlers: AdvertisementHandlers | null = null;
  private stopping = false;
  /** Bumped by start() and stop(); a start that sees it move was cancelled. */
  private run = 0;

  private readonly onDiscover = (peripheral: Peripheral): void => {
    this.handlers?.onAdvertisement(fromNoblePeripheral(peripheral));
  };

  private readonly onStateChange = (state: string): void => {
    if (state === 'poweredOn') return;
    this.fail(new TransportError(`Bluetooth adapter left 'poweredOn' (now '${state}')`));
  };

  private readonly onScanStop = (): void => {
    if (this.stopping) return;
    this.fail(new TransportError('Scanning stopped unexpectedly'));
  };

  async start(handlers: AdvertisementHandlers): Promise<void> {
    const run = ++this.run;
    await waitForPoweredOn();
    if (run !== this.run) throw new TransportError('Scan start cancelled by stop()');

    this.stopping = false;
    this.handlers = handlers;
    noble.on('discover', this.onDiscover);
    noble.on('stateChange', this.onStateChange);
    noble.on('scanStop', this.onScanStop);

    try {
      await noble.startScanningAsync([], true);
    } catch (err) {
      if (run === this.run) this.detach();
      throw new TransportError(`Failed to start scanning: ${errMsg(err)}`, { cause: err });
    }

    if (run !== this.run) {
      // stop() already detached while scanning was starting.
      await this.stopScanning();
      throw new TransportError('Scan start cancelled by stop()');
    }
    bleLog.debug('noble scanning started (duplicates allowed)');
  }

  async stop(): Promise<void> {
    this.run++;
    this.stopping = true;
    const wasActive = this.handlers !== null;
    this.detach();
    if (wasActive) await this.stopScanning();
  }

  private async stopScanning(): Promise<void> {
    try {
      await noble.stopScanningAsync();
      bleLog.debug('noble scanning stopped');
    } catch (err) {
      bleLog.debug(`stopScanning failed: ${errMsg(err)}`);
    }
  }

  private fail(err: TransportError): void {
    const handlers = this.handlers;
    if (!handlers) return;
    // One failure per subscription; the orchestrator restarts from scratch.
    this.detach();
    handlers.onError(err);
  }

  private detach(): void {
    noble.removeListener('discover', this.onDiscover);
    noble.removeListener('stateChange', this.onStateChange);
    noble.removeListener('scanStop', this.onScanStop);
    this.handlers = null;
  }
}
