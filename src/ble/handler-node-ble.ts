import NodeBle from 'node-ble';
import type { RawAdvertisement } from '../interfaces/meter.js';
import type { AdvertisementHandlers, AdvertisementSource } from './types.js';
import {
  advertisementFingerprint,
  bluezManufacturerData,
  bluezServiceData,
} from './shared.js';
import { bleLog, errMsg, BLUEZ_POLL_MS, DISCOVERY_RESET_DELAY_MS } from './types.js';
import { sleep } from '../utils/async.js';
import { TransportError } from '../utils/error.js';

type Adapter = NodeBle.Adapter;

// ─── Discovery helpers ────────────────────────────────────────────────────────

/**
 * Start BlueZ discovery, tolerating a session owned by another D-Bus client
 * and resetting a stale one once. Throws if discovery cannot be started.
 */
async function startDiscoverySafe(btAdapter: Adapter): Promise<void> {
  try {
    await btAdapter.startDiscovery();
    bleLog.debug('Discovery started');
    return;
  } catch (e) {
    bleLog.debug(`startDiscovery failed: ${errMsg(e)}`);
  }

  if (await btAdapter.isDiscovering()) {
    bleLog.debug('Discovery already active (owned by another client), continuing');
    return;
  }

  try {
    await btAdapter.stopDiscovery();
  } catch {
    bleLog.debug('stopDiscovery failed (may already be stopped)');
  }
  await sleep(DISCOVERY_RESET_DELAY_MS);

  try {
    await btAdapter.startDiscovery();
    bleLog.debug('Discovery started after reset');
  } catch (e) {
    throw new TransportError(`Could not start BlueZ discovery: ${errMsg(e)}`, { cause: e });
  }
}

async function stopDiscoverySafe(btAdapter: Adapter): Promise<void> {
  try {
    await btAdapter.stopDiscovery();
    bleLog.debug('Discovery stopped');
  } catch {
    bleLog.debug('stopDiscovery failed (may already be stopped)');
  }
}

/** Read one cached device into a RawAdvertisement, or null if it has no RSSI (out of range). */
async function readDevice(btAdapter: Adapter, addr: string): Promise<RawAdvertisement | null> {
  const dev = await btAdapter.getDevice(addr);
  // BlueZ drops the RSSI property once a device is out of range.
  const rssi = Number(await dev.getRSSI().catch(() => NaN));
  if (!Number.isFinite(rssi)) return null;

  const [name, manufacturer, service] = await Promise.all([
    dev.getName().catch(() => undefined),
    dev.getManufacturerData().catch(() => ({})),
    dev.getServiceData().catch(() => ({})),
  ]);

  return {
    address: addr,
    name,
    rssi,
    manufacturerData: bluezManufacturerData(manufacturer),
    serviceData: bluezServiceData(service),
  };
}

// ─── Source ───────────────────────────────────────────────────────────────────

interface BlueZSession {
  btAdapter: Adapter;
  destroy: () => void;
  handlers: AdvertisementHandlers;
  timer: ReturnType<typeof setTimeout> | null;
  inFlight: Promise<void> | null;
  closed: boolean;
}

/**
 * Advertisement stream over BlueZ D-Bus (Linux). Discovery runs for the whole
 * session; the device cache is read every BLUEZ_POLL_MS and a device is
 * reported whenever its payload or RSSI changed since the last read.
 */
export class BlueZAdvertisementSource implements AdvertisementSource {
  readonly name = 'node-ble (BlueZ D-Bus)';
  private session: BlueZSession | null = null;
  private readonly lastSeen = new Map<string, string>();
  /** Bumped by start() and stop(); a start that sees it move was cancelled. */
  private run = 0;

  constructor(private readonly adapterName?: string) {}

  async start(handlers: AdvertisementHandlers): Promise<void> {
    const run = ++this.run;
    const cancelled = (): boolean => run !== this.run;
    const { bluetooth, destroy } = NodeBle.createBluetooth();

    let btAdapter: Adapter;
    try {
      btAdapter = this.adapterName
        ? await bluetooth.getAdapter(this.adapterName)
        : await bluetooth.defaultAdapter();
      if (cancelled()) throw new TransportError('Scan start cancelled by stop()');

      const powered = await btAdapter.isPowered();
      if (cancelled()) throw new TransportError('Scan start cancelled by stop()');
      if (!powered) {
        throw new TransportError(
          'Bluetooth adapter is not powered on. ' +
            'Ensure bluetoothd is running: sudo systemctl start bluetooth',
        );
      }
      await startDiscoverySafe(btAdapter);
    } catch (err) {
      destroy();
      if (err instanceof TransportError) throw err;
      throw new TransportError(`BlueZ unavailable: ${errMsg(err)}`, { cause: err });
    }

    if (cancelled()) {
      await stopDiscoverySafe(btAdapter);
      destroy();
      throw new TransportError('Scan start cancelled by stop()');
    }

    this.lastSeen.clear();
    this.session = { btAdapter, destroy, handlers, timer: null, inFlight: null, closed: false };
    this.schedule(this.session, 0);
  }

  async stop(): Promise<void> {
    this.run++;
    const session = this.session;
    if (!session) return;
    this.session = null;
    session.closed = true;
    if (session.timer) clearTimeout(session.timer);
    if (session.inFlight) await session.inFlight;

    await stopDiscoverySafe(session.btAdapter);
    session.destroy();
  }

  private schedule(session: BlueZSession, delayMs: number): void {
    session.timer = setTimeout(() => {
      session.timer = null;
      session.inFlight = this.poll(session).finally(() => {
        session.inFlight = null;
      });
    }, delayMs);
  }

  private async poll(session: BlueZSession): Promise<void> {
    try {
      if (!(await session.btAdapter.isDiscovering())) {
        throw new TransportError('BlueZ discovery stopped');
      }
      const addresses = await session.btAdapter.devices();
      for (const addr of addresses) {
        if (session.closed) return;
        const adv = await readDevice(session.btAdapter, addr).catch(() => null);
        if (!adv) continue;
        const fingerprint = advertisementFingerprint(adv);
        if (this.lastSeen.get(addr) === fingerprint) continue;
        this.lastSeen.set(addr, fingerprint);
        session.handlers.onAdvertisement(adv);
      }
    } catch (err) {
      if (session.closed) return;
      session.closed = true;
      session.handlers.onError(
        err instanceof TransportError
          ? err
          : new TransportError(`BlueZ poll failed: ${errMsg(err)}`, { cause: err }),
      );
      return;
    }
    if (!session.closed) this.schedule(session, BLUEZ_POLL_MS);
  }
}
