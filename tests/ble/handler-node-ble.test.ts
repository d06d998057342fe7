import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { BlueZAdvertisementSource } from '../../src/ble/handler-node-ble.js';
import { TransportError } from '../../src/utils/error.js';
import type { RawAdvertisement } from '../../src/interfaces/meter.js';

const { device, adapter, bluetooth, destroy } = vi.hoisted(() => {
  const device = {
    getRSSI: vi.fn(),
    getName: vi.fn(),
    getManufacturerData: vi.fn(),
    getServiceData: vi.fn(),
  };
  const adapter = {
    isPowered: vi.fn(),
    isDiscovering: vi.fn(),
    startDiscovery: vi.fn(),
    stopDiscovery: vi.fn(),
    devices: vi.fn(),
    getDevice: vi.fn(),
  };
  const bluetooth = {
    defaultAdapter: vi.fn(),
    getAdapter: vi.fn(),
  };
  const destroy = vi.fn();
  return { device, adapter, bluetooth, destroy };
});

vi.mock('node-ble', () => ({
  default: { createBluetooth: () => ({ bluetooth, destroy }) },
}));

vi.spyOn(console, 'log').mockImplementation(() => {});

const ADDR = 'B0:03:02:00:2B:C1';

function handlers() {
  const seen: RawAdvertisement[] = [];
  const errors: Error[] = [];
  return {
    seen,
    errors,
    onAdvertisement: (adv: RawAdvertisement) => seen.push(adv),
    onError: (err: Error) => errors.push(err),
  };
}

beforeEach(() => {
  vi.useFakeTimers();
  vi.clearAllMocks();
  bluetooth.defaultAdapter.mockResolvedValue(adapter);
  bluetooth.getAdapter.mockResolvedValue(adapter);
  adapter.isPowered.mockResolvedValue(true);
  adapter.isDiscovering.mockResolvedValue(true);
  adapter.startDiscovery.mockResolvedValue(undefined);
  adapter.stopDiscovery.mockResolvedValue(undefined);
  adapter.devices.mockResolvedValue([ADDR]);
  adapter.getDevice.mockResolvedValue(device);
  device.getRSSI.mockResolvedValue(-60);
  device.getName.mockResolvedValue('meter');
  device.getManufacturerData.mockResolvedValue({ '65535': { value: Buffer.from([0x80, 0x01]) } });
  device.getServiceData.mockResolvedValue({});
});

afterEach(() => {
  vi.useRealTimers();
});

describe('BlueZAdvertisementSource', () => {
  it('reports cached devices and only re-reports them when they change', async () => {
    const source = new BlueZAdvertisementSource();
    const h = handlers();
    await source.start(h);

    await vi.advanceTimersByTimeAsync(0);
    expect(h.seen).toHaveLength(1);
    expect(h.seen[0]).toMatchObject({ address: ADDR, name: 'meter', rssi: -60 });
    expect(h.seen[0].manufacturerData?.get(0xffff)).toEqual(Buffer.from([0x80, 0x01]));

    await vi.advanceTimersByTimeAsync(1_000);
    expect(h.seen).toHaveLength(1);

    device.getRSSI.mockResolvedValue(-58);
    await vi.advanceTimersByTimeAsync(1_000);
    expect(h.seen).toHaveLength(2);
    expect(h.seen[1].rssi).toBe(-58);

    await source.stop();
  });

  it('skips devices without an RSSI', async () => {
    device.getRSSI.mockRejectedValue(new Error('No such property'));
    const source = new BlueZAdvertisementSource();
    const h = handlers();
    await source.start(h);

    await vi.advanceTimersByTimeAsync(0);
    expect(h.seen).toHaveLength(0);
    expect(h.errors).toHaveLength(0);
    await source.stop();
  });

  it('uses the named adapter when configured', async () => {
    const source = new BlueZAdvertisementSource('hci1');
    await source.start(handlers());
    expect(bluetooth.getAdapter).toHaveBeenCalledWith('hci1');
    expect(bluetooth.defaultAdapter).not.toHaveBeenCalled();
    await source.stop();
  });

  it('rejects when the adapter is not powered', async () => {
    adapter.isPowered.mockResolvedValue(false);
    const source = new BlueZAdvertisementSource();

    await expect(source.start(handlers())).rejects.toBeInstanceOf(TransportError);
    expect(destroy).toHaveBeenCalledOnce();
  });

  it('continues when discovery is already owned by another client', async () => {
    adapter.startDiscovery.mockRejectedValue(new Error('InProgress'));
    const source = new BlueZAdvertisementSource();

    await source.start(handlers());
    expect(adapter.stopDiscovery).not.toHaveBeenCalled();
    await source.stop();
  });

  it('abandons a start cancelled by stop() during adapter lookup', async () => {
    let resolveAdapter: (value: typeof adapter) => void = () => {};
    bluetooth.defaultAdapter.mockReturnValue(
      new Promise<typeof adapter>((resolve) => {
        resolveAdapter = resolve;
      }),
    );
    const source = new BlueZAdvertisementSource();
    const started = source.start(handlers());

    await source.stop();
    resolveAdapter(adapter);

    await expect(started).rejects.toThrow('Scan start cancelled by stop()');
    expect(adapter.startDiscovery).not.toHaveBeenCalled();
    expect(destroy).toHaveBeenCalledOnce();
  });

  it('ends discovery when stop() lands while discovery starts', async () => {
    const source = new BlueZAdvertisementSource();
    adapter.startDiscovery.mockImplementation(async () => {
      await source.stop();
    });

    await expect(source.start(handlers())).rejects.toThrow('Scan start cancelled by stop()');
    expect(adapter.stopDiscovery).toHaveBeenCalledOnce();
    expect(destroy).toHaveBeenCalledOnce();

    await vi.advanceTimersByTimeAsync(5_000);
    expect(adapter.devices).not.toHaveBeenCalled();
  });

  it('wraps adapter lookup failures', async () => {
    bluetooth.defaultAdapter.mockRejectedValue(new Error('No adapter found'));
    const source = new BlueZAdvertisementSource();

    await expect(source.start(handlers())).rejects.toThrow('BlueZ unavailable: No adapter found');
  });

  it('reports a failure when discovery stops underneath it', async () => {
    const source = new BlueZAdvertisementSource();
    const h = handlers();
    await source.start(h);
    await vi.advanceTimersByTimeAsync(0);

    adapter.isDiscovering.mockResolvedValue(false);
    await vi.advanceTimersByTimeAsync(1_000);
    await vi.advanceTimersByTimeAsync(5_000);

    expect(h.errors.map((e) => e.message)).toEqual(['BlueZ discovery stopped']);
    await source.stop();
  });

  it('stop ends discovery, releases D-Bus and stops polling', async () => {
    const source = new BlueZAdvertisementSource();
    const h = handlers();
    await source.start(h);
    await vi.advanceTimersByTimeAsync(0);

    await source.stop();
    expect(adapter.stopDiscovery).toHaveBeenCalledOnce();
    expect(destroy).toHaveBeenCalledOnce();

    adapter.devices.mockClear();
    await vi.advanceTimersByTimeAsync(5_000);
    expect(adapter.devices).not.toHaveBeenCalled();
  });
});
