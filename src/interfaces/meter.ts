/** Mutually incompatible Elehant product lines, each with its own payload layout. */
export type MeterFamily = 'gas' | 'water_temperature' | 'water_dual_tariff';

/** Medium a meter measures, as named in config.yaml. */
export type MeterType = 'water' | 'gas';

/** Base unit of a decoded counter. */
export type CounterUnit = 'l' | 'm3';

/** Serial number as a canonical decimal string (3-byte unsigned integer). */
export type DeviceIdentity = string;

/**
 * One BLE advertisement as delivered by the radio layer.
 * Manufacturer data is keyed by the 16-bit company id, with the id bytes stripped.
 */
export interface RawAdvertisement {
  address: string;
  name?: string;
  rssi: number;
  manufacturerData?: ReadonlyMap<number, Buffer>;
  serviceData?: ReadonlyMap<string, Buffer>;
  serviceUuids?: readonly string[];
}

/** Values carried in a meter payload, before radio metadata is attached. */
export interface MeterPayload {
  serial: DeviceIdentity;
  counterRaw: number;
  /** counterRaw divided by the family's scale, in `unit`. */
  counterValue: number;
  unit: CounterUnit;
  /** Degrees Celsius, one decimal place. */
  temperature?: number;
  batteryPercent?: number;
  tariff1?: number;
  tariff2?: number;
  activeTariff?: number;
}

export interface Reading extends MeterPayload {
  signalStrength: number;
  /** Wall-clock milliseconds when the advertisement was processed; may step backwards. */
  observedAt: number;
}

export interface ConfiguredMeter {
  id: DeviceIdentity;
  type: MeterType;
  name: string;
}

export const FAMILY_TYPE: Record<MeterFamily, MeterType> = {
  gas: 'gas',
  water_temperature: 'water',
  water_dual_tariff: 'water',
};
