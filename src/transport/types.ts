/**
 * Transport capability consumed by the Aranet4 core.
 *
 * Any BLE stack can drive discovery and device reads by implementing these
 * interfaces. UUIDs are lowercase, dashed, 128-bit strings (see normalizeUuid).
 */

/**
 * A GATT characteristic addressed by its own UUID and its service's UUID.
 */
export interface Characteristic {
  readonly uuid: string;
  readonly serviceUuid: string;
}

export interface ScanFilter {
  /** Only report peripherals advertising one of these services */
  services: string[];
}

export type CentralEvent =
  | { type: 'deviceDiscovered'; id: string }
  | { type: 'deviceUpdated'; id: string }
  | { type: 'deviceConnected'; id: string }
  | { type: 'deviceDisconnected'; id: string }
  | {
      type: 'manufacturerDataAdvertisement';
      id: string;
      /** Payloads keyed by 16-bit company identifier, ID prefix stripped */
      manufacturerData: ReadonlyMap<number, Uint8Array>;
    }
  | {
      type: 'serviceDataAdvertisement';
      id: string;
      serviceData: ReadonlyMap<string, Uint8Array>;
    }
  | { type: 'servicesAdvertisement'; id: string; services: readonly string[] };

export type CentralEventType = CentralEvent['type'];

/**
 * Connectable BLE device.
 */
export interface BlePeripheral {
  readonly id: string;

  /** Hardware address (empty when the platform hides it) */
  readonly address: string;

  isConnected(): Promise<boolean>;
  connect(): Promise<void>;
  disconnect(): Promise<void>;

  /** Enumerate services and characteristics */
  discoverServices(): Promise<void>;

  /** Services found by the last discovery */
  services(): ReadonlySet<string>;

  read(characteristic: Characteristic): Promise<Uint8Array>;
}

/**
 * One local Bluetooth controller.
 */
export interface BleAdapter {
  readonly id: string;

  startScan(filter: ScanFilter): Promise<void>;
  stopScan(): Promise<void>;

  /**
   * Subscribe to central events. The returned sequence ends when the adapter
   * goes away or when `signal` is aborted.
   */
  events(signal: AbortSignal): Promise<AsyncIterable<CentralEvent>>;

  /** Look up a peripheral previously reported by this adapter */
  peripheral(id: string): Promise<BlePeripheral | undefined>;
}

export interface BleCentral {
  adapters(): Promise<BleAdapter[]>;
}

const BLUETOOTH_BASE_UUID_SUFFIX = '-0000-1000-8000-00805f9b34fb';

/**
 * Normalize a UUID to lowercase dashed 128-bit form.
 *
 * Accepts 16-bit ("fce0"), 32-bit and undashed 128-bit forms.
 */
export function normalizeUuid(uuid: string): string {
  const hex = uuid.toLowerCase().replace(/[^0-9a-f]/g, '');
  if (hex.length === 4) {
    return `0000${hex}${BLUETOOTH_BASE_UUID_SUFFIX}`;
  }
  if (hex.length === 8) {
    return `${hex}${BLUETOOTH_BASE_UUID_SUFFIX}`;
  }
  if (hex.length === 32) {
    return (
      `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-` +
      `${hex.slice(16, 20)}-${hex.slice(20)}`
    );
  }
  return uuid.toLowerCase();
}
