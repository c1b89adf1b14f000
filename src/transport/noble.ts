/**
 * Node.js BLE transport backed by @abandonware/noble.
 *
 * Noble drives a single HCI controller (selected with NOBLE_HCI_DEVICE_ID),
 * which is exposed as one adapter once it reports "poweredOn". Importing this
 * module loads noble's native bindings, so the library only loads it on
 * demand.
 */

import noble from '@abandonware/noble';
import type { Peripheral } from '@abandonware/noble';
import { TransportError, describeError } from '../exceptions';
import { createLogger } from '../logger';
import { EventQueue } from './event-queue';
import {
  normalizeUuid,
  type BleAdapter,
  type BleCentral,
  type BlePeripheral,
  type CentralEvent,
  type Characteristic,
  type ScanFilter,
} from './types';

declare module '@abandonware/noble' {
  /** Controller state; reading it initializes the HCI bindings */
  export const state: string;
}

const log = createLogger('Noble');

const SETTLED_STATES = new Set(['poweredOn', 'poweredOff', 'unauthorized', 'unsupported']);
const BASE_UUID_PATTERN = /^0000([0-9a-f]{4})00001000800000805f9b34fb$/;

/**
 * Convert a UUID to noble's form: lowercase without dashes, 16-bit when it
 * belongs to the Bluetooth base UUID.
 */
export function toNobleUuid(uuid: string): string {
  const hex = normalizeUuid(uuid).replace(/-/g, '');
  const short = BASE_UUID_PATTERN.exec(hex);
  return short ? short[1] : hex;
}

async function call<T>(what: string, operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    throw new TransportError(`${what} failed: ${describeError(error)}`, { cause: error });
  }
}

/**
 * Wait until the controller leaves its transient states.
 *
 * @returns The settled state, or the current one when the wait times out
 */
function waitForSettledState(timeoutMs: number): Promise<string> {
  if (SETTLED_STATES.has(noble.state)) {
    return Promise.resolve(noble.state);
  }

  return new Promise((resolve) => {
    const onStateChange = (state: string): void => {
      if (SETTLED_STATES.has(state)) {
        clearTimeout(timeoutId);
        noble.removeListener('stateChange', onStateChange);
        resolve(state);
      }
    };
    const timeoutId = setTimeout(() => {
      noble.removeListener('stateChange', onStateChange);
      resolve(noble.state);
    }, timeoutMs);

    noble.on('stateChange', onStateChange);
  });
}

class NoblePeripheral implements BlePeripheral {
  constructor(private readonly peripheral: Peripheral) {}

  get id(): string {
    return this.peripheral.id;
  }

  get address(): string {
    return this.peripheral.address ?? '';
  }

  async isConnected(): Promise<boolean> {
    return this.peripheral.state === 'connected';
  }

  async connect(): Promise<void> {
    await call(`Connecting to ${this.id}`, () => this.peripheral.connectAsync());
  }

  async disconnect(): Promise<void> {
    await call(`Disconnecting from ${this.id}`, () => this.peripheral.disconnectAsync());
  }

  async discoverServices(): Promise<void> {
    await call(`Service discovery on ${this.id}`, () =>
      this.peripheral.discoverAllServicesAndCharacteristicsAsync()
    );
  }

  services(): ReadonlySet<string> {
    return new Set((this.peripheral.services ?? []).map((service) => normalizeUuid(service.uuid)));
  }

  async read(characteristic: Characteristic): Promise<Uint8Array> {
    const service = (this.peripheral.services ?? []).find(
      (s) => normalizeUuid(s.uuid) === characteristic.serviceUuid
    );
    const target = service?.characteristics?.find(
      (c) => normalizeUuid(c.uuid) === characteristic.uuid
    );
    if (!target) {
      throw new TransportError(
        `Characteristic ${characteristic.uuid} not found on ${this.id}`
      );
    }

    return call(`Reading ${characteristic.uuid}`, () => target.readAsync());
  }
}

class NobleAdapter implements BleAdapter {
  private readonly peripherals = new Map<string, Peripheral>();

  constructor(readonly id: string) {}

  async startScan(filter: ScanFilter): Promise<void> {
    // Duplicates on: every advertisement carries a fresh reading.
    await call('Starting scan', () =>
      noble.startScanningAsync(filter.services.map(toNobleUuid), true)
    );
  }

  async stopScan(): Promise<void> {
    await call('Stopping scan', () => noble.stopScanningAsync());
  }

  async events(signal: AbortSignal): Promise<AsyncIterable<CentralEvent>> {
    const queue = new EventQueue<CentralEvent>();

    const onDiscover = (peripheral: Peripheral): void => {
      const known = this.peripherals.has(peripheral.id);
      this.peripherals.set(peripheral.id, peripheral);
      for (const event of toCentralEvents(peripheral, known)) {
        queue.enqueue(event);
      }
    };
    const onStateChange = (state: string): void => {
      if (state !== 'poweredOn') {
        log.warn(`Adapter ${this.id} changed state to ${state}`);
        detach();
      }
    };
    const detach = (): void => {
      noble.removeListener('discover', onDiscover);
      noble.removeListener('stateChange', onStateChange);
      queue.close();
    };

    if (signal.aborted) {
      queue.close();
      return queue;
    }

    noble.on('discover', onDiscover);
    noble.on('stateChange', onStateChange);
    signal.addEventListener('abort', detach, { once: true });

    return queue;
  }

  async peripheral(id: string): Promise<BlePeripheral | undefined> {
    const peripheral = this.peripherals.get(id);
    return peripheral ? new NoblePeripheral(peripheral) : undefined;
  }
}

/**
 * Translate one noble discover callback into central events.
 */
export function toCentralEvents(peripheral: Peripheral, known: boolean): CentralEvent[] {
  const id = peripheral.id;
  const events: CentralEvent[] = [
    known ? { type: 'deviceUpdated', id } : { type: 'deviceDiscovered', id },
  ];
  const advertisement = peripheral.advertisement;

  // Noble keeps the little-endian company ID in front of the payload.
  const manufacturerData = advertisement?.manufacturerData;
  if (manufacturerData && manufacturerData.length >= 2) {
    events.push({
      type: 'manufacturerDataAdvertisement',
      id,
      manufacturerData: new Map([
        [manufacturerData.readUInt16LE(0), Uint8Array.from(manufacturerData.subarray(2))],
      ]),
    });
  }

  const serviceData = advertisement?.serviceData ?? [];
  if (serviceData.length > 0) {
    events.push({
      type: 'serviceDataAdvertisement',
      id,
      serviceData: new Map(
        serviceData.map((entry): [string, Uint8Array] => [
          normalizeUuid(entry.uuid),
          Uint8Array.from(entry.data),
        ])
      ),
    });
  }

  const serviceUuids = advertisement?.serviceUuids ?? [];
  if (serviceUuids.length > 0) {
    events.push({ type: 'servicesAdvertisement', id, services: serviceUuids.map(normalizeUuid) });
  }

  return events;
}

export interface NobleCentralOptions {
  /** How long to wait for the controller to power on (default: 10000) */
  poweredOnTimeoutMs?: number;
}

/**
 * BLE central backed by noble.
 *
 * @example
 * ```typescript
 * const discovery = await discoverAranet4(new NobleCentral());
 * ```
 */
export class NobleCentral implements BleCentral {
  private readonly adapter = new NobleAdapter(`hci${process.env.NOBLE_HCI_DEVICE_ID ?? '0'}`);

  constructor(private readonly options: NobleCentralOptions = {}) {}

  async adapters(): Promise<BleAdapter[]> {
    const state = await waitForSettledState(this.options.poweredOnTimeoutMs ?? 10000);
    if (state !== 'poweredOn') {
      log.warn(`Bluetooth controller is ${state}, no adapter available`);
      return [];
    }
    return [this.adapter];
  }
}
