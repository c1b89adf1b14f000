/**
 * Stand-in for the noble singleton, installed with vi.mock('@abandonware/noble').
 */

import { EventEmitter } from 'node:events';
import { vi } from 'vitest';

export interface FakeNobleCharacteristic {
  uuid: string;
  readAsync(): Promise<Buffer>;
}

export interface FakeNoblePeripheral {
  id: string;
  address: string;
  state: string;
  advertisement: {
    manufacturerData?: Buffer;
    serviceData: Array<{ uuid: string; data: Buffer }>;
    serviceUuids: string[];
  };
  services?: Array<{ uuid: string; characteristics: FakeNobleCharacteristic[] }>;
  connectAsync(): Promise<void>;
  disconnectAsync(): Promise<void>;
  discoverAllServicesAndCharacteristicsAsync(): Promise<void>;
}

export class FakeNoble extends EventEmitter {
  /** Backing field; noble only initializes its bindings through the state getter */
  _state = 'poweredOn';
  stateReads = 0;
  readonly startScanningAsync = vi.fn(
    async (_serviceUuids?: string[], _allowDuplicates?: boolean): Promise<void> => {}
  );
  readonly stopScanningAsync = vi.fn(async (): Promise<void> => {});

  get state(): string {
    this.stateReads += 1;
    return this._state;
  }

  reset(state = 'poweredOn'): void {
    this.removeAllListeners();
    this._state = state;
    this.stateReads = 0;
    this.startScanningAsync.mockClear();
    this.stopScanningAsync.mockClear();
  }

  /**
   * Report an advertisement the way noble's discover event does.
   */
  discover(peripheral: FakeNoblePeripheral): void {
    this.emit('discover', peripheral);
  }

  changeState(state: string): void {
    this._state = state;
    this.emit('stateChange', state);
  }
}

export const fakeNoble = new FakeNoble();

export function fakeNoblePeripheral(
  id: string,
  advertisement: Partial<FakeNoblePeripheral['advertisement']> = {}
): FakeNoblePeripheral {
  const peripheral: FakeNoblePeripheral = {
    id,
    address: 'aa:bb:cc:dd:ee:ff',
    state: 'disconnected',
    advertisement: { serviceData: [], serviceUuids: [], ...advertisement },
    connectAsync: vi.fn(async () => {
      peripheral.state = 'connected';
    }),
    disconnectAsync: vi.fn(async () => {
      peripheral.state = 'disconnected';
    }),
    discoverAllServicesAndCharacteristicsAsync: vi.fn(async () => {}),
  };
  return peripheral;
}
