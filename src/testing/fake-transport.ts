/**
 * In-memory BLE transport for tests.
 */

import { EventQueue } from '../transport/event-queue';
import type {
  BleAdapter,
  BleCentral,
  BlePeripheral,
  CentralEvent,
  Characteristic,
  ScanFilter,
} from '../transport/types';

export class FakePeripheral implements BlePeripheral {
  connected = true;
  readonly values = new Map<string, Uint8Array>();
  readonly reads: string[] = [];
  discoverCalls = 0;
  private discovered: Set<string>;

  /**
   * @param advertisedServices - Services reported once discoverServices() runs
   * @param discoveredUpfront - Whether services are already enumerated
   */
  constructor(
    readonly id: string,
    private readonly advertisedServices: string[],
    discoveredUpfront = false,
    readonly address: string = id
  ) {
    this.discovered = new Set(discoveredUpfront ? advertisedServices : []);
  }

  setValue(characteristic: Characteristic, value: number[] | Uint8Array): this {
    this.values.set(characteristic.uuid, Uint8Array.from(value));
    return this;
  }

  async isConnected(): Promise<boolean> {
    return this.connected;
  }

  async connect(): Promise<void> {
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    this.connected = false;
  }

  async discoverServices(): Promise<void> {
    this.discoverCalls += 1;
    this.discovered = new Set(this.advertisedServices);
  }

  services(): ReadonlySet<string> {
    return this.discovered;
  }

  async read(characteristic: Characteristic): Promise<Uint8Array> {
    this.reads.push(characteristic.uuid);
    const value = this.values.get(characteristic.uuid);
    if (!value) {
      throw new Error(`No value for ${characteristic.uuid}`);
    }
    return value;
  }
}

export class FakeAdapter implements BleAdapter {
  readonly scanFilters: ScanFilter[] = [];
  stopScanCalls = 0;
  scanError: Error | null = null;
  eventsError: Error | null = null;
  readonly peripherals = new Map<string, FakePeripheral>();
  private stream: EventQueue<CentralEvent> | null = null;

  constructor(readonly id: string) {}

  async startScan(filter: ScanFilter): Promise<void> {
    if (this.scanError) {
      throw this.scanError;
    }
    this.scanFilters.push(filter);
  }

  async stopScan(): Promise<void> {
    this.stopScanCalls += 1;
  }

  async events(signal: AbortSignal): Promise<AsyncIterable<CentralEvent>> {
    if (this.eventsError) {
      throw this.eventsError;
    }
    const stream = new EventQueue<CentralEvent>();
    if (signal.aborted) {
      stream.close();
    } else {
      signal.addEventListener('abort', () => stream.close(), { once: true });
    }
    this.stream = stream;
    return stream;
  }

  async peripheral(id: string): Promise<BlePeripheral | undefined> {
    return this.peripherals.get(id);
  }

  get subscribed(): boolean {
    return this.stream !== null && !this.stream.isClosed;
  }

  emit(event: CentralEvent): void {
    this.stream?.enqueue(event);
  }

  /**
   * Emit a manufacturer data advertisement.
   */
  advertise(id: string, manufacturerId: number, data: number[]): void {
    this.emit({
      type: 'manufacturerDataAdvertisement',
      id,
      manufacturerData: new Map([[manufacturerId, Uint8Array.from(data)]]),
    });
  }

  /** Simulate the adapter going away */
  end(): void {
    this.stream?.close();
  }

  failStream(error: Error): void {
    this.stream?.fail(error);
  }
}

export class FakeCentral implements BleCentral {
  constructor(readonly fakeAdapters: FakeAdapter[] = []) {}

  async adapters(): Promise<BleAdapter[]> {
    return [...this.fakeAdapters];
  }
}
