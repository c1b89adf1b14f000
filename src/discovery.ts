/**
 * BLE discovery for Aranet4 devices.
 *
 * Scans on every adapter the central reports and merges their advertisement
 * streams into one sequence, delivered in arrival order.
 */

import { AdapterSetupError, MalformedInputError, type AdapterFailure } from './exceptions';
import { createLogger } from './logger';
import type { ManufacturerData } from './models/advertisement';
import type { CurrentReadingDetailed } from './models/reading';
import { MANUFACTURER_ID, SERVICE_UUID } from './protocol/constants';
import { parseAdvertisement } from './protocol/decoders';
import { EventQueue } from './transport/event-queue';
import type { BleAdapter, BleCentral, CentralEvent } from './transport/types';

const log = createLogger('Discovery');

/**
 * One Aranet4 advertisement. The same device produces a new record for every
 * advertisement it sends.
 */
export interface DiscoveredDevice {
  /** Adapter that received the advertisement */
  readonly adapter: BleAdapter;
  readonly peripheralId: string;
  readonly manufacturerData: ManufacturerData;
  /** Reading embedded in the advertisement, null when absent or malformed */
  readonly currentReading: CurrentReadingDetailed | null;
}

export interface DiscoveryOptions {
  /** Aborting stops the discovery as if stop() were called */
  signal?: AbortSignal;
}

/**
 * Decode a central event into a DiscoveredDevice.
 *
 * @returns null for other event kinds, other manufacturers, or a payload too
 *   short to hold the Aranet4 status prefix
 */
export function decodeDiscoveryEvent(
  adapter: BleAdapter,
  event: CentralEvent
): DiscoveredDevice | null {
  if (event.type !== 'manufacturerDataAdvertisement') {
    return null;
  }

  const data = event.manufacturerData.get(MANUFACTURER_ID);
  if (!data) {
    return null;
  }

  try {
    const { manufacturerData, currentReading } = parseAdvertisement(data);
    return { adapter, peripheralId: event.id, manufacturerData, currentReading };
  } catch (error) {
    if (error instanceof MalformedInputError) {
      log.warn(`Dropping advertisement from ${event.id}: ${error.message}`);
      return null;
    }
    throw error;
  }
}

/**
 * Running discovery over a fixed set of adapters. Obtain one from
 * discoverAranet4().
 *
 * Iterate it with `for await`, or pull with next(). Leaving the loop early,
 * calling stop(), or aborting the options signal stops scanning on every
 * adapter. The sequence cannot be restarted.
 */
export class Aranet4Discovery implements AsyncIterable<DiscoveredDevice> {
  private readonly queue = new EventQueue<DiscoveredDevice>();
  private readonly controller = new AbortController();
  private readonly scanning: BleAdapter[] = [];
  private readonly failures: AdapterFailure[] = [];
  private readonly pumps: Promise<void>[] = [];
  private remaining = 0;
  private stopping: Promise<void> | null = null;
  private detachSignal: (() => void) | null = null;

  private constructor(readonly adapterCount: number) {}

  /**
   * Start scanning on every adapter the central reports and subscribe to
   * their events.
   *
   * @throws {AdapterSetupError} If adapters exist but every setup failed
   * @throws {TransportError} If the adapters cannot be listed
   */
  static async start(
    central: BleCentral,
    options: DiscoveryOptions = {}
  ): Promise<Aranet4Discovery> {
    const adapters = await central.adapters();
    log.debug(`Found ${adapters.length} BLE adapter(s)`);

    const discovery = new Aranet4Discovery(adapters.length);
    await discovery.startScans(adapters);
    const streams = await discovery.subscribe();

    if (adapters.length > 0 && streams.length === 0) {
      await discovery.stop();
      throw new AdapterSetupError(discovery.failedAdapters);
    }

    log.debug(`Listening on ${streams.length} BLE adapter(s)`);
    discovery.listen(streams);
    if (options.signal) {
      discovery.bindSignal(options.signal);
    }
    return discovery;
  }

  /**
   * Whether the central reported no adapters at all.
   */
  get hasNoAdapters(): boolean {
    return this.adapterCount === 0;
  }

  /**
   * Adapters that failed during setup or while delivering events.
   */
  get failedAdapters(): readonly AdapterFailure[] {
    return this.failures;
  }

  /**
   * Number of adapters currently delivering events.
   */
  get listeningAdapters(): number {
    return this.remaining;
  }

  get isStopped(): boolean {
    return this.stopping !== null;
  }

  /**
   * Shared cancellation signal handed to every adapter subscription.
   */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /**
   * Wait for the next advertisement.
   *
   * @param timeoutMs - Maximum time to wait; waits indefinitely when omitted
   * @returns The next record, or null once every adapter stream has ended
   * @throws {TimeoutError} If nothing arrives in time (discovery keeps running)
   */
  async next(timeoutMs?: number): Promise<DiscoveredDevice | null> {
    let result: IteratorResult<DiscoveredDevice, undefined>;
    try {
      result = await this.queue.next(timeoutMs);
    } catch (error) {
      if (this.queue.isClosed) {
        await this.stop();
      }
      throw error;
    }

    if (result.done) {
      await this.stop();
      return null;
    }
    return result.value;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<DiscoveredDevice> {
    try {
      for (;;) {
        const found = await this.next();
        if (found === null) {
          return;
        }
        yield found;
      }
    } finally {
      await this.stop();
    }
  }

  /**
   * Stop scanning and end every adapter subscription. Safe to call repeatedly.
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.release();
    }
    return this.stopping;
  }

  private async startScans(adapters: readonly BleAdapter[]): Promise<void> {
    for (const adapter of adapters) {
      try {
        await adapter.startScan({ services: [SERVICE_UUID] });
        this.scanning.push(adapter);
        log.debug(`Adapter ${adapter.id} - Started scanning`);
      } catch (error) {
        log.warn(`Adapter ${adapter.id} - Failed to start scanning:`, error);
        this.failures.push({ adapterId: adapter.id, stage: 'scan', error });
      }
    }
  }

  private async subscribe(): Promise<Array<readonly [BleAdapter, AsyncIterable<CentralEvent>]>> {
    const streams: Array<readonly [BleAdapter, AsyncIterable<CentralEvent>]> = [];

    for (const adapter of [...this.scanning]) {
      try {
        streams.push([adapter, await adapter.events(this.signal)]);
        log.debug(`Adapter ${adapter.id} - Listening`);
      } catch (error) {
        log.warn(`Adapter ${adapter.id} - Failed to subscribe to events:`, error);
        this.failures.push({ adapterId: adapter.id, stage: 'subscribe', error });
        this.scanning.splice(this.scanning.indexOf(adapter), 1);
        await stopScanning(adapter);
      }
    }
    return streams;
  }

  private listen(streams: ReadonlyArray<readonly [BleAdapter, AsyncIterable<CentralEvent>]>): void {
    this.remaining = streams.length;
    if (streams.length === 0) {
      this.queue.close();
      return;
    }

    for (const [adapter, events] of streams) {
      this.pumps.push(this.pump(adapter, events));
    }
  }

  private bindSignal(signal: AbortSignal): void {
    const onAbort = (): void => {
      this.stop().catch((error: unknown) => {
        log.error('Failed to stop discovery:', error);
      });
    };

    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    this.detachSignal = () => signal.removeEventListener('abort', onAbort);
  }

  private async release(): Promise<void> {
    this.detachSignal?.();
    this.detachSignal = null;

    this.controller.abort();
    await this.queue.return();
    await Promise.all(this.scanning.map(stopScanning));

    // Subscriptions end on abort; wait until every pump has let go of its stream.
    await Promise.all(this.pumps);
  }

  /**
   * Forward one adapter's events into the merged queue. A failing stream only
   * removes its own adapter; the error ends the sequence when no other
   * adapter is left.
   */
  private async pump(adapter: BleAdapter, events: AsyncIterable<CentralEvent>): Promise<void> {
    let failure: { error: unknown } | null = null;
    try {
      for await (const event of events) {
        if (this.controller.signal.aborted) {
          break;
        }
        log.debug(`Adapter ${adapter.id} - Event ${event.type} from ${event.id}`);

        const found = decodeDiscoveryEvent(adapter, event);
        if (found) {
          this.queue.enqueue(found);
        }
      }
      log.debug(`Adapter ${adapter.id} - Event stream ended`);
    } catch (error) {
      if (this.controller.signal.aborted) {
        return;
      }
      log.error(`Adapter ${adapter.id} - Event stream failed:`, error);
      this.failures.push({ adapterId: adapter.id, stage: 'stream', error });
      failure = { error };
    }

    this.remaining -= 1;
    if (this.remaining > 0) {
      return;
    }
    if (failure) {
      this.queue.fail(failure.error);
    } else {
      this.queue.close();
    }
  }
}

async function stopScanning(adapter: BleAdapter): Promise<void> {
  try {
    await adapter.stopScan();
    log.debug(`Adapter ${adapter.id} - Stopped scanning`);
  } catch (error) {
    log.warn(`Adapter ${adapter.id} - Failed to stop scanning:`, error);
  }
}

/**
 * Scan for Aranet4 devices on every available adapter.
 *
 * Each adapter starts a scan filtered to the Aranet4 service, then
 * subscribes to its central events. An adapter whose setup fails is skipped
 * and reported in `failedAdapters`.
 *
 * @param central - BLE stack to scan with
 * @returns Discovery yielding one record per Aranet4 advertisement. With no
 *   adapters present it ends immediately and `hasNoAdapters` is true.
 * @throws {AdapterSetupError} If adapters exist but every setup failed
 * @throws {TransportError} If the adapters cannot be listed
 *
 * @example
 * ```typescript
 * const discovery = await discoverAranet4(central);
 * if (discovery.hasNoAdapters) {
 *   throw new Error('No Bluetooth adapters present');
 * }
 * for await (const found of discovery) {
 *   console.log(found.peripheralId, found.currentReading);
 * }
 * ```
 */
export function discoverAranet4(
  central: BleCentral,
  options: DiscoveryOptions = {}
): Promise<Aranet4Discovery> {
  return Aranet4Discovery.start(central, options);
}
