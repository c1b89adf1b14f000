/**
 * Main Aranet4 BLE device class.
 */

import type { DiscoveredDevice } from './discovery';
import { NotConnectedError, TransportError, UnsupportedDeviceError } from './exceptions';
import { createLogger } from './logger';
import type { CurrentReading, CurrentReadingDetailed } from './models/reading';
import { Characteristics, LEGACY_SERVICE_UUID, SERVICE_UUID } from './protocol/constants';
import {
  parseCurrentReading,
  parseCurrentReadingDetailed,
  parseUint16,
  parseUint8,
  parseUtf8String,
} from './protocol/decoders';
import { normalizeUuid, type BlePeripheral, type Characteristic } from './transport/types';

const log = createLogger('Aranet4');

/**
 * Connected Aranet4 sensor.
 *
 * Wraps a connected peripheral after checking that it exposes the Aranet4
 * service. Every read goes to the device; nothing is cached.
 *
 * @example
 * ```typescript
 * const discovery = await discoverAranet4(central);
 * for await (const found of discovery) {
 *   const device = await Aranet4Device.connect(found);
 *   const reading = await device.readCurrentReadingDetailed();
 *   await device.disconnect();
 *   break;
 * }
 * ```
 */
export class Aranet4Device {
  private constructor(private readonly peripheral: BlePeripheral) {}

  /**
   * Open a connected peripheral as an Aranet4 device.
   *
   * Runs service discovery first if the peripheral has not enumerated its
   * services yet.
   *
   * @throws {NotConnectedError} If the peripheral is not connected
   * @throws {UnsupportedDeviceError} If the Aranet4 service is absent
   */
  static async open(peripheral: BlePeripheral): Promise<Aranet4Device> {
    if (!(await peripheral.isConnected())) {
      throw new NotConnectedError();
    }

    if (peripheral.services().size === 0) {
      log.debug(`Discovering services on ${peripheral.id}`);
      await peripheral.discoverServices();
    }

    const services = new Set([...peripheral.services()].map(normalizeUuid));

    if (!services.has(SERVICE_UUID)) {
      if (services.has(LEGACY_SERVICE_UUID)) {
        throw new UnsupportedDeviceError(
          `${peripheral.id} runs Aranet4 firmware older than v1.2.0, which is not supported`
        );
      }
      throw new UnsupportedDeviceError(`${peripheral.id} is not an Aranet4 device`);
    }

    return new Aranet4Device(peripheral);
  }

  /**
   * Connect to a device found by discovery and open it. A connection made
   * here is closed again when the peripheral turns out not to be usable.
   *
   * @throws {TransportError} If the adapter no longer knows the peripheral
   */
  static async connect(discovered: DiscoveredDevice): Promise<Aranet4Device> {
    const peripheral = await discovered.adapter.peripheral(discovered.peripheralId);
    if (!peripheral) {
      throw new TransportError(
        `Peripheral ${discovered.peripheralId} is unknown to adapter ${discovered.adapter.id}`
      );
    }

    if (await peripheral.isConnected()) {
      return Aranet4Device.open(peripheral);
    }

    log.info(`Connecting to ${peripheral.id}`);
    await peripheral.connect();
    try {
      return await Aranet4Device.open(peripheral);
    } catch (error) {
      try {
        await peripheral.disconnect();
      } catch (disconnectError) {
        log.warn(`Failed to disconnect from ${peripheral.id}:`, disconnectError);
      }
      throw error;
    }
  }

  /**
   * Transport identifier of the underlying peripheral.
   */
  get id(): string {
    return this.peripheral.id;
  }

  get address(): string {
    return this.peripheral.address;
  }

  async isConnected(): Promise<boolean> {
    return this.peripheral.isConnected();
  }

  async disconnect(): Promise<void> {
    await this.peripheral.disconnect();
  }

  async readCurrentReading(): Promise<CurrentReading> {
    return parseCurrentReading(await this.read(Characteristics.CURRENT_READINGS));
  }

  async readCurrentReadingDetailed(): Promise<CurrentReadingDetailed> {
    return parseCurrentReadingDetailed(await this.read(Characteristics.CURRENT_READINGS_DETAILED));
  }

  /**
   * Interval between environment samples, in seconds.
   */
  async readInterval(): Promise<number> {
    return parseUint16(await this.read(Characteristics.INTERVAL), 'interval');
  }

  /**
   * Seconds since the last environment sample was taken.
   */
  async readLastUpdateAge(): Promise<number> {
    return parseUint16(await this.read(Characteristics.SECONDS_SINCE_UPDATE), 'last update age');
  }

  /**
   * Number of samples stored in the device's history.
   */
  async readTotalReadings(): Promise<number> {
    return parseUint16(await this.read(Characteristics.TOTAL_READINGS), 'total readings');
  }

  async readName(): Promise<string> {
    return parseUtf8String(await this.read(Characteristics.DEVICE_NAME), 'device name');
  }

  /**
   * Firmware version string as reported by the device (e.g. "v1.4.19").
   */
  async readFirmwareVersion(): Promise<string> {
    return parseUtf8String(await this.read(Characteristics.SOFTWARE_REVISION), 'firmware version');
  }

  async readManufacturerName(): Promise<string> {
    return parseUtf8String(await this.read(Characteristics.MANUFACTURER_NAME), 'manufacturer name');
  }

  async readModelNumber(): Promise<string> {
    return parseUtf8String(await this.read(Characteristics.MODEL_NUMBER), 'model number');
  }

  async readSerialNumber(): Promise<string> {
    return parseUtf8String(await this.read(Characteristics.SERIAL_NUMBER), 'serial number');
  }

  async readHardwareRevision(): Promise<string> {
    return parseUtf8String(await this.read(Characteristics.HARDWARE_REVISION), 'hardware revision');
  }

  /**
   * Battery level from the standard battery service, 0 to 1.
   */
  async readBattery(): Promise<number> {
    return parseUint8(await this.read(Characteristics.BATTERY_LEVEL), 'battery level') / 100;
  }

  private async read(characteristic: Characteristic): Promise<Uint8Array> {
    await this.ensureConnected();
    log.debug(`Reading ${characteristic.uuid} from ${this.peripheral.id}`);
    return this.peripheral.read(characteristic);
  }

  /**
   * Ensure device is connected.
   */
  private async ensureConnected(): Promise<void> {
    if (!(await this.peripheral.isConnected())) {
      throw new NotConnectedError();
    }
  }
}
