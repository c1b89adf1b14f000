import { describe, it, expect, vi } from 'vitest';
import { Aranet4Device } from './device';
import type { DiscoveredDevice } from './discovery';
import {
  EncodingError,
  MalformedInputError,
  NotConnectedError,
  TransportError,
  UnsupportedDeviceError,
} from './exceptions';
import { DisplayStatus } from './models/enums';
import { Characteristics, LEGACY_SERVICE_UUID, SERVICE_UUID } from './protocol/constants';
import { parseManufacturerData } from './protocol/decoders';
import { FakeAdapter, FakePeripheral } from './testing/fake-transport';

const READING = [0x20, 0x03, 0x90, 0x01, 0x92, 0x27, 45, 80, 1];

function aranet4(id = 'dev-1'): FakePeripheral {
  return new FakePeripheral(id, [SERVICE_UUID], true);
}

function discovered(adapter: FakeAdapter, peripheralId: string): DiscoveredDevice {
  return {
    adapter,
    peripheralId,
    manufacturerData: parseManufacturerData(Uint8Array.from([0, 19, 4, 1, 0, 0, 0])),
    currentReading: null,
  };
}

describe('Aranet4Device.open', () => {
  it('opens a peripheral exposing the Aranet4 service', async () => {
    const peripheral = aranet4();
    const device = await Aranet4Device.open(peripheral);

    expect(device.id).toBe('dev-1');
    expect(device.address).toBe('dev-1');
    expect(peripheral.discoverCalls).toBe(0);
  });

  it('discovers services when none are known yet', async () => {
    const peripheral = new FakePeripheral('dev-1', [SERVICE_UUID]);

    await Aranet4Device.open(peripheral);

    expect(peripheral.discoverCalls).toBe(1);
  });

  it('accepts the service UUID in short form', async () => {
    const peripheral = new FakePeripheral('dev-1', ['FCE0', '180F'], true);
    await expect(Aranet4Device.open(peripheral)).resolves.toBeInstanceOf(Aranet4Device);
  });

  it('requires a connection', async () => {
    const peripheral = aranet4();
    peripheral.connected = false;

    await expect(Aranet4Device.open(peripheral)).rejects.toThrow(NotConnectedError);
  });

  it('rejects firmware that only exposes the legacy service', async () => {
    const peripheral = new FakePeripheral('dev-1', [LEGACY_SERVICE_UUID], true);

    await expect(Aranet4Device.open(peripheral)).rejects.toThrow(
      new UnsupportedDeviceError('dev-1 runs Aranet4 firmware older than v1.2.0, which is not supported')
    );
  });

  it('rejects other devices', async () => {
    const peripheral = new FakePeripheral('dev-2', ['180a'], true);

    await expect(Aranet4Device.open(peripheral)).rejects.toThrow(
      new UnsupportedDeviceError('dev-2 is not an Aranet4 device')
    );
  });
});

describe('Aranet4Device.connect', () => {
  it('connects the peripheral the adapter reported', async () => {
    const adapter = new FakeAdapter('hci0');
    const peripheral = aranet4();
    peripheral.connected = false;
    adapter.peripherals.set('dev-1', peripheral);

    const device = await Aranet4Device.connect(discovered(adapter, 'dev-1'));

    expect(peripheral.connected).toBe(true);
    expect(await device.isConnected()).toBe(true);
  });

  it('fails for a peripheral the adapter does not know', async () => {
    const adapter = new FakeAdapter('hci0');

    await expect(Aranet4Device.connect(discovered(adapter, 'gone'))).rejects.toThrow(
      new TransportError('Peripheral gone is unknown to adapter hci0')
    );
  });

  it('closes the connection it made when the device is not an Aranet4', async () => {
    const adapter = new FakeAdapter('hci0');
    const peripheral = new FakePeripheral('dev-2', ['180a'], true);
    peripheral.connected = false;
    adapter.peripherals.set('dev-2', peripheral);

    await expect(Aranet4Device.connect(discovered(adapter, 'dev-2'))).rejects.toThrow(
      new UnsupportedDeviceError('dev-2 is not an Aranet4 device')
    );
    expect(peripheral.connected).toBe(false);
  });

  it('leaves an existing connection open when the device is not an Aranet4', async () => {
    const adapter = new FakeAdapter('hci0');
    const peripheral = new FakePeripheral('dev-2', ['180a'], true);
    adapter.peripherals.set('dev-2', peripheral);

    await expect(Aranet4Device.connect(discovered(adapter, 'dev-2'))).rejects.toThrow(
      UnsupportedDeviceError
    );
    expect(peripheral.connected).toBe(true);
  });

  it('disconnects', async () => {
    const adapter = new FakeAdapter('hci0');
    const peripheral = aranet4();
    adapter.peripherals.set('dev-1', peripheral);

    const device = await Aranet4Device.connect(discovered(adapter, 'dev-1'));
    await device.disconnect();

    expect(peripheral.connected).toBe(false);
  });
});

describe('Aranet4Device reads', () => {
  async function open(peripheral: FakePeripheral): Promise<Aranet4Device> {
    return Aranet4Device.open(peripheral);
  }

  it('reads the current reading', async () => {
    const peripheral = aranet4().setValue(Characteristics.CURRENT_READINGS, READING);
    const device = await open(peripheral);

    expect(await device.readCurrentReading()).toEqual({
      co2Ppm: 800,
      temperatureC: 20,
      pressureHpa: 1013,
      humidity: 0.45,
      battery: 0.8,
      status: DisplayStatus.GREEN,
    });
    expect(peripheral.reads).toEqual([Characteristics.CURRENT_READINGS.uuid]);
  });

  it('reads the detailed reading', async () => {
    const peripheral = aranet4().setValue(Characteristics.CURRENT_READINGS_DETAILED, [
      ...READING,
      0x3c,
      0x00,
      0x05,
      0x00,
    ]);
    const device = await open(peripheral);
    const reading = await device.readCurrentReadingDetailed();

    expect(reading.interval).toBe(60);
    expect(reading.age).toBe(5);
  });

  it('reads the device on every call', async () => {
    const peripheral = aranet4().setValue(Characteristics.CURRENT_READINGS, READING);
    const device = await open(peripheral);

    await device.readCurrentReading();
    peripheral.setValue(Characteristics.CURRENT_READINGS, [0x58, 0x02, ...READING.slice(2)]);
    const second = await device.readCurrentReading();

    expect(second.co2Ppm).toBe(600);
    expect(peripheral.reads).toHaveLength(2);
  });

  it('reads the counters from their own characteristics', async () => {
    const peripheral = aranet4()
      .setValue(Characteristics.INTERVAL, [0x2c, 0x01])
      .setValue(Characteristics.SECONDS_SINCE_UPDATE, [0x0a, 0x00])
      .setValue(Characteristics.TOTAL_READINGS, [0xe8, 0x03]);
    const device = await open(peripheral);

    expect(await device.readInterval()).toBe(300);
    expect(await device.readLastUpdateAge()).toBe(10);
    expect(await device.readTotalReadings()).toBe(1000);
    expect(peripheral.reads).toEqual([
      Characteristics.INTERVAL.uuid,
      Characteristics.SECONDS_SINCE_UPDATE.uuid,
      Characteristics.TOTAL_READINGS.uuid,
    ]);
  });

  it('reads the device information strings', async () => {
    const text = (value: string): Uint8Array => new TextEncoder().encode(value);
    const peripheral = aranet4()
      .setValue(Characteristics.DEVICE_NAME, text('Aranet4 0A1B2'))
      .setValue(Characteristics.SOFTWARE_REVISION, text('v1.4.19'))
      .setValue(Characteristics.MANUFACTURER_NAME, text('Test Manufacturer'))
      .setValue(Characteristics.MODEL_NUMBER, text('Aranet4 HOME'))
      .setValue(Characteristics.SERIAL_NUMBER, text('0000000'))
      .setValue(Characteristics.HARDWARE_REVISION, text('12'));
    const device = await open(peripheral);

    expect(await device.readName()).toBe('Aranet4 0A1B2');
    expect(await device.readFirmwareVersion()).toBe('v1.4.19');
    expect(await device.readManufacturerName()).toBe('Test Manufacturer');
    expect(await device.readModelNumber()).toBe('Aranet4 HOME');
    expect(await device.readSerialNumber()).toBe('0000000');
    expect(await device.readHardwareRevision()).toBe('12');
  });

  it('reads the battery level as a fraction', async () => {
    const device = await open(aranet4().setValue(Characteristics.BATTERY_LEVEL, [85]));
    expect(await device.readBattery()).toBe(0.85);
  });

  it('rejects a name that is not UTF-8', async () => {
    const device = await open(aranet4().setValue(Characteristics.DEVICE_NAME, [0xc3, 0x28]));
    await expect(device.readName()).rejects.toThrow(EncodingError);
  });

  it('rejects a reading of the wrong size', async () => {
    const device = await open(
      aranet4().setValue(Characteristics.CURRENT_READINGS, READING.slice(0, 8))
    );
    await expect(device.readCurrentReading()).rejects.toThrow(
      new MalformedInputError('Invalid current reading size: 8 bytes (expected 9)')
    );
  });

  it('refuses to read after disconnecting', async () => {
    const peripheral = aranet4().setValue(Characteristics.CURRENT_READINGS, READING);
    const device = await open(peripheral);
    await device.disconnect();

    await expect(device.readCurrentReading()).rejects.toThrow(NotConnectedError);
    expect(peripheral.reads).toEqual([]);
  });

  it('passes transport errors through unchanged', async () => {
    const peripheral = aranet4();
    const error = new TransportError('GATT read failed');
    vi.spyOn(peripheral, 'read').mockRejectedValue(error);
    const device = await open(peripheral);

    await expect(device.readInterval()).rejects.toBe(error);
  });
});
