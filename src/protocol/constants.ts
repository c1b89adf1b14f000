/**
 * BLE protocol constants for Aranet4 devices.
 */

import type { Characteristic } from '../transport/types';

/**
 * Bluetooth SIG company identifier 0x0702 (SAF Tehnika, maker of Aranet).
 */
export const MANUFACTURER_ID = 0x0702;

// Services
export const SERVICE_UUID = '0000fce0-0000-1000-8000-00805f9b34fb'; // firmware v1.2.0 and later
export const LEGACY_SERVICE_UUID = 'f0cd1400-95da-4f4b-9ac8-aa55d312af0c'; // until v1.2.0
export const GENERIC_ACCESS_SERVICE_UUID = '00001800-0000-1000-8000-00805f9b34fb';
export const DEVICE_INFORMATION_SERVICE_UUID = '0000180a-0000-1000-8000-00805f9b34fb';
export const BATTERY_SERVICE_UUID = '0000180f-0000-1000-8000-00805f9b34fb';

// Payload sizes
export const MANUFACTURER_DATA_SIZE = 7;
export const CURRENT_READING_SIZE = 9;
export const CURRENT_READING_DETAILED_SIZE = 13;

/** Offset of the detailed reading inside the advertised manufacturer data */
export const ADVERTISED_READING_OFFSET = 8;

function characteristic(serviceUuid: string, uuid: string): Characteristic {
  return { uuid, serviceUuid };
}

/**
 * Readable characteristics exposed by the sensor.
 */
export const Characteristics = {
  CURRENT_READINGS: characteristic(SERVICE_UUID, 'f0cd1503-95da-4f4b-9ac8-aa55d312af0c'),
  CURRENT_READINGS_DETAILED: characteristic(SERVICE_UUID, 'f0cd3001-95da-4f4b-9ac8-aa55d312af0c'),
  INTERVAL: characteristic(SERVICE_UUID, 'f0cd2002-95da-4f4b-9ac8-aa55d312af0c'),
  SECONDS_SINCE_UPDATE: characteristic(SERVICE_UUID, 'f0cd2004-95da-4f4b-9ac8-aa55d312af0c'),
  TOTAL_READINGS: characteristic(SERVICE_UUID, 'f0cd2001-95da-4f4b-9ac8-aa55d312af0c'),

  DEVICE_NAME: characteristic(GENERIC_ACCESS_SERVICE_UUID, '00002a00-0000-1000-8000-00805f9b34fb'),

  MANUFACTURER_NAME: characteristic(DEVICE_INFORMATION_SERVICE_UUID, '00002a29-0000-1000-8000-00805f9b34fb'),
  MODEL_NUMBER: characteristic(DEVICE_INFORMATION_SERVICE_UUID, '00002a24-0000-1000-8000-00805f9b34fb'),
  SERIAL_NUMBER: characteristic(DEVICE_INFORMATION_SERVICE_UUID, '00002a25-0000-1000-8000-00805f9b34fb'),
  HARDWARE_REVISION: characteristic(DEVICE_INFORMATION_SERVICE_UUID, '00002a27-0000-1000-8000-00805f9b34fb'),
  SOFTWARE_REVISION: characteristic(DEVICE_INFORMATION_SERVICE_UUID, '00002a26-0000-1000-8000-00805f9b34fb'),

  BATTERY_LEVEL: characteristic(BATTERY_SERVICE_UUID, '00002a19-0000-1000-8000-00805f9b34fb'),
} as const;
