/**
 * Decoders for Aranet4 advertisement and characteristic payloads.
 *
 * All multi-byte integers are little-endian. Decoders never modify their
 * input and reject payloads whose length differs from the record size.
 */

import { EncodingError, MalformedInputError } from '../exceptions';
import type { AdvertisementData, ManufacturerData } from '../models/advertisement';
import { calibrationStateFromRaw, displayStatusFromRaw } from '../models/enums';
import { FirmwareVersion } from '../models/firmware';
import type { CurrentReading, CurrentReadingDetailed } from '../models/reading';
import {
  ADVERTISED_READING_OFFSET,
  CURRENT_READING_DETAILED_SIZE,
  CURRENT_READING_SIZE,
  MANUFACTURER_DATA_SIZE,
} from './constants';

const CO2_INVALID_FLAG = 0x8000;
const TEMPERATURE_INVALID_FLAG = 0x4000;
const PRESSURE_INVALID_FLAG = 0x8000;

function expectLength(data: Uint8Array, size: number, what: string): DataView {
  if (data.length !== size) {
    throw new MalformedInputError(
      `Invalid ${what} size: ${data.length} bytes (expected ${size})`
    );
  }
  return new DataView(data.buffer, data.byteOffset, data.byteLength);
}

/**
 * Parse the 7-byte status prefix of the Aranet4 manufacturer data.
 *
 * Version bytes are stored as [patch, minor, major].
 *
 * @param data - Manufacturer data without the manufacturer ID prefix
 * @throws {MalformedInputError} If data is not exactly 7 bytes
 */
export function parseManufacturerData(data: Uint8Array): ManufacturerData {
  expectLength(data, MANUFACTURER_DATA_SIZE, 'manufacturer data');

  const flags = data[0];

  return Object.freeze({
    disconnected: (flags & 0x01) !== 0,
    calibrationState: calibrationStateFromRaw((flags >> 2) & 0x03),
    dfuActive: (flags & 0x10) !== 0,
    integrations: (flags & 0x20) !== 0,
    version: FirmwareVersion.create(data[3], data[2], data[1]),
  });
}

function decodeReading(view: DataView): CurrentReading {
  const co2Raw = view.getUint16(0, true);
  const temperatureRaw = view.getUint16(2, true);
  const pressureRaw = view.getUint16(4, true);

  return {
    co2Ppm: co2Raw & CO2_INVALID_FLAG ? null : co2Raw,
    // 0.05 degC per unit
    temperatureC: temperatureRaw & TEMPERATURE_INVALID_FLAG ? null : temperatureRaw / 20,
    // 0.1 hPa per unit
    pressureHpa: pressureRaw & PRESSURE_INVALID_FLAG ? null : pressureRaw / 10,
    humidity: view.getUint8(6) / 100,
    battery: view.getUint8(7) / 100,
    status: displayStatusFromRaw(view.getUint8(8)),
  };
}

/**
 * Parse the current readings characteristic.
 *
 * Format: [co2:2][temperature:2][pressure:2][humidity:1][battery:1][status:1]
 *
 * @throws {MalformedInputError} If data is not exactly 9 bytes or the status byte is not 1-3
 */
export function parseCurrentReading(data: Uint8Array): CurrentReading {
  const view = expectLength(data, CURRENT_READING_SIZE, 'current reading');
  return Object.freeze(decodeReading(view));
}

/**
 * Parse the detailed current readings characteristic.
 *
 * Format: [current reading:9][interval:2][age:2]
 *
 * @throws {MalformedInputError} If data is not exactly 13 bytes or the status byte is not 1-3
 */
export function parseCurrentReadingDetailed(data: Uint8Array): CurrentReadingDetailed {
  const view = expectLength(data, CURRENT_READING_DETAILED_SIZE, 'detailed current reading');

  return Object.freeze({
    ...decodeReading(view),
    interval: view.getUint16(9, true),
    age: view.getUint16(11, true),
  });
}

/**
 * Parse a 2-byte unsigned counter characteristic.
 */
export function parseUint16(data: Uint8Array, what: string): number {
  return expectLength(data, 2, what).getUint16(0, true);
}

export function parseUint8(data: Uint8Array, what: string): number {
  return expectLength(data, 1, what).getUint8(0);
}

/**
 * Decode a UTF-8 string characteristic.
 *
 * @throws {EncodingError} If the bytes are not valid UTF-8
 */
export function parseUtf8String(data: Uint8Array, what: string): string {
  const decoder = new TextDecoder('utf-8', { fatal: true });
  try {
    return decoder.decode(data);
  } catch (e) {
    throw new EncodingError(`Invalid ${what} encoding (expected UTF-8): ${e}`);
  }
}

/**
 * Parse the manufacturer data payload of an advertisement.
 *
 * The embedded reading at bytes [8:21) is optional: a short payload or an
 * unreadable record yields `currentReading: null`.
 *
 * @param data - Payload keyed by MANUFACTURER_ID, ID prefix stripped
 * @throws {MalformedInputError} If fewer than 7 bytes are present
 */
export function parseAdvertisement(data: Uint8Array): AdvertisementData {
  if (data.length < MANUFACTURER_DATA_SIZE) {
    throw new MalformedInputError(
      `Advertisement data too short: ${data.length} bytes (need ${MANUFACTURER_DATA_SIZE})`
    );
  }

  const manufacturerData = parseManufacturerData(data.subarray(0, MANUFACTURER_DATA_SIZE));

  const readingEnd = ADVERTISED_READING_OFFSET + CURRENT_READING_DETAILED_SIZE;
  let currentReading: CurrentReadingDetailed | null = null;
  if (data.length >= readingEnd) {
    try {
      currentReading = parseCurrentReadingDetailed(
        data.subarray(ADVERTISED_READING_OFFSET, readingEnd)
      );
    } catch (e) {
      if (!(e instanceof MalformedInputError)) {
        throw e;
      }
    }
  }

  return { manufacturerData, currentReading };
}
