/**
 * BLE advertisement data structures.
 */

import type { CalibrationState } from './enums';
import type { FirmwareVersion } from './firmware';
import type { CurrentReadingDetailed } from './reading';

/**
 * Status prefix of the Aranet4 manufacturer data (7 bytes, manufacturer ID
 * already stripped).
 *
 * - [0]: flags (bit 0 disconnected, bits 2-3 calibration, bit 4 DFU, bit 5 integrations)
 * - [1]: patch version
 * - [2]: minor version
 * - [3]: major version
 * - [4-6]: unused
 */
export interface ManufacturerData {
  /** Device is not bonded to a phone/app */
  readonly disconnected: boolean;
  readonly calibrationState: CalibrationState;
  /** Device firmware update in progress */
  readonly dfuActive: boolean;
  /** Smart home integrations (advertised readings) enabled */
  readonly integrations: boolean;
  readonly version: FirmwareVersion;
}

/**
 * Decoded manufacturer data payload of one advertisement.
 */
export interface AdvertisementData {
  readonly manufacturerData: ManufacturerData;

  /** Embedded reading, null when absent or malformed */
  readonly currentReading: CurrentReadingDetailed | null;
}
