/**
 * Enums for Aranet4 status fields.
 */

import { MalformedInputError } from '../exceptions';

/**
 * CO2 sensor calibration state, advertised in bits 2-3 of the flags byte.
 */
export enum CalibrationState {
  NOT_ACTIVE = 0,
  END_REQUEST = 1,
  IN_PROGRESS = 2,
  ERROR = 3,
}

/**
 * Colour shown on the device display for the current CO2 level.
 */
export enum DisplayStatus {
  GREEN = 1,
  YELLOW = 2,
  RED = 3,
}

/**
 * Map a raw 2-bit field to a CalibrationState.
 *
 * @throws {MalformedInputError} If the value is outside 0-3
 */
export function calibrationStateFromRaw(raw: number): CalibrationState {
  switch (raw) {
    case CalibrationState.NOT_ACTIVE:
    case CalibrationState.END_REQUEST:
    case CalibrationState.IN_PROGRESS:
    case CalibrationState.ERROR:
      return raw;
    default:
      throw new MalformedInputError(`Unexpected calibration state value: ${raw}`);
  }
}

/**
 * Map a raw status byte to a DisplayStatus.
 *
 * @throws {MalformedInputError} If the byte is not 1, 2 or 3
 */
export function displayStatusFromRaw(raw: number): DisplayStatus {
  switch (raw) {
    case DisplayStatus.GREEN:
    case DisplayStatus.YELLOW:
    case DisplayStatus.RED:
      return raw;
    default:
      throw new MalformedInputError(`Unexpected display status value: ${raw}`);
  }
}
