/**
 * Current-reading records read from the sensor or embedded in advertisements.
 */

import type { DisplayStatus } from './enums';
import { celsiusToFahrenheit, hpaToAtm } from './units';

/**
 * Current readings characteristic (9 bytes).
 *
 * Nullable fields are null when the device flags the value as unavailable,
 * e.g. a CO2 sensor that has not produced a sample yet.
 */
export interface CurrentReading {
  /** CO2 concentration in ppm */
  readonly co2Ppm: number | null;
  /** Temperature in degrees Celsius */
  readonly temperatureC: number | null;
  /** Atmospheric pressure in hPa */
  readonly pressureHpa: number | null;
  /** Relative humidity, 0 to 1 */
  readonly humidity: number;
  /** Battery level, 0 to 1 */
  readonly battery: number;
  readonly status: DisplayStatus;
}

/**
 * Detailed current readings (13 bytes): the basic record plus sampling timing.
 */
export interface CurrentReadingDetailed extends CurrentReading {
  /** Seconds between samples */
  readonly interval: number;
  /** Seconds since the last sample was taken */
  readonly age: number;
}

export function temperatureF(reading: CurrentReading): number | null {
  return celsiusToFahrenheit(reading.temperatureC);
}

export function pressureAtm(reading: CurrentReading): number | null {
  return hpaToAtm(reading.pressureHpa);
}
