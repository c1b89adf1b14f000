/**
 * Unit conversions for decoded measurements.
 *
 * Each conversion maps an absent value (null) to an absent value.
 */

/** Standard atmosphere in hPa */
export const HPA_PER_ATM = 1013.25;

export function celsiusToFahrenheit(celsius: number): number;
export function celsiusToFahrenheit(celsius: number | null): number | null;
export function celsiusToFahrenheit(celsius: number | null): number | null {
  return celsius === null ? null : celsius * 1.8 + 32;
}

export function fahrenheitToCelsius(fahrenheit: number): number;
export function fahrenheitToCelsius(fahrenheit: number | null): number | null;
export function fahrenheitToCelsius(fahrenheit: number | null): number | null {
  return fahrenheit === null ? null : (fahrenheit - 32) / 1.8;
}

export function hpaToAtm(hpa: number): number;
export function hpaToAtm(hpa: number | null): number | null;
export function hpaToAtm(hpa: number | null): number | null {
  return hpa === null ? null : hpa / HPA_PER_ATM;
}

export function atmToHpa(atm: number): number;
export function atmToHpa(atm: number | null): number | null;
export function atmToHpa(atm: number | null): number | null {
  return atm === null ? null : atm * HPA_PER_ATM;
}
