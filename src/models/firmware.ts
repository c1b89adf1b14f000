/**
 * Firmware version data structure.
 */

export interface FirmwareVersion {
  /**
   * Major version number (0-255)
   */
  readonly major: number;

  /**
   * Minor version number (0-255)
   */
  readonly minor: number;

  /**
   * Patch version number (0-255)
   */
  readonly patch: number;
}

/**
 * Helper functions for FirmwareVersion
 */
export namespace FirmwareVersion {
  export function create(major: number, minor: number, patch: number): FirmwareVersion {
    return Object.freeze({ major, minor, patch });
  }

  /**
   * Render as "vMAJOR.MINOR.PATCH".
   */
  export function format(version: FirmwareVersion): string {
    return `v${version.major}.${version.minor}.${version.patch}`;
  }

  export function equals(a: FirmwareVersion, b: FirmwareVersion): boolean {
    return a.major === b.major && a.minor === b.minor && a.patch === b.patch;
  }
}
