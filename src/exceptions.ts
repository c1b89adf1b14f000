/**
 * Exception classes for the Aranet4 library.
 */

export class Aranet4Error extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'Aranet4Error';
  }
}

/**
 * The operation needs an active connection to the peripheral.
 */
export class NotConnectedError extends Aranet4Error {
  constructor(message: string = 'Not connected to device') {
    super(message);
    this.name = 'NotConnectedError';
  }
}

/**
 * The peripheral does not expose the Aranet4 service (wrong device, or
 * firmware older than v1.2.0).
 */
export class UnsupportedDeviceError extends Aranet4Error {
  constructor(message: string) {
    super(message);
    this.name = 'UnsupportedDeviceError';
  }
}

export class TimeoutError extends Aranet4Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

export class ProtocolError extends Aranet4Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProtocolError';
  }
}

/**
 * A payload has the wrong length or carries an undefined enumerated value.
 */
export class MalformedInputError extends ProtocolError {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedInputError';
  }
}

/**
 * A string characteristic is not valid UTF-8.
 */
export class EncodingError extends ProtocolError {
  constructor(message: string) {
    super(message);
    this.name = 'EncodingError';
  }
}

/**
 * Failure surfaced by the underlying BLE stack.
 */
export class TransportError extends Aranet4Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

export interface AdapterFailure {
  /** Identifier of the failed adapter */
  adapterId: string;
  /** Step that failed */
  stage: 'scan' | 'subscribe' | 'stream';
  error: unknown;
}

/**
 * Every available adapter failed to start scanning or to deliver events.
 */
export class AdapterSetupError extends TransportError {
  readonly failures: readonly AdapterFailure[];

  constructor(failures: readonly AdapterFailure[]) {
    super(
      `Discovery setup failed on all ${failures.length} adapter(s): ` +
        failures
          .map((f) => `${f.adapterId} (${f.stage}): ${describeError(f.error)}`)
          .join('; '),
      { cause: failures[0]?.error }
    );
    this.name = 'AdapterSetupError';
    this.failures = failures;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
