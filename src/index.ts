/**
 * aranet4-ble - TypeScript library for Aranet4 BLE environmental sensors
 *
 * Main entry point exporting the public API.
 */

// Core device API
export { Aranet4Device } from './device';
export { Aranet4Discovery, decodeDiscoveryEvent, discoverAranet4 } from './discovery';
export type { DiscoveredDevice, DiscoveryOptions } from './discovery';

// Models and types
export * from './models/enums';
export * from './models/firmware';
export * from './models/reading';
export * from './models/units';
export * from './models/advertisement';

// Protocol constants and decoders
export * from './protocol';

// Transport capability
export * from './transport';

// Exceptions
export * from './exceptions';

// Logging
export { createLogger, setLogLevel, getLogLevel } from './logger';
export type { LogLevel, Logger } from './logger';
