/**
 * Protocol layer exports for Aranet4 payloads.
 */

export * from './constants';
export * from './decoders';
