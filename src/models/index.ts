/**
 * Models layer exports for Aranet4 data structures.
 */

export * from './enums';
export * from './firmware';
export * from './reading';
export * from './units';
export * from './advertisement';
