/**
 * Transport layer exports.
 */

import type { NobleCentralOptions } from './noble';
import type { BleCentral } from './types';

export * from './types';
export { EventQueue } from './event-queue';
export type { NobleCentralOptions } from './noble';

/**
 * Create the noble-backed central, loading noble's native bindings on first use.
 */
export async function createNobleCentral(options: NobleCentralOptions = {}): Promise<BleCentral> {
  const { NobleCentral } = await import('./noble');
  return new NobleCentral(options);
}
