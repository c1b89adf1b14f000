#!/usr/bin/env node
/**
 * Executable entry point for the aranet4 command.
 */

import { setTimeout as delay } from 'node:timers/promises';
import { createNobleCentral } from '../transport';
import { run, type CliDependencies } from './main';

function defaultDependencies(signal: AbortSignal): CliDependencies {
  return {
    createCentral: () => createNobleCentral(),
    stdout: (line) => process.stdout.write(`${line}\n`),
    stderr: (line) => process.stderr.write(`${line}\n`),
    sleep: (ms, abort) => delay(ms, undefined, { signal: abort }),
    signal,
  };
}

async function main(): Promise<void> {
  const controller = new AbortController();
  const shutdown = (): void => controller.abort();
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  try {
    process.exitCode = await run(process.argv.slice(2), defaultDependencies(controller.signal));
  } finally {
    process.removeListener('SIGINT', shutdown);
    process.removeListener('SIGTERM', shutdown);
  }

  // Noble keeps its HCI socket open; exit once output is flushed.
  process.exit();
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
