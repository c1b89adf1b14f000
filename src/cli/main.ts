/**
 * aranet4 command: wait for an Aranet4 advertisement and print its reading.
 */

import { Aranet4Device } from '../device';
import { discoverAranet4, type Aranet4Discovery, type DiscoveredDevice } from '../discovery';
import { TimeoutError, describeError } from '../exceptions';
import { createLogger, setLogLevel } from '../logger';
import type { BleCentral } from '../transport/types';
import {
  ServiceState,
  formatJson,
  formatJsonError,
  formatMonitoring,
  formatMonitoringLine,
  formatText,
} from './format';
import { USAGE, UsageError, normalizeDeviceId, parseCliOptions, type CliOptions } from './options';

const log = createLogger('CLI');

/** Sampling interval assumed when the device did not report one */
export const DEFAULT_INTERVAL_SECONDS = 60;

export const NO_ADAPTERS_MESSAGE = 'Unable to discover devices. No Bluetooth adapters present.';

export interface CliDependencies {
  createCentral(): Promise<BleCentral>;
  stdout(line: string): void;
  stderr(line: string): void;
  sleep(ms: number, signal: AbortSignal): Promise<void>;
  /** Aborted when the process is asked to shut down */
  signal: AbortSignal;
}

function reportError(options: CliOptions, deps: CliDependencies, message: string): number {
  switch (options.format) {
    case 'monitoring':
      deps.stdout(formatMonitoringLine(ServiceState.CRITICAL, message));
      return ServiceState.CRITICAL;
    case 'json':
      deps.stderr(formatJsonError(message));
      return 1;
    default:
      deps.stderr(message);
      return 1;
  }
}

/**
 * Seconds to wait before the next sample, 0 for none.
 */
export function nextWaitSeconds(options: CliOptions, sample: DiscoveredDevice): number {
  const { interval } = options;
  if (interval === 'none') {
    return 0;
  }
  if (interval === 'device') {
    if (!sample.currentReading) {
      log.debug(`Device did not report its interval, using ${DEFAULT_INTERVAL_SECONDS}s`);
      return DEFAULT_INTERVAL_SECONDS;
    }
    return sample.currentReading.interval;
  }
  return interval;
}

/**
 * Replace the advertised reading with one read over a GATT connection.
 */
async function readActively(found: DiscoveredDevice): Promise<DiscoveredDevice> {
  const device = await Aranet4Device.connect(found);
  try {
    const currentReading = await device.readCurrentReadingDetailed();
    return { ...found, currentReading };
  } finally {
    await device.disconnect();
  }
}

/**
 * Wait for the next advertisement accepted by the device filter.
 *
 * @returns null when the adapters stopped delivering events
 */
async function nextSample(
  discovery: Aranet4Discovery,
  options: CliOptions
): Promise<DiscoveredDevice | null> {
  const deadline = options.timeout === undefined ? undefined : Date.now() + options.timeout * 1000;

  for (;;) {
    const remaining = deadline === undefined ? undefined : Math.max(deadline - Date.now(), 0);
    const found = await discovery.next(remaining);
    if (!found) {
      return null;
    }
    if (options.device === undefined || normalizeDeviceId(found.peripheralId) === options.device) {
      return found;
    }
    log.debug(`Ignoring advertisement from ${found.peripheralId}`);
  }
}

function print(options: CliOptions, deps: CliDependencies, sample: DiscoveredDevice): void {
  if (options.format === 'json') {
    deps.stdout(formatJson(sample, !options.repeat));
    return;
  }

  log.info(
    `Received advertisement from ${sample.peripheralId} ` +
      `(contains reading: ${sample.currentReading !== null})`
  );
  deps.stdout(formatText(sample));
}

/**
 * Run the command.
 *
 * @param argv - Arguments without the node and script paths
 * @returns Process exit code
 */
export async function run(argv: string[], deps: CliDependencies): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliOptions(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      deps.stderr(`${error.message}\n\n${USAGE}`);
      return 2;
    }
    throw error;
  }

  if (options.help) {
    deps.stdout(USAGE);
    return 0;
  }
  if (options.verbose) {
    setLogLevel('debug');
  }
  log.debug(`Options: ${JSON.stringify(options)}`);

  let discovery: Aranet4Discovery | null = null;
  try {
    const central = await deps.createCentral();

    log.info('Discovering BLE adapters');
    discovery = await discoverAranet4(central, { signal: deps.signal });
    if (discovery.hasNoAdapters) {
      return reportError(options, deps, NO_ADAPTERS_MESSAGE);
    }

    log.info('Looking for Aranet4');
    for (;;) {
      let sample = await nextSample(discovery, options);
      if (!sample) {
        if (deps.signal.aborted) {
          return 0;
        }
        return reportError(options, deps, 'Bluetooth adapters stopped delivering events.');
      }

      if (options.active) {
        sample = await readActively(sample);
      }

      if (options.format === 'monitoring') {
        const result = formatMonitoring(sample);
        deps.stdout(result.output);
        return result.state;
      }

      print(options, deps, sample);

      if (!options.repeat) {
        return 0;
      }

      const waitSeconds = nextWaitSeconds(options, sample);
      if (waitSeconds > 0) {
        // Scanning stops while waiting so stale advertisements do not pile up.
        await discovery.stop();
        log.debug(`Sleeping ${waitSeconds}s before the next sample`);
        await deps.sleep(waitSeconds * 1000, deps.signal);
        discovery = await discoverAranet4(central, { signal: deps.signal });
      }
    }
  } catch (error) {
    if (deps.signal.aborted) {
      return 0;
    }
    if (error instanceof TimeoutError) {
      return reportError(
        options,
        deps,
        `No Aranet4 advertisement received within ${options.timeout}s.`
      );
    }
    log.debug('Command failed:', error);
    const message = `Error: ${describeError(error)}`;
    if (options.format === 'monitoring') {
      deps.stdout(formatMonitoringLine(ServiceState.UNKNOWN, message));
      return ServiceState.UNKNOWN;
    }
    return reportError(options, deps, message);
  } finally {
    await discovery?.stop();
  }
}
