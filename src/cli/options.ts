/**
 * Command-line options for the aranet4 command.
 */

import { parseArgs } from 'node:util';
import { z } from 'zod';
import { Aranet4Error, describeError } from '../exceptions';

export const USAGE = `Usage: aranet4 [options]

Wait for an Aranet4 advertisement and print its reading.

Options:
  -f, --format <text|json|monitoring>  Output format (default: text). With --repeat
                                       and json, one JSON object per line.
  -a, --active                         Connect and read the sensor instead of using
                                       the advertised reading
  -r, --repeat                         Keep printing samples (ignored by monitoring)
  -i, --interval <seconds|device|none> Wait between samples when repeating. 0 or
                                       "device" uses the device's own interval.
  -d, --device <address>               Only accept this device
  -t, --timeout <seconds>              Give up when no sample arrives in time
  -v, --verbose                        Debug logging on stderr
  -h, --help                           Show this help`;

export class UsageError extends Aranet4Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const OutputFormatSchema = z.enum(['text', 'json', 'monitoring']);
export type OutputFormat = z.infer<typeof OutputFormatSchema>;

/**
 * Wait between samples: seconds, the device's own interval, or no wait.
 */
export type IntervalSetting = number | 'device' | 'none';

const SECONDS_PATTERN = /^\d+(\.\d+)?$/;

export const IntervalSchema = z
  .union([
    z.enum(['device', 'none']),
    z
      .string()
      .regex(SECONDS_PATTERN, 'Expected a number of seconds, "device" or "none"')
      .transform(Number),
  ])
  .transform((value): IntervalSetting => (value === 0 ? 'device' : value));

export const CliOptionsSchema = z.object({
  format: OutputFormatSchema.default('text'),
  active: z.boolean().default(false),
  repeat: z.boolean().default(false),
  interval: IntervalSchema.default('device'),
  device: z
    .string()
    .trim()
    .min(1, 'Device address must not be empty')
    .transform(normalizeDeviceId)
    .optional(),
  timeout: z
    .string()
    .regex(SECONDS_PATTERN, 'Expected a number of seconds')
    .transform(Number)
    .refine((seconds) => seconds > 0, 'Timeout must be greater than 0')
    .optional(),
  verbose: z.boolean().default(false),
  help: z.boolean().default(false),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

/**
 * Canonical form of a device identifier for comparison: lowercase hex digits
 * only, so "AA:BB:CC:DD:EE:FF" matches "aabbccddeeff".
 */
export function normalizeDeviceId(id: string): string {
  return id.toLowerCase().replace(/[^0-9a-f]/g, '');
}

/**
 * Parse and validate command-line arguments.
 *
 * @param argv - Arguments without the node and script paths
 * @throws {UsageError} On unknown options, missing values or invalid values
 */
export function parseCliOptions(argv: string[]): CliOptions {
  let values: unknown;
  try {
    ({ values } = parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        format: { type: 'string', short: 'f' },
        active: { type: 'boolean', short: 'a' },
        repeat: { type: 'boolean', short: 'r' },
        interval: { type: 'string', short: 'i' },
        device: { type: 'string', short: 'd' },
        timeout: { type: 'string', short: 't' },
        verbose: { type: 'boolean', short: 'v' },
        help: { type: 'boolean', short: 'h' },
      },
    }));
  } catch (error) {
    throw new UsageError(describeError(error));
  }

  const result = CliOptionsSchema.safeParse(values);
  if (!result.success) {
    throw new UsageError(
      result.error.issues
        .map((issue) => `--${issue.path.join('.')}: ${issue.message}`)
        .join('\n')
    );
  }
  return result.data;
}
