/**
 * Output formats for the aranet4 command.
 */

import type { DiscoveredDevice } from '../discovery';
import { CalibrationState, DisplayStatus } from '../models/enums';
import { FirmwareVersion } from '../models/firmware';
import { pressureAtm, temperatureF, type CurrentReadingDetailed } from '../models/reading';

export const NO_SAMPLE_MESSAGE = '<no sample data included in advertisement>';

const STATUS_LABELS: Record<DisplayStatus, string> = {
  [DisplayStatus.GREEN]: 'Green',
  [DisplayStatus.YELLOW]: 'Yellow',
  [DisplayStatus.RED]: 'Red',
};

function percent(fraction: number): number {
  return Math.round(fraction * 100);
}

function round(value: number, digits: number): number {
  return Number(value.toFixed(digits));
}

/**
 * Human-readable multi-line rendering of a reading. Absent values are omitted.
 */
export function formatReadingText(reading: CurrentReadingDetailed): string {
  const lines = [
    `Measurement Age: ${reading.age}/${reading.interval}s`,
    `Battery: ${percent(reading.battery)}%`,
  ];

  if (reading.co2Ppm !== null) {
    lines.push(`CO2: ${reading.co2Ppm} PPM`);
  }
  lines.push(`CO2 Status: ${STATUS_LABELS[reading.status]}`);

  const fahrenheit = temperatureF(reading);
  if (reading.temperatureC !== null && fahrenheit !== null) {
    lines.push(`Temperature: ${fahrenheit.toFixed(1)}°F (${reading.temperatureC.toFixed(1)}°C)`);
  }
  lines.push(`Rel. Humidity: ${percent(reading.humidity)}%`);

  const atm = pressureAtm(reading);
  if (reading.pressureHpa !== null && atm !== null) {
    lines.push(`Pressure: ${atm.toFixed(3)} atm (${reading.pressureHpa.toFixed(0)} hPa)`);
  }

  return lines.join('\n');
}

export function formatText(found: DiscoveredDevice): string {
  return found.currentReading ? formatReadingText(found.currentReading) : NO_SAMPLE_MESSAGE;
}

/**
 * JSON-ready view of a discovered device. Enums become their names and
 * absent values stay null.
 */
export function toJsonObject(found: DiscoveredDevice): Record<string, unknown> {
  const { manufacturerData, currentReading } = found;
  return {
    adapter: found.adapter.id,
    peripheralId: found.peripheralId,
    manufacturerData: {
      disconnected: manufacturerData.disconnected,
      calibrationState: CalibrationState[manufacturerData.calibrationState],
      dfuActive: manufacturerData.dfuActive,
      integrations: manufacturerData.integrations,
      version: FirmwareVersion.format(manufacturerData.version),
    },
    currentReading: currentReading && {
      co2Ppm: currentReading.co2Ppm,
      temperatureC: currentReading.temperatureC,
      pressureHpa: currentReading.pressureHpa,
      humidity: currentReading.humidity,
      battery: currentReading.battery,
      status: DisplayStatus[currentReading.status],
      interval: currentReading.interval,
      age: currentReading.age,
    },
  };
}

/**
 * @param pretty - Indent the output; otherwise one object per line
 */
export function formatJson(found: DiscoveredDevice, pretty: boolean): string {
  return JSON.stringify(toJsonObject(found), null, pretty ? 2 : undefined);
}

export function formatJsonError(message: string): string {
  return JSON.stringify({ status: 'error', message });
}

/**
 * Monitoring plugin states and their exit codes.
 */
export enum ServiceState {
  OK = 0,
  WARNING = 1,
  CRITICAL = 2,
  UNKNOWN = 3,
}

export interface MonitoringResult {
  state: ServiceState;
  output: string;
}

const MONITORING_LABEL = 'ARANET4';

/**
 * Performance data entry: 'label'=value[UOM];[warn];[crit];[min];[max]
 */
function perfData(
  label: string,
  value: number,
  unit: string,
  thresholds: [warn?: number, crit?: number, min?: number, max?: number] = []
): string {
  const [warn, crit, min, max] = thresholds.map((t) => (t === undefined ? '' : String(t)));
  return `${label}=${value}${unit};${warn ?? ''};${crit ?? ''};${min ?? ''};${max ?? ''}`;
}

export function formatMonitoringLine(state: ServiceState, description: string, perf: string[] = []): string {
  const line = `${MONITORING_LABEL} ${ServiceState[state]} - ${description}`;
  return perf.length > 0 ? `${line} | ${perf.join(' ')}` : line;
}

/**
 * Render a discovered device as a monitoring plugin result: OK with a
 * reading, WARNING without one.
 */
export function formatMonitoring(found: DiscoveredDevice): MonitoringResult {
  const version = FirmwareVersion.format(found.manufacturerData.version);
  const reading = found.currentReading;

  if (!reading) {
    return {
      state: ServiceState.WARNING,
      output: formatMonitoringLine(
        ServiceState.WARNING,
        `Advertisement from ${found.peripheralId}, Firmware ${version} (Measurement not included)`
      ),
    };
  }

  const perf = [
    perfData('battery', percent(reading.battery), '%', [30, 10, 0, 100]),
    perfData('co2_status', reading.status, '', [2, 3, 1, 3]),
    perfData('humidity', percent(reading.humidity), '%', [undefined, undefined, 0, 100]),
  ];
  if (reading.co2Ppm !== null) {
    perf.push(perfData('co2_ppm', reading.co2Ppm, 'ppm', [undefined, undefined, 0]));
  }
  const fahrenheit = temperatureF(reading);
  if (fahrenheit !== null) {
    perf.push(perfData('temperature_f', round(fahrenheit, 2), 'F', [undefined, undefined, 0]));
  }
  const atm = pressureAtm(reading);
  if (atm !== null) {
    perf.push(perfData('pressure_atm', round(atm, 4), 'atm', [undefined, undefined, 0]));
  }

  return {
    state: ServiceState.OK,
    output: formatMonitoringLine(
      ServiceState.OK,
      `Advertisement from ${found.peripheralId}, Firmware ${version} ` +
        `(Measurement age ${reading.age}/${reading.interval}s)`,
      perf
    ),
  };
}
