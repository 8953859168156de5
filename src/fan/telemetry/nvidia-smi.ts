/**
 * NVIDIA telemetry source
 *
 * Queries nvidia-smi once per call for index, name, temperature and
 * utilization of every GPU, in headerless CSV without units.
 */

import { TelemetryError, toError } from '../../errors.js';
import { runTool, type ToolRunner } from '../exec/run-tool.js';
import type { DeviceReading } from '../types/thermal-sample.js';
import type { TelemetrySource } from './telemetry-source.js';

export const NVIDIA_SMI_QUERY_ARGS: readonly string[] = [
  '--query-gpu=index,name,temperature.gpu,utilization.gpu',
  '--format=csv,noheader,nounits',
];

export interface NvidiaSmiTelemetryOptions {
  binary?: string;
  timeoutMs?: number;
  runner?: ToolRunner;
}

function parseNumber(field: string | undefined): number | undefined {
  if (field === undefined || !/^-?\d+(\.\d+)?$/.test(field)) {
    return undefined;
  }
  return Number(field);
}

/**
 * Parses `index, name, temperature, utilization` rows.
 * Throws on a row whose index is not numeric. An unreadable temperature
 * (e.g. `[N/A]`) is returned as NaN and filtered by the thermal sample.
 */
export function parseNvidiaSmiCsv(output: string): DeviceReading[] {
  const readings: DeviceReading[] = [];
  const lines = output.split('\n').map(line => line.trim()).filter(line => line.length > 0);

  for (const line of lines) {
    const fields = line.split(',').map(field => field.trim());
    if (fields.length < 3) {
      throw new Error(`Unexpected nvidia-smi row: "${line}"`);
    }

    // Product names may themselves contain commas; temperature and
    // utilization are always the last two columns
    const index = parseNumber(fields[0]);
    const hasUtilization = fields.length >= 4;
    const temperatureField = hasUtilization ? fields[fields.length - 2] : fields[fields.length - 1];
    const temperatureC = parseNumber(temperatureField) ?? Number.NaN;
    const name = fields.slice(1, hasUtilization ? -2 : -1).join(', ');

    if (index === undefined || !Number.isInteger(index) || index < 0) {
      throw new Error(`Invalid GPU index in nvidia-smi row: "${line}"`);
    }

    const reading: DeviceReading = { index, temperatureC };
    if (name.length > 0) {
      reading.name = name;
    }
    const utilizationPct = hasUtilization ? parseNumber(fields[fields.length - 1]) : undefined;
    if (utilizationPct !== undefined) {
      reading.utilizationPct = utilizationPct;
    }
    readings.push(reading);
  }

  return readings;
}

export class NvidiaSmiTelemetry implements TelemetrySource {
  readonly name = 'nvidia-smi';
  private readonly binary: string;
  private readonly timeoutMs?: number;
  private readonly runner: ToolRunner;

  constructor(options: NvidiaSmiTelemetryOptions = {}) {
    this.binary = options.binary ?? 'nvidia-smi';
    this.timeoutMs = options.timeoutMs;
    this.runner = options.runner ?? runTool;
  }

  async read(signal?: AbortSignal): Promise<DeviceReading[]> {
    let stdout: string;
    try {
      ({ stdout } = await this.runner(this.binary, NVIDIA_SMI_QUERY_ARGS, {
        timeoutMs: this.timeoutMs,
        signal,
      }));
    } catch (error) {
      const cause = toError(error);
      throw new TelemetryError(`GPU temperature query failed: ${cause.message}`, this.name, cause);
    }

    try {
      return parseNvidiaSmiCsv(stdout);
    } catch (error) {
      const cause = toError(error);
      throw new TelemetryError(`Could not parse ${this.binary} output: ${cause.message}`, this.name, cause);
    }
  }
}
