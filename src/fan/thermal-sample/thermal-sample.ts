/**
 * Thermal Sample Aggregation
 *
 * Filters one poll's GPU readings and reduces them to the single
 * temperature that drives the fans: the hottest retained card.
 */

import type { DeviceReading, ThermalSample } from '../types/thermal-sample.js';
import type { TemperatureRange } from '../types/fan-policy.js';

/** Range outside which an unfiltered reading is flagged as implausible; NaN is always outside */
export const PLAUSIBLE_TEMPERATURE_RANGE: TemperatureRange = { min: 0, max: 125 };

export interface ThermalSampleOptions {
  ignore?: Iterable<number>;
  sanityRange?: TemperatureRange;
  takenAt?: Date;
}

/**
 * Returns the hottest reading, or undefined for an empty sequence.
 * Ties keep the first reading seen; NaN temperatures never win.
 */
export function findHottest(readings: readonly DeviceReading[]): DeviceReading | undefined {
  let hottest: DeviceReading | undefined;
  for (const reading of readings) {
    if (Number.isNaN(reading.temperatureC)) continue;
    if (!hottest || reading.temperatureC > hottest.temperatureC) {
      hottest = reading;
    }
  }
  return hottest;
}

export function aggregateTemperature(readings: readonly DeviceReading[]): number | undefined {
  return findHottest(readings)?.temperatureC;
}

function maxUtilization(readings: readonly DeviceReading[]): number | undefined {
  let max: number | undefined;
  for (const reading of readings) {
    if (reading.utilizationPct !== undefined && (max === undefined || reading.utilizationPct > max)) {
      max = reading.utilizationPct;
    }
  }
  return max;
}

function inRange(temperatureC: number, range: TemperatureRange): boolean {
  return temperatureC >= range.min && temperatureC <= range.max;
}

export function createThermalSample(
  raw: readonly DeviceReading[],
  options: ThermalSampleOptions = {},
): ThermalSample {
  const ignoreSet = new Set(options.ignore ?? []);
  const readings: DeviceReading[] = [];
  const ignored: DeviceReading[] = [];
  const rejected: DeviceReading[] = [];
  const implausible: DeviceReading[] = [];

  for (const reading of raw) {
    if (ignoreSet.has(reading.index)) {
      ignored.push(reading);
      continue;
    }

    if (options.sanityRange) {
      if (!inRange(reading.temperatureC, options.sanityRange)) {
        rejected.push(reading);
        continue;
      }
    } else if (!inRange(reading.temperatureC, PLAUSIBLE_TEMPERATURE_RANGE)) {
      implausible.push(reading);
    }

    readings.push(reading);
  }

  const hottest = findHottest(readings);

  return {
    readings,
    ignored,
    rejected,
    implausible,
    aggregateC: hottest?.temperatureC,
    hottest,
    utilizationPct: maxUtilization(readings),
    takenAt: options.takenAt ?? new Date(),
  };
}
