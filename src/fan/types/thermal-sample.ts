/**
 * Thermal sample types
 *
 * Readings are produced fresh on every poll and never persisted.
 */

export interface DeviceReading {
  /** GPU index as enumerated by the telemetry tool */
  index: number;
  /** Core temperature in Celsius */
  temperatureC: number;
  /** Product name, when the telemetry source reports one */
  name?: string;
  /** Utilization percentage, when known */
  utilizationPct?: number;
}

export interface ThermalSample {
  /** Readings that drive the fan response, in source order */
  readings: DeviceReading[];
  /** Readings dropped because their index is in the ignore set */
  ignored: DeviceReading[];
  /** Readings dropped for falling outside the configured sanity range */
  rejected: DeviceReading[];
  /** Retained readings that look physically implausible */
  implausible: DeviceReading[];
  /** Hottest retained temperature; undefined when nothing was retained */
  aggregateC?: number;
  /** Retained reading that produced the aggregate */
  hottest?: DeviceReading;
  /** Highest known utilization across retained readings */
  utilizationPct?: number;
  takenAt: Date;
}
