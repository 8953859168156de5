/**
 * Telemetry collaborator contract
 */

import type { DeviceReading } from '../types/thermal-sample.js';

export interface TelemetrySource {
  /** Name used in logs and errors */
  readonly name: string;
  /**
   * Reads one (index, temperature) pair per detected GPU.
   * Rejects with TelemetryError when the readings cannot be obtained.
   */
  read(signal?: AbortSignal): Promise<DeviceReading[]>;
}
