/**
 * Test utilities for the fan controller
 *
 * fast-check generators for policies and readings, plus in-process
 * stand-ins for the telemetry and actuator collaborators.
 */

import * as fc from 'fast-check';
import { ActuatorError, ToolInvocationError, TelemetryError, type ActuatorOperation } from '../errors.js';
import { createDefaultFanPolicy } from './config/configuration.js';
import { assertDutyPercent, type FanActuator } from './actuator/fan-actuator.js';
import type { TelemetrySource } from './telemetry/telemetry-source.js';
import type { DeviceReading, FanPolicy, Thresholds } from './types/index.js';

export const propertyTestConfig = {
  numRuns: 100,
};

// Thresholds that satisfy every configuration invariant
export const thresholdsArbitrary: fc.Arbitrary<Thresholds> = fc
  .record({
    exitManualC: fc.integer({ min: 20, max: 70 }),
    band: fc.integer({ min: 1, max: 20 }),
    curveMinC: fc.integer({ min: 20, max: 70 }),
    curveSpan: fc.integer({ min: 1, max: 40 }),
    minDutyPct: fc.integer({ min: 0, max: 99 }),
    dutySpan: fc.integer({ min: 1, max: 100 }),
  })
  .map(({ exitManualC, band, curveMinC, curveSpan, minDutyPct, dutySpan }) => ({
    enterManualC: exitManualC + band,
    exitManualC,
    curveMinC,
    curveMaxC: curveMinC + curveSpan,
    minDutyPct,
    maxDutyPct: Math.min(100, minDutyPct + dutySpan),
  }));

export const temperatureArbitrary = fc.double({ min: -40, max: 130, noNaN: true });

export const deviceReadingsArbitrary: fc.Arbitrary<DeviceReading[]> = fc.uniqueArray(
  fc.record({
    index: fc.integer({ min: 0, max: 15 }),
    temperatureC: fc.integer({ min: 20, max: 100 }),
  }),
  { selector: reading => reading.index, maxLength: 8 },
);

export function createTestPolicy(overrides: {
  thresholds?: Partial<Thresholds>;
  ignore?: number[];
  handoff?: Partial<FanPolicy['handoff']>;
  monitoring?: Partial<FanPolicy['monitoring']>;
  actuator?: Partial<FanPolicy['actuator']>;
} = {}): FanPolicy {
  const defaults = createDefaultFanPolicy();
  return {
    ...defaults,
    monitoring: { ...defaults.monitoring, interval: 1, ...overrides.monitoring },
    thresholds: { ...defaults.thresholds, ...overrides.thresholds },
    handoff: { ...defaults.handoff, ...overrides.handoff },
    devices: { ...defaults.devices, ignore: overrides.ignore ?? [] },
    actuator: { ...defaults.actuator, retryDelay: 0, ...overrides.actuator },
  };
}

/** Thresholds used throughout the worked control scenarios */
export const SCENARIO_THRESHOLDS: Thresholds = {
  enterManualC: 75,
  exitManualC: 65,
  curveMinC: 60,
  curveMaxC: 85,
  minDutyPct: 30,
  maxDutyPct: 100,
};

export function readings(temperatures: Record<number, number>): DeviceReading[] {
  return Object.entries(temperatures).map(([index, temperatureC]) => ({
    index: Number(index),
    temperatureC,
  }));
}

export type TelemetryStep =
  | DeviceReading[]
  | Error
  | ((signal?: AbortSignal) => Promise<DeviceReading[]>);

/**
 * Replays a fixed script of readings and failures; the last step repeats
 */
export class ScriptedTelemetry implements TelemetrySource {
  readonly name = 'scripted';
  reads = 0;
  private readonly steps: TelemetryStep[];

  constructor(steps: TelemetryStep[]) {
    if (steps.length === 0) {
      throw new Error('ScriptedTelemetry needs at least one step');
    }
    this.steps = steps;
  }

  async read(signal?: AbortSignal): Promise<DeviceReading[]> {
    const step = this.steps[Math.min(this.reads, this.steps.length - 1)];
    this.reads++;
    if (step instanceof Error) {
      throw step;
    }
    if (typeof step === 'function') {
      return step(signal);
    }
    return step.map(reading => ({ ...reading }));
  }
}

export function telemetryFailure(message = 'nvidia-smi exited with code 9'): TelemetryError {
  return new TelemetryError(`GPU temperature query failed: ${message}`, 'scripted');
}

/**
 * A telemetry step that never resolves until the signal aborts
 */
export function hangUntilAborted(signal?: AbortSignal): Promise<DeviceReading[]> {
  return new Promise((_resolve, reject) => {
    const abort = () => reject(new TelemetryError(
      'GPU temperature query failed: nvidia-smi was cancelled',
      'scripted',
      new ToolInvocationError('nvidia-smi was cancelled', 'nvidia-smi', [], 'aborted'),
    ));
    if (signal?.aborted) {
      abort();
      return;
    }
    signal?.addEventListener('abort', abort, { once: true });
  });
}

/**
 * Records every command; each operation can be told to fail a number of times
 */
export class RecordingActuator implements FanActuator {
  readonly name = 'recording';
  readonly calls: string[] = [];
  private readonly failures: Partial<Record<ActuatorOperation, number>>;

  constructor(failures: Partial<Record<ActuatorOperation, number>> = {}) {
    this.failures = { ...failures };
  }

  failNext(operation: ActuatorOperation, times = 1): void {
    this.failures[operation] = times;
  }

  count(operation: ActuatorOperation): number {
    return this.calls.filter(call => call === operation || call.startsWith(`${operation}:`)).length;
  }

  async enterManual(): Promise<void> {
    this.record('enterManual', 'enterManual');
  }

  async setDuty(pct: number): Promise<void> {
    assertDutyPercent(pct);
    this.record('setDuty', `setDuty:${pct}`);
  }

  async restoreAutomatic(): Promise<void> {
    this.record('restoreAutomatic', 'restoreAutomatic');
  }

  private record(operation: ActuatorOperation, call: string): void {
    this.calls.push(call);
    const remaining = this.failures[operation] ?? 0;
    if (remaining > 0) {
      this.failures[operation] = remaining - 1;
      throw new ActuatorError(`Could not run ${operation}: ipmitool exited with code 1`, operation, this.name);
    }
  }
}

/**
 * A sleeper that stops the given loop after a number of completed waits
 */
export function stopAfterSleeps(count: number, stop: () => void): (ms: number) => Promise<void> {
  let sleeps = 0;
  return async () => {
    sleeps++;
    if (sleeps >= count) {
      stop();
    }
  };
}
