/**
 * Fan Control Loop
 *
 * Polls GPU temperatures on a fixed interval, drives the mode state
 * machine and the duty curve, and owns the manual-control lease on the
 * BMC. Cycles run strictly one after another: a cycle, including all of
 * its actuation, completes before the next sleep begins.
 *
 * Whatever ends the loop (stop request, signal, fatal error), the BMC is
 * asked exactly once to resume automatic control before `run()` resolves.
 */

import { EventEmitter } from 'node:events';
import { setTimeout as delay } from 'node:timers/promises';
import type { FanPolicy } from '../types/fan-policy.js';
import type { ControlMode, ModeDecision } from '../types/control-mode.js';
import type { ThermalSample } from '../types/thermal-sample.js';
import type { TelemetrySource } from '../telemetry/telemetry-source.js';
import type { FanActuator } from '../actuator/fan-actuator.js';
import { createThermalSample } from '../thermal-sample/thermal-sample.js';
import { mapTemperatureToDuty } from '../duty-curve/duty-curve.js';
import { ModeStateMachine } from '../mode-state-machine/mode-state-machine.js';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { retry } from '../../utils/retry.js';
import {
  ActuatorError,
  ExitCode,
  TelemetryError,
  describeError,
  isAbortError,
  toError,
  type ActuatorOperation,
} from '../../errors.js';

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface FanControlLoopOptions {
  policy: FanPolicy;
  telemetry: TelemetrySource;
  actuator: FanActuator;
  /** Interruptible wait between cycles; resolves early once the signal aborts */
  sleep?: Sleeper;
  now?: () => number;
}

export interface FanControlStatus {
  mode: ControlMode;
  running: boolean;
  cycles: number;
  lastAggregateC?: number;
  lastDutyPct?: number;
  hottestGpu?: { index: number; name?: string };
  consecutiveTelemetryFailures: number;
  lastUpdate?: Date;
}

export type CycleReport =
  | {
      status: 'completed';
      sample: ThermalSample;
      decision: ModeDecision;
      mode: ControlMode;
      dutyPct?: number;
    }
  | {
      status: 'skipped';
      mode: ControlMode;
      error: TelemetryError;
    };

export type StopReason = 'stop_requested' | 'fatal_error';

export interface ControlLoopOutcome {
  reason: StopReason;
  exitCode: ExitCode;
  cycles: number;
  /** Error that ended the loop, if any */
  error?: Error;
  /** Set when automatic control could not be restored on the way out */
  releaseError?: Error;
}

const interruptibleSleep: Sleeper = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (!signal?.aborted) {
      throw error;
    }
  }
};

export class FanControlLoop extends EventEmitter {
  private readonly policy: FanPolicy;
  private readonly telemetry: TelemetrySource;
  private readonly actuator: FanActuator;
  private readonly modeMachine: ModeStateMachine;
  private readonly sleep: Sleeper;
  private readonly now: () => number;
  private readonly logger = createSubsystemLogger('fan/control-loop');

  private readonly stopController = new AbortController();
  private running = false;
  private cycles = 0;
  private consecutiveTelemetryFailures = 0;
  private lastSample?: ThermalSample;
  private lastDutyPct?: number;
  private lastUpdate?: Date;
  private release?: Promise<Error | undefined>;

  constructor(options: FanControlLoopOptions) {
    super();
    this.policy = options.policy;
    this.telemetry = options.telemetry;
    this.actuator = options.actuator;
    this.sleep = options.sleep ?? interruptibleSleep;
    this.now = options.now ?? Date.now;
    this.modeMachine = new ModeStateMachine({
      enterManualC: this.policy.thresholds.enterManualC,
      exitManualC: this.policy.thresholds.exitManualC,
      handoffDelayMs: this.policy.handoff.delay * 1000,
      idleUtilizationPct: this.policy.handoff.idleUtilization,
    });

    this.logger.info('Fan control loop initialized', {
      telemetry: this.telemetry.name,
      actuator: this.actuator.name,
      interval: this.policy.monitoring.interval,
      thresholds: this.policy.thresholds,
      ignoredGpus: this.policy.devices.ignore,
    });
  }

  get mode(): ControlMode {
    return this.modeMachine.mode;
  }

  /**
   * Runs cycles until stopped or a fatal error occurs, then hands
   * control back to the BMC.
   */
  async run(signal?: AbortSignal): Promise<ControlLoopOutcome> {
    if (this.running) {
      throw new Error('Fan control loop is already running');
    }
    if (this.release) {
      throw new Error('Fan control loop has already shut down');
    }

    const stopSignal = this.stopController.signal;
    const forwardAbort = () => this.stop();
    if (signal?.aborted) {
      this.stop();
    } else {
      signal?.addEventListener('abort', forwardAbort, { once: true });
    }

    this.running = true;
    this.emit('loopStarted', { interval: this.policy.monitoring.interval, timestamp: new Date() });
    this.logger.info('Fan control loop started', { interval: this.policy.monitoring.interval });

    let failure: Error | undefined;
    try {
      while (!stopSignal.aborted) {
        await this.runCycle(stopSignal);
        if (stopSignal.aborted) break;
        await this.sleep(this.policy.monitoring.interval * 1000, stopSignal);
      }
    } catch (error) {
      if (stopSignal.aborted && isAbortError(error)) {
        this.logger.info('Cycle interrupted by stop request');
      } else {
        failure = toError(error);
        this.logger.fatal('Fan control loop failed', describeError(failure));
      }
    } finally {
      signal?.removeEventListener('abort', forwardAbort);
      this.running = false;
    }

    const releaseError = await this.releaseControl();
    const outcome: ControlLoopOutcome = {
      reason: failure ? 'fatal_error' : 'stop_requested',
      exitCode: releaseError ? ExitCode.RestoreFailed : failure ? ExitCode.RuntimeFailure : ExitCode.Ok,
      cycles: this.cycles,
      error: failure,
      releaseError,
    };

    this.emit('loopStopped', outcome);
    this.logger.info('Fan control loop stopped', {
      reason: outcome.reason,
      exitCode: outcome.exitCode,
      cycles: outcome.cycles,
    });
    return outcome;
  }

  /**
   * Requests the loop to stop at the next cycle or sleep boundary
   */
  stop(): void {
    if (!this.stopController.signal.aborted) {
      this.logger.info('Stop requested');
      this.stopController.abort();
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Performs one poll / decide / actuate cycle
   */
  async runCycle(signal?: AbortSignal): Promise<CycleReport> {
    let sample: ThermalSample;
    try {
      const readings = await this.telemetry.read(signal);
      this.consecutiveTelemetryFailures = 0;
      sample = createThermalSample(readings, {
        ignore: this.policy.devices.ignore,
        sanityRange: this.policy.devices.sanityRange,
        takenAt: new Date(this.now()),
      });
    } catch (error) {
      return this.handleTelemetryFailure(error, signal);
    }

    this.reportSampleAnomalies(sample);

    const decision = this.modeMachine.decide({
      aggregateC: sample.aggregateC,
      utilizationPct: sample.utilizationPct,
      timestamp: this.now(),
    });

    if (decision.transition === 'enter_manual') {
      await this.actuate('enterManual', () => this.actuator.enterManual());
    } else if (decision.transition === 'exit_manual') {
      await this.actuate('restoreAutomatic', () => this.actuator.restoreAutomatic());
      this.lastDutyPct = undefined;
    }
    this.modeMachine.apply(decision);

    if (decision.transition !== 'none') {
      this.logger.info(
        decision.to === 'manual' ? 'Took fan control from the BMC' : 'Handed fan control back to the BMC',
        {
          reason: decision.reason,
          aggregateC: sample.aggregateC,
          hottestGpu: sample.hottest?.index,
          hottestGpuName: sample.hottest?.name,
        },
      );
      this.emit('modeChanged', { from: decision.from, to: decision.to, reason: decision.reason, timestamp: new Date() });
    }

    // Duty follows the curve every manual cycle, including the entry cycle
    let dutyPct: number | undefined;
    if (decision.to === 'manual' && sample.aggregateC !== undefined) {
      const target = mapTemperatureToDuty(sample.aggregateC, this.policy.thresholds);
      await this.actuate('setDuty', () => this.actuator.setDuty(target));
      dutyPct = target;
      if (this.lastDutyPct !== target) {
        this.logger.debug('Fan duty updated', { aggregateC: sample.aggregateC, dutyPct: target, previousDutyPct: this.lastDutyPct });
      }
      this.lastDutyPct = target;
      this.emit('dutyApplied', { dutyPct: target, aggregateC: sample.aggregateC, timestamp: new Date() });
    }

    this.cycles++;
    this.lastSample = sample;
    this.lastUpdate = new Date(this.now());

    const report: CycleReport = { status: 'completed', sample, decision, mode: this.modeMachine.mode, dutyPct };
    this.emit('cycleCompleted', report);
    return report;
  }

  getStatus(): FanControlStatus {
    const hottest = this.lastSample?.hottest;
    return {
      mode: this.modeMachine.mode,
      running: this.running,
      cycles: this.cycles,
      lastAggregateC: this.lastSample?.aggregateC,
      lastDutyPct: this.lastDutyPct,
      hottestGpu: hottest ? { index: hottest.index, name: hottest.name } : undefined,
      consecutiveTelemetryFailures: this.consecutiveTelemetryFailures,
      lastUpdate: this.lastUpdate,
    };
  }

  /**
   * Asks the BMC to resume automatic control. Attempted once per loop
   * lifetime; later calls return the first attempt's result.
   */
  releaseControl(): Promise<Error | undefined> {
    if (!this.release) {
      this.release = this.restoreAutomaticOnce();
    }
    return this.release;
  }

  private async restoreAutomaticOnce(): Promise<Error | undefined> {
    const previousMode = this.modeMachine.mode;
    try {
      await this.actuator.restoreAutomatic();
    } catch (error) {
      const err = toError(error);
      this.logger.fatal('COULD NOT RETURN FAN CONTROL TO THE BMC; fans may be left at a fixed duty', {
        previousMode,
        lastDutyPct: this.lastDutyPct,
        ...describeError(err),
      });
      this.emit('releaseFailed', err);
      return err;
    }

    this.modeMachine.forceAutomatic();
    this.lastDutyPct = undefined;
    this.logger.info('Returned automatic fan control to the BMC', { previousMode });
    this.emit('controlReleased', { previousMode, timestamp: new Date() });
    return undefined;
  }

  private handleTelemetryFailure(error: unknown, signal?: AbortSignal): CycleReport {
    if (signal?.aborted && isAbortError(error)) {
      throw error;
    }
    if (!(error instanceof TelemetryError)) {
      throw error;
    }

    this.consecutiveTelemetryFailures++;
    const limit = this.policy.monitoring.maxConsecutiveFailures;
    this.logger.warn('GPU telemetry read failed; keeping current fan mode and duty', {
      attempt: this.consecutiveTelemetryFailures,
      limit,
      mode: this.modeMachine.mode,
      ...describeError(error),
    });
    this.emit('telemetryError', error);

    if (this.consecutiveTelemetryFailures >= limit) {
      throw new TelemetryError(
        `GPU telemetry failed ${this.consecutiveTelemetryFailures} consecutive times: ${error.message}`,
        error.source,
        error,
      );
    }

    return { status: 'skipped', mode: this.modeMachine.mode, error };
  }

  private reportSampleAnomalies(sample: ThermalSample): void {
    for (const reading of sample.rejected) {
      this.logger.warn('Discarded GPU reading outside the sanity range', {
        gpu: reading.index,
        temperatureC: reading.temperatureC,
        sanityRange: this.policy.devices.sanityRange,
      });
    }
    for (const reading of sample.implausible) {
      if (Number.isNaN(reading.temperatureC)) {
        this.logger.warn('GPU temperature unreadable; card left out of this cycle', { gpu: reading.index, name: reading.name });
        continue;
      }
      this.logger.warn('Implausible GPU temperature reading', {
        gpu: reading.index,
        temperatureC: reading.temperatureC,
      });
    }
    if (sample.readings.length === 0) {
      this.logger.debug('No GPU readings retained this cycle', {
        ignored: sample.ignored.map(r => r.index),
        rejected: sample.rejected.map(r => r.index),
      });
    }
  }

  private async actuate(operation: ActuatorOperation, command: () => Promise<void>): Promise<void> {
    const { retries, retryDelay } = this.policy.actuator;
    const stopSignal = this.stopController.signal;
    await retry(command, {
      maxRetries: retries,
      baseDelay: retryDelay,
      maxDelay: Math.max(retryDelay, retryDelay * 8),
      backoffFactor: 2,
      shouldRetry: error => error instanceof ActuatorError,
      sleep: ms => this.sleep(ms, stopSignal),
      signal: stopSignal,
      onRetry: (attempt, error, wait) => {
        this.logger.warn('Fan command failed, retrying', {
          attempt,
          retries,
          delayMs: wait,
          ...describeError(error),
        });
        this.emit('actuatorRetry', { operation, attempt, error });
      },
    });
  }
}
