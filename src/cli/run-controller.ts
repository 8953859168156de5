/**
 * Controller wiring
 *
 * Turns parsed command-line options into a running fan control loop:
 * logging, configuration, dependency check, collaborators, process
 * signal handling. Resolves with the process exit code.
 */

import type { EventEmitter } from 'node:events';
import { configureLogging, isLogLevel, logError } from '../logger.js';
import { createSubsystemLogger } from '../logging/subsystem.js';
import { ConfigError, DependencyError, ExitCode, describeError, toError } from '../errors.js';
import { loadFanPolicy, parseIndexList, type PolicyInput } from '../fan/config/configuration.js';
import { checkDependencies } from '../fan/hardware/dependencies.js';
import { NvidiaSmiTelemetry } from '../fan/telemetry/nvidia-smi.js';
import { IpmiFanActuator } from '../fan/actuator/ipmi-actuator.js';
import { describeDutyCurve } from '../fan/duty-curve/duty-curve.js';
import { FanControlLoop, type Sleeper } from '../fan/control-loop/control-loop.js';
import type { TelemetrySource } from '../fan/telemetry/telemetry-source.js';
import type { FanActuator } from '../fan/actuator/fan-actuator.js';
import type { ToolRunner } from '../fan/exec/run-tool.js';
import type { FanPolicy } from '../fan/types/fan-policy.js';

const log = createSubsystemLogger('cli');

export interface CliOptions {
  config?: string;
  pollInterval?: string;
  enterManual?: string;
  exitManual?: string;
  curveMin?: string;
  curveMax?: string;
  minDuty?: string;
  maxDuty?: string;
  ignoreGpus?: string;
  handoffDelay?: string;
  idleUtilization?: string;
  sanityMin?: string;
  sanityMax?: string;
  commandTimeout?: string;
  actuatorRetries?: string;
  nvidiaSmi?: string;
  ipmitool?: string;
  logLevel?: string;
  pretty?: boolean;
  skipDependencyCheck?: boolean;
}

export interface ControllerOverrides {
  telemetry?: TelemetrySource;
  actuator?: FanActuator;
  runner?: ToolRunner;
  sleep?: Sleeper;
  /** Receives signal and crash handlers; defaults to `process` */
  processEvents?: EventEmitter;
  /** Called with the loop once it is constructed, before it starts */
  onLoop?: (loop: FanControlLoop) => void;
}

const TERMINATION_SIGNALS = ['SIGINT', 'SIGTERM'] as const;

/**
 * Maps command-line options onto the configuration input shape
 */
export function buildPolicyOverrides(options: CliOptions): PolicyInput {
  const sanityRange = options.sanityMin !== undefined || options.sanityMax !== undefined
    ? { min: options.sanityMin, max: options.sanityMax }
    : undefined;

  return {
    monitoring: {
      interval: options.pollInterval,
      commandTimeout: options.commandTimeout,
    },
    thresholds: {
      enterManualC: options.enterManual,
      exitManualC: options.exitManual,
      curveMinC: options.curveMin,
      curveMaxC: options.curveMax,
      minDutyPct: options.minDuty,
      maxDutyPct: options.maxDuty,
    },
    handoff: {
      delay: options.handoffDelay,
      idleUtilization: options.idleUtilization,
    },
    devices: {
      ignore: options.ignoreGpus !== undefined ? parseIndexList(options.ignoreGpus) : undefined,
      sanityRange,
    },
    actuator: {
      retries: options.actuatorRetries,
    },
    tools: {
      nvidiaSmi: options.nvidiaSmi,
      ipmitool: options.ipmitool,
    },
  };
}

export async function runController(options: CliOptions, overrides: ControllerOverrides = {}): Promise<ExitCode> {
  const requestedLevel = options.logLevel?.trim().toLowerCase();
  const level = requestedLevel === undefined || isLogLevel(requestedLevel) ? requestedLevel : null;
  if (level === null) {
    configureLogging({ pretty: options.pretty });
    log.error('Invalid configuration, refusing to start', { issues: [`logLevel: unknown level "${options.logLevel}"`] });
    return ExitCode.ConfigInvalid;
  }
  configureLogging({ level, pretty: options.pretty });

  let policy: FanPolicy;
  try {
    policy = loadFanPolicy({ file: options.config, overrides: buildPolicyOverrides(options) });
  } catch (error) {
    if (error instanceof ConfigError) {
      log.error('Invalid configuration, refusing to start', { issues: error.issues, error: error.message });
      return ExitCode.ConfigInvalid;
    }
    throw error;
  }

  if (!options.skipDependencyCheck) {
    try {
      await checkDependencies([policy.tools.nvidiaSmi, policy.tools.ipmitool], { runner: overrides.runner });
    } catch (error) {
      if (error instanceof DependencyError) {
        log.error('Cannot locate required tools, aborting', { missing: error.missing });
        return ExitCode.DependencyMissing;
      }
      throw error;
    }
  }

  const timeoutMs = policy.monitoring.commandTimeout * 1000;
  const telemetry = overrides.telemetry ?? new NvidiaSmiTelemetry({
    binary: policy.tools.nvidiaSmi,
    timeoutMs,
    runner: overrides.runner,
  });
  const actuator = overrides.actuator ?? new IpmiFanActuator({
    binary: policy.tools.ipmitool,
    timeoutMs,
    runner: overrides.runner,
  });

  const loop = new FanControlLoop({ policy, telemetry, actuator, sleep: overrides.sleep });
  log.info('Effective fan curve', { curve: describeDutyCurve(policy.thresholds) });
  overrides.onLoop?.(loop);

  const events = overrides.processEvents ?? process;
  let crash: Error | undefined;

  const signalHandlers = TERMINATION_SIGNALS.map(signal => {
    const handler = () => {
      log.info(`Received ${signal}, returning fan control to the BMC`);
      loop.stop();
    };
    events.on(signal, handler);
    return { signal, handler };
  });
  const onCrash = (error: unknown) => {
    crash = toError(error);
    log.fatal('Unhandled error, shutting down', describeError(crash));
    loop.stop();
  };
  events.on('uncaughtException', onCrash);
  events.on('unhandledRejection', onCrash);

  try {
    const outcome = await loop.run();

    if (outcome.releaseError) {
      logError('WARNING: COULD NOT RETURN FAN CONTROL TO THE BMC. Restore it manually with: ' +
        `${policy.tools.ipmitool} raw 0x30 0x30 0x01 0x01`, describeError(outcome.releaseError));
      return ExitCode.RestoreFailed;
    }
    if (crash && outcome.exitCode === ExitCode.Ok) {
      return ExitCode.RuntimeFailure;
    }
    return outcome.exitCode;
  } finally {
    for (const { signal, handler } of signalHandlers) {
      events.off(signal, handler);
    }
    events.off('uncaughtException', onCrash);
    events.off('unhandledRejection', onCrash);
  }
}
