/**
 * GPU fan controller
 *
 * Library entry point: the control core, its collaborators and the
 * configuration helpers. The command-line wiring lives in `src/cli`.
 */

export * from './types/index.js';
export * from './thermal-sample/index.js';
export * from './duty-curve/index.js';
export * from './mode-state-machine/index.js';
export * from './telemetry/index.js';
export * from './actuator/index.js';
export * from './exec/index.js';
export * from './hardware/index.js';
export * from './config/index.js';
export * from './control-loop/index.js';

export {
  ActuatorError,
  ConfigError,
  DependencyError,
  ExitCode,
  FanControlError,
  TelemetryError,
  ToolInvocationError,
} from '../errors.js';
export type { ActuatorOperation, ToolFailureReason } from '../errors.js';
