/**
 * Error taxonomy and process exit codes
 */

export type ActuatorOperation = 'enterManual' | 'setDuty' | 'restoreAutomatic';

export type ToolFailureReason =
  | 'not_found'
  | 'permission_denied'
  | 'timeout'
  | 'aborted'
  | 'exit_code'
  | 'spawn_failed';

export const ExitCode = {
  Ok: 0,
  ConfigInvalid: 2,
  RestoreFailed: 3,
  RuntimeFailure: 4,
  DependencyMissing: 5,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export class FanControlError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'FanControlError';
  }
}

export class ConfigError extends FanControlError {
  constructor(message: string, public readonly issues: string[] = [], cause?: Error) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigError';
  }
}

export class TelemetryError extends FanControlError {
  constructor(message: string, public readonly source: string, cause?: Error) {
    super(message, 'TELEMETRY_ERROR', cause);
    this.name = 'TelemetryError';
  }
}

export class ActuatorError extends FanControlError {
  constructor(
    message: string,
    public readonly operation: ActuatorOperation,
    public readonly tool: string,
    cause?: Error,
  ) {
    super(message, 'ACTUATOR_ERROR', cause);
    this.name = 'ActuatorError';
  }
}

export class ToolInvocationError extends FanControlError {
  constructor(
    message: string,
    public readonly tool: string,
    public readonly args: readonly string[],
    public readonly reason: ToolFailureReason,
    public readonly exitCode?: number,
    public readonly stderr?: string,
    cause?: Error,
  ) {
    super(message, 'TOOL_ERROR', cause);
    this.name = 'ToolInvocationError';
  }
}

export class DependencyError extends FanControlError {
  constructor(public readonly missing: string[]) {
    super(`Cannot locate required tool(s): ${missing.join(', ')}`, 'DEPENDENCY_ERROR');
    this.name = 'DependencyError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * True when the error, or anything in its cause chain, is a cancelled tool call
 */
export function isAbortError(error: unknown): boolean {
  let current: unknown = error;
  while (current instanceof Error) {
    if (current.name === 'AbortError') {
      return true;
    }
    if (current instanceof ToolInvocationError && current.reason === 'aborted') {
      return true;
    }
    current = current instanceof FanControlError ? current.cause : undefined;
  }
  return false;
}

/**
 * Flattens an error and its causes into log metadata
 */
export function describeError(error: unknown): Record<string, unknown> {
  const err = toError(error);
  const details: Record<string, unknown> = { error: err.message, errorName: err.name };

  if (err instanceof ActuatorError) {
    details.operation = err.operation;
    details.tool = err.tool;
  }
  if (err instanceof TelemetryError) {
    details.source = err.source;
  }
  if (err instanceof FanControlError && err.cause) {
    const cause = err.cause;
    details.cause = cause.message;
    if (cause instanceof ToolInvocationError) {
      details.tool = cause.tool;
      details.args = cause.args.join(' ');
      details.reason = cause.reason;
      if (cause.exitCode !== undefined) details.exitCode = cause.exitCode;
      if (cause.stderr) details.stderr = cause.stderr;
    }
  }
  return details;
}
