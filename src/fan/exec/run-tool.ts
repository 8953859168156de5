/**
 * External tool invocation
 *
 * Runs a command-line tool without a shell and classifies failures into
 * ToolInvocationError reasons the callers can report.
 */

import { execFile, type ExecFileException } from 'node:child_process';
import { ToolInvocationError, type ToolFailureReason } from '../../errors.js';

export interface ToolRunOptions {
  /** Kill the tool after this many milliseconds */
  timeoutMs?: number;
  /** Aborting kills the tool and rejects with reason `aborted` */
  signal?: AbortSignal;
}

export interface ToolResult {
  stdout: string;
  stderr: string;
}

export type ToolRunner = (tool: string, args: readonly string[], options?: ToolRunOptions) => Promise<ToolResult>;

const MAX_OUTPUT_BYTES = 1024 * 1024;

function classify(error: ExecFileException, signal?: AbortSignal): ToolFailureReason {
  if (error.name === 'AbortError' || signal?.aborted) return 'aborted';
  if (error.code === 'ENOENT') return 'not_found';
  if (error.code === 'EACCES' || error.code === 'EPERM') return 'permission_denied';
  if (error.killed && error.signal === 'SIGTERM') return 'timeout';
  if (typeof error.code === 'number') return 'exit_code';
  return 'spawn_failed';
}

function describe(tool: string, reason: ToolFailureReason, error: ExecFileException, timeoutMs?: number): string {
  switch (reason) {
    case 'not_found':
      return `${tool} was not found on PATH`;
    case 'permission_denied':
      return `Permission denied running ${tool}`;
    case 'timeout':
      return `${tool} timed out after ${timeoutMs ?? 0}ms`;
    case 'aborted':
      return `${tool} was cancelled`;
    case 'exit_code':
      return `${tool} exited with code ${String(error.code)}`;
    default:
      return `Failed to run ${tool}: ${error.message}`;
  }
}

export const runTool: ToolRunner = (tool, args, options = {}) => {
  return new Promise<ToolResult>((resolve, reject) => {
    execFile(
      tool,
      [...args],
      {
        encoding: 'utf8',
        timeout: options.timeoutMs ?? 0,
        signal: options.signal,
        maxBuffer: MAX_OUTPUT_BYTES,
        windowsHide: true,
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ stdout, stderr });
          return;
        }
        const reason = classify(error, options.signal);
        const trimmedStderr = stderr.trim();
        reject(new ToolInvocationError(
          describe(tool, reason, error, options.timeoutMs),
          tool,
          args,
          reason,
          typeof error.code === 'number' ? error.code : undefined,
          trimmedStderr.length > 0 ? trimmedStderr : undefined,
          error,
        ));
      },
    );
  });
};
