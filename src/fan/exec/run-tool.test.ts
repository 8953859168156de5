/**
 * Tool runner unit tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { execFile, type ChildProcess, type ExecFileException } from 'node:child_process';
import { runTool } from './run-tool.js';
import { ToolInvocationError } from '../../errors.js';

vi.mock('node:child_process', () => ({
  execFile: vi.fn(),
}));

type ExecFileCallback = (error: ExecFileException | null, stdout: string, stderr: string) => void;

const mockExecFile = vi.mocked(execFile);

function respondWith(error: ExecFileException | null, stdout = '', stderr = ''): void {
  mockExecFile.mockImplementation(((...params: unknown[]) => {
    const callback = params[params.length - 1] as ExecFileCallback;
    callback(error, stdout, stderr);
    return {} as ChildProcess;
  }) as unknown as typeof execFile);
}

async function captureFailure(promise: Promise<unknown>): Promise<ToolInvocationError> {
  const error = await promise.then(() => undefined, (err: unknown) => err);
  expect(error).toBeInstanceOf(ToolInvocationError);
  if (!(error instanceof ToolInvocationError)) {
    throw new Error('expected a ToolInvocationError');
  }
  return error;
}

describe('runTool', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should run the tool without a shell and resolve with its output', async () => {
    respondWith(null, '0, 45, 3\n', '');

    const result = await runTool('nvidia-smi', ['--format=csv'], { timeoutMs: 2000 });

    expect(result).toEqual({ stdout: '0, 45, 3\n', stderr: '' });
    expect(mockExecFile).toHaveBeenCalledWith(
      'nvidia-smi',
      ['--format=csv'],
      expect.objectContaining({ encoding: 'utf8', timeout: 2000 }),
      expect.any(Function),
    );
  });

  it('should report a missing binary', async () => {
    respondWith(Object.assign(new Error('spawn ipmitool ENOENT'), { code: 'ENOENT' }));

    const error = await captureFailure(runTool('ipmitool', ['raw', '0x30']));

    expect(error.reason).toBe('not_found');
    expect(error.message).toBe('ipmitool was not found on PATH');
    expect(error.args).toEqual(['raw', '0x30']);
  });

  it('should report a permission failure', async () => {
    respondWith(Object.assign(new Error('spawn ipmitool EACCES'), { code: 'EACCES' }));

    const error = await captureFailure(runTool('ipmitool', []));

    expect(error.reason).toBe('permission_denied');
  });

  it('should report a non-zero exit with its code and stderr', async () => {
    respondWith(Object.assign(new Error('Command failed'), { code: 9 }), '', 'NVIDIA-SMI has failed\n');

    const error = await captureFailure(runTool('nvidia-smi', []));

    expect(error.reason).toBe('exit_code');
    expect(error.message).toBe('nvidia-smi exited with code 9');
    expect(error.exitCode).toBe(9);
    expect(error.stderr).toBe('NVIDIA-SMI has failed');
  });

  it('should report a timeout', async () => {
    respondWith(Object.assign(new Error('Command failed'), { killed: true, signal: 'SIGTERM' as const }));

    const error = await captureFailure(runTool('ipmitool', [], { timeoutMs: 1500 }));

    expect(error.reason).toBe('timeout');
    expect(error.message).toBe('ipmitool timed out after 1500ms');
    expect(error.exitCode).toBeUndefined();
  });

  it('should report a cancelled invocation', async () => {
    const controller = new AbortController();
    controller.abort();
    respondWith(Object.assign(new Error('The operation was aborted'), { name: 'AbortError', code: 'ABORT_ERR' }));

    const error = await captureFailure(runTool('nvidia-smi', [], { signal: controller.signal }));

    expect(error.reason).toBe('aborted');
    expect(error.message).toBe('nvidia-smi was cancelled');
  });
});
