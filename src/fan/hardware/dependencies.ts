/**
 * Host dependency detection
 *
 * Verifies that the GPU query and BMC control tools are installed
 * before the controller touches the fans.
 */

import { DependencyError } from '../../errors.js';
import { runTool, type ToolRunner } from '../exec/run-tool.js';
import { createSubsystemLogger } from '../../logging/subsystem.js';

const log = createSubsystemLogger('fan/hardware');

export interface DependencyCheckOptions {
  runner?: ToolRunner;
  timeoutMs?: number;
}

/**
 * Detects whether a tool can be resolved through `which`
 */
export async function isToolAvailable(tool: string, options: DependencyCheckOptions = {}): Promise<boolean> {
  const runner = options.runner ?? runTool;
  try {
    await runner('which', [tool], { timeoutMs: options.timeoutMs ?? 5000 });
    return true;
  } catch (error) {
    log.debug('Tool lookup failed', {
      tool,
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
}

/**
 * Resolves when every tool is available, otherwise rejects with the missing ones
 */
export async function checkDependencies(tools: readonly string[], options: DependencyCheckOptions = {}): Promise<void> {
  const missing: string[] = [];
  for (const tool of tools) {
    if (!(await isToolAvailable(tool, options))) {
      missing.push(tool);
    }
  }
  if (missing.length > 0) {
    throw new DependencyError(missing);
  }
}
