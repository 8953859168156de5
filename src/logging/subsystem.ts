/**
 * Subsystem loggers
 *
 * Thin message-first wrappers over pino child loggers, tagged with the
 * subsystem name (e.g. `fan/control-loop`).
 */

import type { Logger } from 'pino';
import { getLogger } from '../logger.js';

export type SubsystemLogMethod = (message: string, meta?: Record<string, unknown>) => void;

export interface SubsystemLogger {
  readonly subsystem: string;
  debug: SubsystemLogMethod;
  info: SubsystemLogMethod;
  warn: SubsystemLogMethod;
  error: SubsystemLogMethod;
  fatal: SubsystemLogMethod;
}

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  let parent: Logger | undefined;
  let child: Logger | undefined;

  // Re-derive the child whenever the root logger has been replaced
  const current = (): Logger => {
    const root = getLogger();
    if (!child || parent !== root) {
      parent = root;
      child = root.child({ subsystem });
    }
    return child;
  };

  return {
    subsystem,
    debug: (message, meta) => current().debug(meta ?? {}, message),
    info: (message, meta) => current().info(meta ?? {}, message),
    warn: (message, meta) => current().warn(meta ?? {}, message),
    error: (message, meta) => current().error(meta ?? {}, message),
    fatal: (message, meta) => current().fatal(meta ?? {}, message),
  };
}
