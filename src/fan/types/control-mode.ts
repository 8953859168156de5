/**
 * Control mode types
 */

/** Who drives the chassis fans: the BMC's own curve, or this controller */
export type ControlMode = 'automatic' | 'manual';

export type ModeTransition = 'enter_manual' | 'exit_manual' | 'none';

export interface ModeInput {
  /** Hottest retained temperature, undefined when no GPU was retained */
  aggregateC?: number;
  /** Highest known utilization across retained GPUs */
  utilizationPct?: number;
  /** Evaluation time in epoch milliseconds */
  timestamp: number;
}

export interface ModeDecision {
  from: ControlMode;
  to: ControlMode;
  transition: ModeTransition;
  /** Start of the current at-or-below-exit streak while in manual mode */
  idleSince?: number;
  reason: string;
}
