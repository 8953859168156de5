/**
 * Mode State Machine
 *
 * Decides each cycle whether the fans belong to the BMC (automatic) or to
 * this controller (manual). Entry and exit use separate thresholds so a
 * temperature hovering near one crossing point cannot flap the mode.
 *
 * `decide()` is side-effect free; `apply()` is the only way the mode
 * changes, so the caller can perform the actuation in between.
 */

import type { Thresholds } from '../types/fan-policy.js';
import type { ControlMode, ModeDecision, ModeInput } from '../types/control-mode.js';

export interface HysteresisPolicy extends Pick<Thresholds, 'enterManualC' | 'exitManualC'> {
  /** Milliseconds the aggregate must stay at or below exitManualC before hand-off */
  handoffDelayMs?: number;
  /** Hand-off waits while known utilization is above this percentage */
  idleUtilizationPct?: number;
}

export class ModeStateMachine {
  private current: ControlMode = 'automatic';
  private idleSince?: number;
  private readonly policy: HysteresisPolicy;

  constructor(policy: HysteresisPolicy) {
    if (!(policy.enterManualC > policy.exitManualC)) {
      throw new RangeError(
        `Hysteresis band must be positive: enterManualC (${policy.enterManualC}) must exceed exitManualC (${policy.exitManualC})`,
      );
    }
    this.policy = { ...policy };
  }

  get mode(): ControlMode {
    return this.current;
  }

  /**
   * Computes the decision for this cycle without changing state
   */
  decide(input: ModeInput): ModeDecision {
    const { enterManualC, exitManualC } = this.policy;
    const { aggregateC } = input;

    if (this.current === 'automatic') {
      if (aggregateC !== undefined && aggregateC >= enterManualC) {
        return {
          from: 'automatic',
          to: 'manual',
          transition: 'enter_manual',
          reason: `aggregate ${aggregateC}°C reached enter threshold ${enterManualC}°C`,
        };
      }
      return {
        from: 'automatic',
        to: 'automatic',
        transition: 'none',
        reason: aggregateC === undefined
          ? 'no GPU readings retained'
          : `aggregate ${aggregateC}°C below enter threshold ${enterManualC}°C`,
      };
    }

    // Manual: an empty sample counts as no thermal pressure
    const cool = aggregateC === undefined || aggregateC <= exitManualC;
    if (!cool) {
      return {
        from: 'manual',
        to: 'manual',
        transition: 'none',
        reason: `aggregate ${aggregateC}°C above exit threshold ${exitManualC}°C`,
      };
    }

    const idleSince = this.idleSince ?? input.timestamp;
    const delayMs = this.policy.handoffDelayMs ?? 0;
    const elapsed = input.timestamp - idleSince;

    if (elapsed < delayMs) {
      return {
        from: 'manual',
        to: 'manual',
        transition: 'none',
        idleSince,
        reason: `waiting for hand-off delay (${elapsed}ms of ${delayMs}ms)`,
      };
    }

    const { idleUtilizationPct } = this.policy;
    const utilization = aggregateC === undefined ? 0 : input.utilizationPct;
    if (idleUtilizationPct !== undefined && utilization !== undefined && utilization > idleUtilizationPct) {
      return {
        from: 'manual',
        to: 'manual',
        transition: 'none',
        idleSince,
        reason: `utilization ${utilization}% above idle threshold ${idleUtilizationPct}%`,
      };
    }

    return {
      from: 'manual',
      to: 'automatic',
      transition: 'exit_manual',
      reason: aggregateC === undefined
        ? 'no GPU readings retained'
        : `aggregate ${aggregateC}°C at or below exit threshold ${exitManualC}°C`,
    };
  }

  /**
   * Commits a decision produced by `decide()` against the current mode
   */
  apply(decision: ModeDecision): ControlMode {
    if (decision.from !== this.current) {
      throw new Error(`Stale mode decision: computed from ${decision.from}, current mode is ${this.current}`);
    }
    this.current = decision.to;
    this.idleSince = decision.to === 'manual' ? decision.idleSince : undefined;
    return this.current;
  }

  /**
   * Convenience for callers with nothing to actuate between decide and apply
   */
  evaluate(input: ModeInput): ModeDecision {
    const decision = this.decide(input);
    this.apply(decision);
    return decision;
  }

  /**
   * Returns to automatic mode unconditionally (shutdown path)
   */
  forceAutomatic(): void {
    this.current = 'automatic';
    this.idleSince = undefined;
  }
}
