/**
 * Fan actuator contract
 *
 * The only boundary to the privileged hardware-control tool. Every
 * operation rejects with ActuatorError when the command does not succeed.
 */

export interface FanActuator {
  /** Name used in logs and errors */
  readonly name: string;
  /** Takes fan control away from the BMC's automatic curve */
  enterManual(): Promise<void>;
  /** Sets every fan to the given duty; integers 0-100 only */
  setDuty(pct: number): Promise<void>;
  /** Hands fan control back to the BMC */
  restoreAutomatic(): Promise<void>;
}

export function assertDutyPercent(pct: number): void {
  if (!Number.isInteger(pct) || pct < 0 || pct > 100) {
    throw new RangeError(`Fan duty must be an integer between 0 and 100, got ${pct}`);
  }
}
