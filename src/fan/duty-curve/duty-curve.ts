/**
 * Duty Curve Mapper
 *
 * Maps the aggregate GPU temperature to a fan duty-cycle percentage.
 * Linear between the curve floor and ceiling, clamped outside them.
 */

import type { Thresholds } from '../types/fan-policy.js';

export type DutyCurve = Pick<Thresholds, 'curveMinC' | 'curveMaxC' | 'minDutyPct' | 'maxDutyPct'>;

/**
 * Returns the integer duty percentage for a temperature.
 *
 * Defined for every input: temperatures past either end of the curve
 * clamp to that end, and NaN maps to the maximum duty.
 */
export function mapTemperatureToDuty(temperatureC: number, curve: DutyCurve): number {
  const { curveMinC, curveMaxC, minDutyPct, maxDutyPct } = curve;

  if (Number.isNaN(temperatureC)) {
    return maxDutyPct;
  }
  if (temperatureC <= curveMinC) {
    return minDutyPct;
  }
  if (temperatureC >= curveMaxC) {
    return maxDutyPct;
  }

  const position = (temperatureC - curveMinC) / (curveMaxC - curveMinC);
  const duty = Math.round(minDutyPct + position * (maxDutyPct - minDutyPct));

  // Rounding cannot leave the configured span, but keep the guarantee explicit
  return Math.min(maxDutyPct, Math.max(minDutyPct, duty));
}

/**
 * Samples the curve at whole degrees, for logging the effective curve at startup
 */
export function describeDutyCurve(curve: DutyCurve, step = 5): Array<{ temperatureC: number; dutyPct: number }> {
  if (!(step > 0)) {
    throw new RangeError(`Curve sampling step must be positive, got ${step}`);
  }
  const points: Array<{ temperatureC: number; dutyPct: number }> = [];
  const start = Math.floor(curve.curveMinC);
  const end = Math.ceil(curve.curveMaxC);
  for (let t = start; t < end; t += step) {
    points.push({ temperatureC: t, dutyPct: mapTemperatureToDuty(t, curve) });
  }
  points.push({ temperatureC: end, dutyPct: mapTemperatureToDuty(end, curve) });
  return points;
}
