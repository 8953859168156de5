/**
 * Duty Curve Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { describeDutyCurve, mapTemperatureToDuty, type DutyCurve } from './duty-curve.js';
import { createDefaultFanPolicy } from '../config/configuration.js';
import { SCENARIO_THRESHOLDS } from '../test-setup.js';

describe('mapTemperatureToDuty', () => {
  const curve: DutyCurve = SCENARIO_THRESHOLDS;

  it('should interpolate linearly between the curve ends', () => {
    expect(mapTemperatureToDuty(80, curve)).toBe(86);
    expect(mapTemperatureToDuty(68, curve)).toBe(52);
    expect(mapTemperatureToDuty(72.5, curve)).toBe(65);
  });

  it('should clamp to the minimum duty at or below the curve floor', () => {
    expect(mapTemperatureToDuty(60, curve)).toBe(30);
    expect(mapTemperatureToDuty(20, curve)).toBe(30);
    expect(mapTemperatureToDuty(-Infinity, curve)).toBe(30);
  });

  it('should clamp to the maximum duty at or above the curve ceiling', () => {
    expect(mapTemperatureToDuty(85, curve)).toBe(100);
    expect(mapTemperatureToDuty(110, curve)).toBe(100);
    expect(mapTemperatureToDuty(Infinity, curve)).toBe(100);
  });

  it('should map NaN to the maximum duty', () => {
    expect(mapTemperatureToDuty(Number.NaN, curve)).toBe(100);
  });

  it('should round half-way duties up', () => {
    const narrow: DutyCurve = { curveMinC: 0, curveMaxC: 4, minDutyPct: 0, maxDutyPct: 2 };

    expect(mapTemperatureToDuty(1, narrow)).toBe(1);
    expect(mapTemperatureToDuty(3, narrow)).toBe(2);
  });

  it('should support a flat curve', () => {
    const flat: DutyCurve = { curveMinC: 50, curveMaxC: 70, minDutyPct: 60, maxDutyPct: 60 };

    expect(mapTemperatureToDuty(40, flat)).toBe(60);
    expect(mapTemperatureToDuty(65, flat)).toBe(60);
    expect(mapTemperatureToDuty(90, flat)).toBe(60);
  });
});

describe('describeDutyCurve', () => {
  it('should sample the default curve every five degrees', () => {
    const { thresholds } = createDefaultFanPolicy();

    expect(describeDutyCurve(thresholds)).toEqual([
      { temperatureC: 55, dutyPct: 50 },
      { temperatureC: 60, dutyPct: 60 },
      { temperatureC: 65, dutyPct: 70 },
      { temperatureC: 70, dutyPct: 80 },
      { temperatureC: 75, dutyPct: 90 },
      { temperatureC: 80, dutyPct: 100 },
    ]);
  });

  it('should always end on the curve ceiling', () => {
    const points = describeDutyCurve(SCENARIO_THRESHOLDS, 10);

    expect(points.map(p => p.temperatureC)).toEqual([60, 70, 80, 85]);
    expect(points[points.length - 1]).toEqual({ temperatureC: 85, dutyPct: 100 });
  });

  it('should reject a non-positive step', () => {
    expect(() => describeDutyCurve(SCENARIO_THRESHOLDS, 0)).toThrow(RangeError);
    expect(() => describeDutyCurve(SCENARIO_THRESHOLDS, -5)).toThrow(RangeError);
  });
});
