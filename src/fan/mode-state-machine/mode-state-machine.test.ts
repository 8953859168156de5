/**
 * Mode State Machine Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ModeStateMachine } from './mode-state-machine.js';

describe('ModeStateMachine', () => {
  let machine: ModeStateMachine;

  beforeEach(() => {
    machine = new ModeStateMachine({ enterManualC: 75, exitManualC: 65 });
  });

  describe('Construction', () => {
    it('should start in automatic mode', () => {
      expect(machine.mode).toBe('automatic');
    });

    it('should reject an empty or inverted hysteresis band', () => {
      expect(() => new ModeStateMachine({ enterManualC: 60, exitManualC: 60 })).toThrow(RangeError);
      expect(() => new ModeStateMachine({ enterManualC: 50, exitManualC: 60 })).toThrow(/must exceed exitManualC/);
    });
  });

  describe('Automatic mode', () => {
    it('should enter manual once the aggregate reaches the enter threshold', () => {
      const decision = machine.decide({ aggregateC: 75, timestamp: 0 });

      expect(decision).toMatchObject({ from: 'automatic', to: 'manual', transition: 'enter_manual' });
      expect(machine.mode).toBe('automatic');
    });

    it('should stay automatic below the enter threshold', () => {
      expect(machine.evaluate({ aggregateC: 74.9, timestamp: 0 }).transition).toBe('none');
      expect(machine.mode).toBe('automatic');
    });

    it('should stay automatic without an aggregate', () => {
      const decision = machine.evaluate({ timestamp: 0 });

      expect(decision.to).toBe('automatic');
      expect(decision.reason).toBe('no GPU readings retained');
    });
  });

  describe('Manual mode', () => {
    beforeEach(() => {
      machine.evaluate({ aggregateC: 80, timestamp: 0 });
    });

    it('should hold manual inside the hysteresis band', () => {
      for (const aggregateC of [74, 70, 65.1]) {
        expect(machine.evaluate({ aggregateC, timestamp: 1 }).transition).toBe('none');
      }
      expect(machine.mode).toBe('manual');
    });

    it('should exit once the aggregate falls to the exit threshold', () => {
      const decision = machine.evaluate({ aggregateC: 65, timestamp: 1 });

      expect(decision).toMatchObject({ from: 'manual', to: 'automatic', transition: 'exit_manual' });
      expect(machine.mode).toBe('automatic');
    });

    it('should exit when no readings are retained', () => {
      expect(machine.evaluate({ timestamp: 1 }).transition).toBe('exit_manual');
    });
  });

  describe('Hand-off delay', () => {
    beforeEach(() => {
      machine = new ModeStateMachine({ enterManualC: 75, exitManualC: 65, handoffDelayMs: 10_000 });
      machine.evaluate({ aggregateC: 80, timestamp: 0 });
    });

    it('should wait until the aggregate has stayed cool for the delay', () => {
      expect(machine.evaluate({ aggregateC: 60, timestamp: 1_000 }).idleSince).toBe(1_000);
      expect(machine.evaluate({ aggregateC: 60, timestamp: 6_000 }).transition).toBe('none');
      expect(machine.evaluate({ aggregateC: 60, timestamp: 11_000 }).transition).toBe('exit_manual');
    });

    it('should restart the wait when the aggregate warms up again', () => {
      machine.evaluate({ aggregateC: 60, timestamp: 1_000 });
      machine.evaluate({ aggregateC: 70, timestamp: 6_000 });

      const decision = machine.evaluate({ aggregateC: 60, timestamp: 12_000 });

      expect(decision.transition).toBe('none');
      expect(decision.idleSince).toBe(12_000);
    });
  });

  describe('Idle utilization gate', () => {
    beforeEach(() => {
      machine = new ModeStateMachine({ enterManualC: 75, exitManualC: 65, idleUtilizationPct: 10 });
      machine.evaluate({ aggregateC: 80, timestamp: 0 });
    });

    it('should hold manual while the cards are busy', () => {
      const decision = machine.evaluate({ aggregateC: 60, utilizationPct: 35, timestamp: 1 });

      expect(decision.transition).toBe('none');
      expect(decision.reason).toBe('utilization 35% above idle threshold 10%');
    });

    it('should hand off once the cards are idle', () => {
      expect(machine.evaluate({ aggregateC: 60, utilizationPct: 10, timestamp: 1 }).transition).toBe('exit_manual');
    });

    it('should hand off when utilization is unknown', () => {
      expect(machine.evaluate({ aggregateC: 60, timestamp: 1 }).transition).toBe('exit_manual');
    });
  });

  describe('apply', () => {
    it('should reject a decision computed from another mode', () => {
      const stale = machine.decide({ aggregateC: 90, timestamp: 0 });
      machine.apply(stale);

      expect(() => machine.apply(stale)).toThrow(/Stale mode decision/);
    });

    it('should return to automatic on forceAutomatic', () => {
      machine.evaluate({ aggregateC: 90, timestamp: 0 });
      machine.forceAutomatic();

      expect(machine.mode).toBe('automatic');
    });
  });
});
