/**
 * @file Tests for the phase state machine
 */

import {
  INITIAL_PHASE_STATE,
  PhaseInput,
  advancePhase,
  isPhase,
  rawPhase,
} from '../../../src/services/scoring_service/phase_machine';
import type { PhaseState } from '../../../src/services/scoring_service/models';

function input(stress: number, burnout: number, danger: number, chaos = 0, crisisDetected = false): PhaseInput {
  return { scores: { stress, burnout, danger }, chaos, crisisDetected };
}

const CALM = input(20, 10, 0);
const HURTING = input(65, 10, 0);
const IN_CRISIS = input(20, 10, 90);

function run(start: PhaseState, inputs: PhaseInput[]): PhaseState[] {
  const states: PhaseState[] = [];
  let state = start;
  for (const next of inputs) {
    state = advancePhase(state, next);
    states.push(state);
  }
  return states;
}

describe('Phase Machine', () => {
  describe('rawPhase', () => {
    it('should map scores onto tiers', () => {
      expect(rawPhase(input(20, 10, 0))).toBe('STABLE');
      expect(rawPhase(input(40, 10, 0))).toBe('AT_RISK');
      expect(rawPhase(input(20, 60, 0))).toBe('HURT');
      expect(rawPhase(input(20, 10, 79))).toBe('HURT');
      expect(rawPhase(input(20, 10, 80))).toBe('CRISIS');
    });

    it('should escalate on chaos alone only to AT_RISK', () => {
      expect(rawPhase(input(20, 10, 0, 70))).toBe('AT_RISK');
      expect(rawPhase(input(20, 10, 0, 69))).toBe('STABLE');
      expect(rawPhase(input(20, 10, 0, 100))).toBe('AT_RISK');
    });

    it('should force CRISIS on an explicit danger signal', () => {
      expect(rawPhase(input(0, 0, 0, 0, true))).toBe('CRISIS');
    });
  });

  describe('advancePhase', () => {
    it('should escalate on the same turn', () => {
      expect(advancePhase(INITIAL_PHASE_STATE, IN_CRISIS).phase).toBe('CRISIS');
      expect(advancePhase(INITIAL_PHASE_STATE, HURTING).phase).toBe('HURT');
    });

    it('should hold the phase until the hysteresis streak completes', () => {
      const start: PhaseState = { phase: 'CRISIS', calmStreak: 0, pendingPhase: null };
      const states = run(start, [CALM, CALM, CALM]);

      expect(states.map(state => state.phase)).toEqual(['CRISIS', 'CRISIS', 'STABLE']);
      expect(states[1]).toEqual({ phase: 'CRISIS', calmStreak: 2, pendingPhase: 'STABLE' });
      expect(states[2]).toEqual({ phase: 'STABLE', calmStreak: 0, pendingPhase: null });
    });

    it('should settle on the highest tier seen during the streak', () => {
      const start: PhaseState = { phase: 'CRISIS', calmStreak: 0, pendingPhase: null };
      const states = run(start, [HURTING, CALM, CALM]);

      expect(states[2].phase).toBe('HURT');
    });

    it('should reset the streak when the raw tier reaches the current phase', () => {
      const start: PhaseState = { phase: 'HURT', calmStreak: 2, pendingPhase: 'STABLE' };

      expect(advancePhase(start, HURTING)).toEqual({ phase: 'HURT', calmStreak: 0, pendingPhase: null });
    });

    it('should re-escalate in the middle of a streak', () => {
      const start: PhaseState = { phase: 'HURT', calmStreak: 2, pendingPhase: 'STABLE' };

      expect(advancePhase(start, IN_CRISIS).phase).toBe('CRISIS');
    });

    it('should drop immediately on a retraction', () => {
      const start: PhaseState = { phase: 'CRISIS', calmStreak: 0, pendingPhase: null };

      expect(advancePhase(start, CALM, undefined, { retraction: true })).toEqual({
        phase: 'STABLE',
        calmStreak: 0,
        pendingPhase: null,
      });
    });

    it('should honour a configured hysteresis length', () => {
      const start: PhaseState = { phase: 'HURT', calmStreak: 0, pendingPhase: null };
      const config = { crisisDanger: 80, hurt: 60, atRisk: 40, chaosAtRisk: 70, hysteresisTurns: 1 };

      expect(advancePhase(start, CALM, config).phase).toBe('STABLE');
    });
  });

  describe('isPhase', () => {
    it('should accept only known phases', () => {
      expect(isPhase('AT_RISK')).toBe(true);
      expect(isPhase('at_risk')).toBe(false);
      expect(isPhase(3)).toBe(false);
    });
  });
});
