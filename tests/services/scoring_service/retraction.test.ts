/**
 * @file Tests for the joke retraction protocol
 */

import {
  RETRACTION_REASON,
  applyRetraction,
  detectRetraction,
  isRetractionMessage,
  raiseTrigger,
} from '../../../src/services/scoring_service/retraction';
import type { RiskAssessment } from '../../../src/services/scoring_service/models';

function assessment(overrides: Partial<RiskAssessment> = {}): RiskAssessment {
  return {
    scores: { stress: 50, burnout: 10, danger: 100 },
    reasons: { stress: 's', burnout: 'b', danger: 'd' },
    crisisDetected: true,
    dangerRecordIds: ['r1'],
    currentTurnTriggered: true,
    trends: { shortTerm: 'stable', longTerm: 'stable' },
    ...overrides,
  };
}

describe('Retraction', () => {
  describe('isRetractionMessage', () => {
    it('should recognise retraction markers', () => {
      expect(isRetractionMessage('lol just kidding')).toBe(true);
      expect(isRetractionMessage('It was a JOKE, relax')).toBe(true);
      expect(isRetractionMessage("I didn't mean it")).toBe(true);
    });

    it('should reject a marker that comes with a new danger term', () => {
      expect(isRetractionMessage("I was joking but honestly I want to die")).toBe(false);
    });

    it('should reject ordinary messages', () => {
      expect(isRetractionMessage('')).toBe(false);
      expect(isRetractionMessage('My kids are home today')).toBe(false);
    });
  });

  describe('detectRetraction', () => {
    const trigger = { turn: 4, recordIds: ['r1'] };

    it('should accept a retraction on the next turn', () => {
      expect(detectRetraction('just kidding', trigger, 5)).toBe(true);
    });

    it('should reject a retraction outside the lookback', () => {
      expect(detectRetraction('just kidding', trigger, 6)).toBe(false);
      expect(detectRetraction('just kidding', trigger, 4)).toBe(false);
    });

    it('should honour a longer lookback', () => {
      expect(detectRetraction('just kidding', trigger, 6, { lookbackTurns: 2, safeDangerFloor: 20 })).toBe(true);
    });

    it('should need a trigger', () => {
      expect(detectRetraction('just kidding', null, 5)).toBe(false);
    });
  });

  describe('applyRetraction', () => {
    it('should drop danger to the safe floor and clear the crisis', () => {
      const result = applyRetraction(assessment());

      expect(result.scores).toEqual({ stress: 50, burnout: 10, danger: 20 });
      expect(result.reasons.danger).toBe(RETRACTION_REASON);
      expect(result.crisisDetected).toBe(false);
      expect(result.dangerRecordIds).toEqual([]);
      expect(result.currentTurnTriggered).toBe(false);
    });
  });

  describe('raiseTrigger', () => {
    it('should return null when the turn raised nothing', () => {
      expect(raiseTrigger(assessment({ currentTurnTriggered: false }), 3, 'r9')).toBeNull();
    });

    it('should hold only the current record, not older danger records', () => {
      expect(raiseTrigger(assessment({ dangerRecordIds: ['r1', 'r9'] }), 3, 'r9')).toEqual({ turn: 3, recordIds: ['r9'] });
    });

    it('should carry a previous trigger only while it can still be retracted', () => {
      const previous = { turn: 3, recordIds: ['r1'] };

      expect(raiseTrigger(assessment(), 4, 'r9', previous)).toEqual({ turn: 4, recordIds: ['r9'] });
      expect(raiseTrigger(assessment(), 4, 'r9', previous, { lookbackTurns: 2, safeDangerFloor: 20 })).toEqual({
        turn: 4,
        recordIds: ['r1', 'r9'],
      });
    });
  });
});
