/**
 * @file Property checks: every score stays an integer in [0, 100] for
 * arbitrary logs and message streams.
 */

import { assessRisk } from '../../../src/services/scoring_service/risk_predictor';
import { computeChaos } from '../../../src/services/scoring_service/chaos_scorer';
import { scoreEmotion } from '../../../src/services/scoring_service/emotion_scorer';
import type { EmotionRecord } from '../../../src/services/scoring_service/models';

const WORDS = [
  'happy', 'sad', 'die', 'kidding', 'work', 'so', 'hopeless', 'calm', 'not', 'great',
  'overwhelmed', 'tired', 'pills', 'exam', 'really', 'panic', 'empty', 'joy', 'hate', 'fine',
];
const TAGS = ['hopeless', 'stressed', 'tired', 'suicidal', 'happy', 'panic', 'drained', 'calm', 'worthless'];

// Deterministic LCG so failures reproduce
function lcg(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 1664525 + 1013904223) % 4294967296;
    return state / 4294967296;
  };
}

function pick<T>(random: () => number, items: readonly T[]): T {
  return items[Math.floor(random() * items.length)];
}

function isScore(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 100;
}

describe('Score bounds', () => {
  it('should keep risk and chaos scores within bounds', () => {
    const random = lcg(42);
    const now = new Date('2026-03-01T12:00:00.000Z');

    for (let round = 0; round < 200; round++) {
      const count = Math.floor(random() * 60);
      const records: EmotionRecord[] = [];
      for (let i = 0; i < count; i++) {
        const text = Array.from({ length: 1 + Math.floor(random() * 12) }, () => pick(random, WORDS)).join(' ');
        records.push({
          id: `r${round}-${i}`,
          timestamp: new Date(now.getTime() - random() * 40 * 24 * 60 * 60 * 1000).toISOString(),
          text,
          label: 'test',
          severity: random() * 20 - 5,
          stability: random() * 20 - 5,
          tags: Array.from({ length: Math.floor(random() * 4) }, () => pick(random, TAGS)),
          summary: '',
          source: 'heuristic',
        });
      }

      const risk = assessRisk({ records, currentText: pick(random, WORDS), now });
      const chaos = computeChaos(records.map(record => ({ text: record.text, tags: record.tags })));

      expect(isScore(risk.scores.stress)).toBe(true);
      expect(isScore(risk.scores.burnout)).toBe(true);
      expect(isScore(risk.scores.danger)).toBe(true);
      expect(isScore(chaos.score)).toBe(true);
    }
  });

  it('should keep emotion severity and stability within 0-10', () => {
    const random = lcg(7);

    for (let round = 0; round < 300; round++) {
      const text = Array.from({ length: Math.floor(random() * 15) }, () => pick(random, WORDS)).join(' ');
      const emotion = scoreEmotion(text);

      expect(emotion.severity).toBeGreaterThanOrEqual(0);
      expect(emotion.severity).toBeLessThanOrEqual(10);
      expect(emotion.stability).toBeGreaterThanOrEqual(0);
      expect(emotion.stability).toBeLessThanOrEqual(10);
    }
  });
});
