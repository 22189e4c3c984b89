/**
 * @file Tests for Emotion Scorer
 * Keyword scoring, LLM response parsing and the analyzer fallback path
 */

import {
  EmotionAnalyzer,
  mergeAnalysis,
  parseEmotionResponse,
  scoreEmotion,
  shouldConsultLLM,
} from '../../../src/services/scoring_service/emotion_scorer';
import type { LLMClient } from '../../../src/services/llm_service/llm_providers';
import { LLMTimeoutError } from '../../../src/services/llm_service/errors';

function fakeLLM(response: string | Error): LLMClient & { complete: jest.Mock } {
  return {
    complete: jest.fn(async () => {
      if (response instanceof Error) throw response;
      return response;
    }),
  };
}

describe('Emotion Scorer', () => {
  describe('scoreEmotion', () => {
    it('should return neutral for an empty message', () => {
      const result = scoreEmotion('   ');

      expect(result).toEqual({
        label: 'neutral',
        severity: 0,
        stability: 10,
        tags: [],
        summary: 'Neutral (empty message)',
        source: 'heuristic',
      });
    });

    it('should return neutral when no keyword matches', () => {
      const result = scoreEmotion('We had pasta for dinner');

      expect(result.label).toBe('neutral');
      expect(result.summary).toBe('Neutral (no emotional keywords)');
    });

    it('should add one severity point for an intensifier', () => {
      const result = scoreEmotion('I feel so hopeless');

      expect(result.label).toBe('despair');
      expect(result.severity).toBe(9);
      expect(result.stability).toBe(1);
      expect(result.tags).toEqual(['hopeless']);
      expect(result.summary).toBe('Despair (hopeless)');
    });

    it('should add a point per extra tag and a stability bonus for positive tags', () => {
      const result = scoreEmotion('I am happy but tired');

      expect(result.label).toBe('fatigue');
      expect(result.tags).toEqual(['tired', 'happy']);
      expect(result.severity).toBe(5);
      expect(result.stability).toBe(7);
      expect(result.summary).toBe('Fatigue (tired, happy)');
    });

    it('should cap severity at 10', () => {
      const result = scoreEmotion('I am so hopeless and worthless, I want to die');

      expect(result.label).toBe('crisis');
      expect(result.severity).toBe(10);
      expect(result.stability).toBe(0);
    });

    it('should match on word boundaries only', () => {
      expect(scoreEmotion('Trying a new diet').label).toBe('neutral');
      expect(scoreEmotion('My sadness app').tags).toEqual([]);
    });

    it('should fold typographic apostrophes', () => {
      const result = scoreEmotion('I can’t cope');

      expect(result.tags).toEqual(['overwhelmed']);
      expect(result.severity).toBe(7);
    });
  });

  describe('parseEmotionResponse', () => {
    it('should parse fenced JSON and clamp values', () => {
      const payload = parseEmotionResponse(
        '```json\n{"emotion_tags":["Anxious"],"severity":12,"stability":-3,"summary":"On edge"}\n```'
      );

      expect(payload).toEqual({ tags: ['anxious'], severity: 10, stability: 0, summary: 'On edge' });
    });

    it('should accept a single tag string', () => {
      const payload = parseEmotionResponse('{"emotion_tags":"sad","severity":4,"stability":6,"summary":"Low"}');

      expect(payload?.tags).toEqual(['sad']);
    });

    it('should return null for non-JSON or incomplete answers', () => {
      expect(parseEmotionResponse('I think they are sad')).toBeNull();
      expect(parseEmotionResponse('{"emotion_tags":[],"severity":"high"}')).toBeNull();
      expect(parseEmotionResponse('[1, 2]')).toBeNull();
    });
  });

  describe('shouldConsultLLM', () => {
    it('should skip short messages without trigger words', () => {
      expect(shouldConsultLLM('ok thanks')).toBe(false);
    });

    it('should consult for trigger words or longer messages', () => {
      expect(shouldConsultLLM('help')).toBe(true);
      expect(shouldConsultLLM('this has four words')).toBe(true);
    });
  });

  describe('mergeAnalysis', () => {
    it('should take the model label when keywords found nothing', () => {
      const merged = mergeAnalysis(scoreEmotion('The weather today is grey'), {
        tags: ['sad'],
        severity: 4,
        stability: 6,
        summary: 'Quietly low',
      });

      expect(merged.label).toBe('sadness');
      expect(merged.tags).toEqual(['sad']);
      expect(merged.severity).toBe(4);
      expect(merged.stability).toBe(6);
      expect(merged.source).toBe('llm');
    });
  });

  describe('EmotionAnalyzer', () => {
    it('should merge model output without dropping keyword tags', async () => {
      const llm = fakeLLM('{"emotion_tags":["lonely"],"severity":7,"stability":3,"summary":"Feeling alone"}');
      const analyzer = new EmotionAnalyzer(llm);

      const result = await analyzer.analyze('I feel so hopeless today');

      expect(result).toEqual({
        label: 'despair',
        severity: 9,
        stability: 1,
        tags: ['hopeless', 'lonely'],
        summary: 'Feeling alone',
        source: 'llm',
      });
    });

    it('should fall back to keywords when the model fails', async () => {
      const analyzer = new EmotionAnalyzer(fakeLLM(new LLMTimeoutError(50)));

      const result = await analyzer.analyze('I feel so hopeless today');

      expect(result.source).toBe('heuristic');
      expect(result.severity).toBe(9);
    });

    it('should fall back to keywords on a malformed answer', async () => {
      const analyzer = new EmotionAnalyzer(fakeLLM('not json at all'));

      const result = await analyzer.analyze('I am stressed about everything');

      expect(result.source).toBe('heuristic');
      expect(result.tags).toEqual(['stressed']);
    });

    it('should not call the model for short trivial messages', async () => {
      const llm = fakeLLM('{}');
      const analyzer = new EmotionAnalyzer(llm);

      await analyzer.analyze('ok');

      expect(llm.complete).not.toHaveBeenCalled();
    });
  });
});
