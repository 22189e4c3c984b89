/**
 * @file Chaos Scorer
 *
 * Scores conversational volatility (0-100) over the last few user messages:
 * - topic volatility: emotional base-category shifts between messages
 * - length variance: erratic message lengths
 * - contradictions: sentiment flips between consecutive messages
 */

import type { ChaosConfig, ChaosFactor, ChaosResult, ChaosSample } from './models';
import { DEFAULT_SCORING_CONFIG, clampScore } from './models';
import { BaseEmotion, LEXICON, Lexicon, hasAnyTerm, normalizeText } from './lexicon';

type Sentiment = 'positive' | 'negative';

const BASE_EMOTIONS: readonly BaseEmotion[] = ['positive', 'negative', 'high_energy', 'low_energy'];

const FACTOR_ORDER: readonly ChaosFactor[] = ['topic_volatility', 'contradiction', 'length_variance'];

const FACTOR_TEXT: Record<ChaosFactor, string> = {
  topic_volatility: 'frequent emotional topic shifts',
  length_variance: 'erratic message lengths',
  contradiction: 'contradictory statements',
};

function emptyResult(reason: string): ChaosResult {
  return {
    score: 0,
    reason,
    dominantFactor: null,
    components: { topic_volatility: 0, length_variance: 0, contradiction: 0 },
  };
}

function baseEmotionsOf(tags: readonly string[], lexicon: Lexicon): Set<BaseEmotion> {
  const bases = new Set<BaseEmotion>();
  for (const tag of tags) {
    const lower = tag.toLowerCase();
    for (const base of BASE_EMOTIONS) {
      if (lexicon.baseEmotions[base].includes(lower)) bases.add(base);
    }
  }
  return bases;
}

/**
 * Count mood shifts: consecutive tagged messages with no shared base
 * emotion, or with a positive/negative polarity flip.
 */
export function countTopicChanges(samples: readonly ChaosSample[], lexicon: Lexicon = LEXICON): number {
  let changes = 0;
  let previous = new Set<BaseEmotion>();

  for (const sample of samples) {
    const current = baseEmotionsOf(sample.tags ?? [], lexicon);
    if (previous.size > 0 && current.size > 0) {
      const shared = [...current].some(base => previous.has(base));
      const polarityFlip =
        (previous.has('positive') && current.has('negative')) ||
        (previous.has('negative') && current.has('positive'));
      if (!shared || polarityFlip) changes++;
    }
    if (current.size > 0) previous = current;
  }

  return changes;
}

/**
 * Population standard deviation of message lengths.
 */
export function lengthStdDev(samples: readonly ChaosSample[]): number {
  const lengths = samples.map(sample => (sample.text ?? '').length);
  if (lengths.length < 2) return 0;
  const mean = lengths.reduce((sum, len) => sum + len, 0) / lengths.length;
  const variance = lengths.reduce((sum, len) => sum + (len - mean) ** 2, 0) / lengths.length;
  return Math.sqrt(variance);
}

function sentimentOf(text: string, lexicon: Lexicon): Sentiment | null {
  const normalized = normalizeText(text);
  const negated = lexicon.sentiment.negations.some(marker => normalized.includes(marker));
  const positive = hasAnyTerm(text, lexicon.sentiment.positive);
  const negative = hasAnyTerm(text, lexicon.sentiment.negative);

  if (positive) return negated ? 'negative' : 'positive';
  if (negative) return negated ? 'positive' : 'negative';
  return null;
}

/**
 * Count sentiment flips between consecutive opinionated messages.
 */
export function countContradictions(samples: readonly ChaosSample[], lexicon: Lexicon = LEXICON): number {
  let contradictions = 0;
  let previous: Sentiment | null = null;

  for (const sample of samples) {
    const current = sentimentOf(sample.text ?? '', lexicon);
    if (previous && current && previous !== current) contradictions++;
    if (current) previous = current;
  }

  return contradictions;
}

/**
 * Compute the chaos score for an ordered list of user messages.
 * Never throws; fewer than `minMessages` messages score 0.
 */
export function computeChaos(
  samples: readonly ChaosSample[],
  config: ChaosConfig = DEFAULT_SCORING_CONFIG.chaos,
  lexicon: Lexicon = LEXICON
): ChaosResult {
  if (!Array.isArray(samples) || samples.length < config.minMessages) {
    return emptyResult('Not enough conversation data to determine chaos.');
  }

  const window = samples.slice(-config.windowSize);

  const components: Record<ChaosFactor, number> = {
    topic_volatility:
      Math.min(countTopicChanges(window, lexicon) / config.topicChangeSaturation, 1) * 100,
    length_variance:
      Math.min(lengthStdDev(window) / config.lengthStdDevSaturation, 1) * 100,
    contradiction:
      Math.min(countContradictions(window, lexicon) * config.pointsPerContradiction, 100),
  };

  let weighted = 0;
  let dominantFactor: ChaosFactor | null = null;
  let dominantContribution = 0;
  for (const factor of FACTOR_ORDER) {
    const contribution = components[factor] * config.weights[factor];
    weighted += contribution;
    if (contribution > dominantContribution) {
      dominantContribution = contribution;
      dominantFactor = factor;
    }
  }

  const score = clampScore(weighted);
  return {
    score,
    reason: describeChaos(score, dominantFactor, config),
    dominantFactor,
    components,
  };
}

function describeChaos(score: number, factor: ChaosFactor | null, config: ChaosConfig): string {
  if (factor === null || score <= config.moderateThreshold) {
    return 'Stable, coherent conversation.';
  }
  if (score > config.highThreshold) {
    return `High conversational chaos, driven by ${FACTOR_TEXT[factor]}.`;
  }
  return `Moderate conversational instability, driven by ${FACTOR_TEXT[factor]}.`;
}
