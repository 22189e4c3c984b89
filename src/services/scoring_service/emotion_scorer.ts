/**
 * @file Emotion Scorer
 *
 * Maps a message to an emotion label, severity (0-10), stability (0-10)
 * and tags. The keyword path is always available; an LLM can refine the
 * result, but its output is merged so it can only add signal, never
 * remove a tag the lexicon found.
 */

import type { EmotionAnalysis } from './models';
import { clamp, clampSeverity } from './models';
import { LEXICON, Lexicon, TagEntry, hasAnyTerm } from './lexicon';
import type { LLMClient } from '../llm_service/llm_providers';
import { renderEmotionPrompt, stripCodeFences } from '../llm_service/prompt_renderer';
import { logger } from '../../utils/logger';

const MAX_EXTRA_TAG_BONUS = 2;
const POSITIVE_STABILITY_BONUS = 2;
const SHORT_MESSAGE_WORDS = 4;

// ============================================================================
// HEURISTIC PATH
// ============================================================================

function neutral(summary: string): EmotionAnalysis {
  return {
    label: 'neutral',
    severity: 0,
    stability: 10,
    tags: [],
    summary,
    source: 'heuristic',
  };
}

function dominantTag(matched: TagEntry[]): TagEntry {
  // Lexicon order breaks weight ties
  return matched.reduce((best, entry) => (entry.weight > best.weight ? entry : best));
}

/**
 * Keyword-based emotion scoring. Never throws.
 */
export function scoreEmotion(text: string, lexicon: Lexicon = LEXICON): EmotionAnalysis {
  if (typeof text !== 'string' || text.trim() === '') {
    return neutral('Neutral (empty message)');
  }

  const matched = lexicon.tags.filter(entry => hasAnyTerm(text, entry.keywords));
  if (matched.length === 0) {
    return neutral('Neutral (no emotional keywords)');
  }

  const top = dominantTag(matched);
  const extraTags = Math.min(matched.length - 1, MAX_EXTRA_TAG_BONUS);
  const intensified = hasAnyTerm(text, lexicon.intensifiers) ? 1 : 0;
  const severity = clampSeverity(top.weight + extraTags + intensified);

  const tags = matched.map(entry => entry.tag);
  const positive = tags.some(tag => lexicon.positiveTags.includes(tag));
  const stability = clamp(10 - severity + (positive ? POSITIVE_STABILITY_BONUS : 0), 0, 10);

  return {
    label: top.label,
    severity,
    stability,
    tags,
    summary: `${capitalize(top.label)} (${tags.join(', ')})`,
    source: 'heuristic',
  };
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

// ============================================================================
// LLM PATH
// ============================================================================

interface LLMEmotionPayload {
  tags: string[];
  severity: number;
  stability: number;
  summary: string;
}

/**
 * Parse the model's JSON answer. Returns null when the shape is wrong.
 */
export function parseEmotionResponse(response: string): LLMEmotionPayload | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFences(response));
  } catch {
    logger.debug('[EmotionScorer] LLM response was not JSON');
    return null;
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return null;
  }

  const rawTags: unknown = Reflect.get(parsed, 'emotion_tags');
  const severity = Number(Reflect.get(parsed, 'severity'));
  const stability = Number(Reflect.get(parsed, 'stability'));
  const summary: unknown = Reflect.get(parsed, 'summary');

  if (!Number.isFinite(severity) || !Number.isFinite(stability) || typeof summary !== 'string') {
    return null;
  }

  const tags = (Array.isArray(rawTags) ? rawTags : [rawTags])
    .filter((tag): tag is string => typeof tag === 'string' && tag.trim() !== '')
    .map(tag => tag.trim().toLowerCase());

  return {
    tags,
    severity: clampSeverity(severity),
    stability: clamp(stability, 0, 10),
    summary,
  };
}

/**
 * Short messages without trigger words are not worth a model call.
 */
export function shouldConsultLLM(text: string, lexicon: Lexicon = LEXICON): boolean {
  const words = text.trim().split(/\s+/).filter(Boolean).length;
  return words >= SHORT_MESSAGE_WORDS || hasAnyTerm(text, lexicon.llmTriggerWords);
}

/**
 * Emotion analysis with an optional LLM and a keyword fallback.
 */
export class EmotionAnalyzer {
  constructor(
    private readonly llmClient: LLMClient | null = null,
    private readonly lexicon: Lexicon = LEXICON
  ) {}

  async analyze(text: string): Promise<EmotionAnalysis> {
    const heuristic = scoreEmotion(text, this.lexicon);
    if (!this.llmClient || !shouldConsultLLM(text, this.lexicon)) {
      return heuristic;
    }

    try {
      const response = await this.llmClient.complete(renderEmotionPrompt(text), {
        temperature: 0.1,
        maxTokens: 300,
      });
      const payload = parseEmotionResponse(response);
      if (!payload) {
        logger.warn('[EmotionScorer] Malformed LLM analysis, using keyword scoring');
        return heuristic;
      }
      return mergeAnalysis(heuristic, payload, this.lexicon);
    } catch (error) {
      logger.warn('[EmotionScorer] LLM analysis failed, using keyword scoring', error);
      return heuristic;
    }
  }
}

/**
 * Combine keyword and model results. Severity takes the higher of the two
 * and keyword tags always survive.
 */
export function mergeAnalysis(
  heuristic: EmotionAnalysis,
  payload: LLMEmotionPayload,
  lexicon: Lexicon = LEXICON
): EmotionAnalysis {
  const tags = [...heuristic.tags];
  for (const tag of payload.tags) {
    if (!tags.includes(tag)) tags.push(tag);
  }

  let label = heuristic.label;
  if (label === 'neutral' && payload.tags.length > 0) {
    const known = lexicon.tags.find(entry => entry.tag === payload.tags[0]);
    label = known ? known.label : payload.tags[0];
  }

  return {
    label,
    severity: Math.max(heuristic.severity, payload.severity),
    stability: Math.min(heuristic.stability, payload.stability),
    tags,
    summary: payload.summary,
    source: 'llm',
  };
}
