/**
 * @file Keyword lexicon and term matching shared by every scorer.
 * Word lists live in lexicon.json; this module types them and provides
 * word-boundary matching so "die" does not fire on "diet".
 */

import lexiconData from './lexicon.json';

export interface TagEntry {
  tag: string;
  label: string;
  weight: number;
  keywords: string[];
}

export type BaseEmotion = 'positive' | 'negative' | 'high_energy' | 'low_energy';

export interface Lexicon {
  tags: TagEntry[];
  positiveTags: string[];
  intensifiers: string[];
  llmTriggerWords: string[];
  baseEmotions: Record<BaseEmotion, string[]>;
  sentiment: {
    positive: string[];
    negative: string[];
    negations: string[];
  };
  dangerTerms: string[];
  hopelessTags: string[];
  stressTags: string[];
  burnoutTags: string[];
  workloadWords: string[];
  retractionMarkers: string[];
  topics: Record<string, string[]>;
}

export const LEXICON: Lexicon = lexiconData;

const patternCache = new Map<string, RegExp>();

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function termPattern(term: string): RegExp {
  let pattern = patternCache.get(term);
  if (!pattern) {
    pattern = new RegExp(`(?<![a-z0-9])${escapeRegExp(term.toLowerCase())}(?![a-z0-9])`, 'i');
    patternCache.set(term, pattern);
  }
  return pattern;
}

/**
 * Lower-case and fold typographic apostrophes so "can’t" matches "can't".
 */
export function normalizeText(text: string): string {
  return text.toLowerCase().replace(/[‘’]/g, "'");
}

export function containsTerm(text: string, term: string): boolean {
  return termPattern(term).test(normalizeText(text));
}

export function findTerms(text: string, terms: readonly string[]): string[] {
  const normalized = normalizeText(text);
  return terms.filter(term => termPattern(term).test(normalized));
}

export function hasAnyTerm(text: string, terms: readonly string[]): boolean {
  const normalized = normalizeText(text);
  return terms.some(term => termPattern(term).test(normalized));
}

export function hasAnyTag(tags: readonly string[], wanted: readonly string[]): boolean {
  return tags.some(tag => wanted.includes(tag.toLowerCase()));
}

/**
 * Topics mentioned in a message, in lexicon order.
 */
export function extractTopics(text: string, lexicon: Lexicon = LEXICON): string[] {
  return Object.entries(lexicon.topics)
    .filter(([, words]) => hasAnyTerm(text, words))
    .map(([topic]) => topic);
}
