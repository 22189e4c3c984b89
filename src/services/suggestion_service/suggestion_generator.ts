/**
 * @file Suggestion Generator
 *
 * Ranks catalog suggestions for a phase. Pure: identical inputs always give
 * the same list in the same order.
 *
 * Filtering:
 *   - the entry must be offered in the current phase
 *   - entries touching a profile trigger are dropped (never crisis entries)
 *   - in CRISIS, creative entries and hard non-crisis entries are dropped
 *
 * Ranking (descending), ties broken by id:
 *   score tied to the entry + hobby bonus + feedback preference bonus,
 *   with crisis entries pinned first in CRISIS.
 */

import type { Phase, RiskScores } from '../scoring_service/models';
import { PHASES } from '../scoring_service/models';
import { containsTerm } from '../scoring_service/lexicon';
import type { CatalogEntry, Suggestion, SuggestionProfile, TiedTo, UserPreferences } from './models';
import { EMPTY_PREFERENCES, isCategory, isDifficulty, isTiedTo } from './models';
import catalogData from './suggestion_catalog.json';

export const HOBBY_BONUS = 25;
export const CATEGORY_PREFERENCE_BONUS = 15;
export const DIFFICULTY_PREFERENCE_BONUS = 10;
export const DEFAULT_SUGGESTION_LIMIT = 3;

export interface SuggestionInput {
  phase: Phase;
  scores: RiskScores;
  chaos?: number;
  profile?: Partial<SuggestionProfile> | null;
  preferences?: UserPreferences | null;
}

// ============================================================================
// CATALOG
// ============================================================================

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

/**
 * Validate raw catalog data. Malformed entries are an error: the catalog
 * ships with the code, so a bad entry is a packaging bug.
 */
export function loadCatalog(raw: unknown): CatalogEntry[] {
  if (!Array.isArray(raw)) {
    throw new Error('Suggestion catalog must be an array');
  }

  return raw.map((item: unknown, index): CatalogEntry => {
    if (typeof item !== 'object' || item === null) {
      throw new Error(`Suggestion catalog entry ${index} is not an object`);
    }
    const field = (key: string): unknown => Reflect.get(item, key);
    const id = field('id');
    const title = field('title');
    const reason = field('reason');
    const permissionPrompt = field('permissionPrompt');
    const difficulty = field('difficulty');
    const category = field('category');
    const tiedTo = field('tiedTo');
    const phases = field('phases');
    const keywords = field('keywords');

    if (
      typeof id !== 'string' ||
      typeof title !== 'string' ||
      typeof reason !== 'string' ||
      typeof permissionPrompt !== 'string' ||
      !isDifficulty(difficulty) ||
      !isCategory(category) ||
      !isTiedTo(tiedTo) ||
      !isStringArray(keywords) ||
      !isStringArray(phases)
    ) {
      throw new Error(`Suggestion catalog entry ${index} is malformed`);
    }

    const validPhases = PHASES.filter(phase => phases.includes(phase));
    if (validPhases.length !== phases.length) {
      throw new Error(`Suggestion catalog entry ${id} lists an unknown phase`);
    }

    return { id, title, reason, permissionPrompt, difficulty, category, tiedTo, phases: validPhases, keywords };
  });
}

export const SUGGESTION_CATALOG: readonly CatalogEntry[] = loadCatalog(catalogData);

// ============================================================================
// FILTERING
// ============================================================================

function touchesTrigger(entry: CatalogEntry, triggers: readonly string[]): boolean {
  return triggers.some(trigger =>
    containsTerm(entry.title, trigger) ||
    entry.keywords.some(keyword => containsTerm(trigger, keyword) || containsTerm(keyword, trigger))
  );
}

/**
 * Safety rule shared with LLM suggestion validation.
 */
export function allowedInCrisis(entry: Pick<Suggestion, 'category' | 'difficulty'>): boolean {
  if (entry.category === 'crisis') return true;
  return entry.category !== 'creative' && entry.difficulty !== 'hard';
}

function cleanList(values: unknown): string[] {
  return isStringArray(values) ? values.map(value => value.trim()).filter(Boolean) : [];
}

// ============================================================================
// RANKING
// ============================================================================

function tiedScore(tiedTo: TiedTo, scores: RiskScores, chaos: number): number {
  switch (tiedTo) {
    case 'danger':
      return scores.danger;
    case 'stress':
      return scores.stress;
    case 'burnout':
      return scores.burnout;
    case 'chaos':
      return chaos;
    case 'profile':
      return 0;
  }
}

export function rankScore(
  entry: CatalogEntry,
  input: SuggestionInput,
  interests: readonly string[]
): number {
  const preferences = input.preferences ?? EMPTY_PREFERENCES;
  let score = tiedScore(entry.tiedTo, input.scores, input.chaos ?? 0);

  if (entry.keywords.some(keyword => interests.some(interest => containsTerm(interest, keyword)))) {
    score += HOBBY_BONUS;
  }
  if (preferences.preferredCategory === entry.category) {
    score += CATEGORY_PREFERENCE_BONUS;
  }
  if (preferences.preferredDifficulty === entry.difficulty) {
    score += DIFFICULTY_PREFERENCE_BONUS;
  }
  return score;
}

/**
 * Ranked, deterministic suggestions for the given phase.
 */
export function generateSuggestions(
  input: SuggestionInput,
  limit: number = DEFAULT_SUGGESTION_LIMIT,
  catalog: readonly CatalogEntry[] = SUGGESTION_CATALOG
): Suggestion[] {
  const crisis = input.phase === 'CRISIS';
  const triggers = cleanList(input.profile?.triggers);
  const interests = [...cleanList(input.profile?.hobbies), ...cleanList(input.profile?.likes)];

  const ranked = catalog
    .filter(entry => entry.phases.includes(input.phase))
    .filter(entry => entry.category === 'crisis' || !touchesTrigger(entry, triggers))
    .filter(entry => !crisis || allowedInCrisis(entry))
    .map(entry => ({ entry, score: rankScore(entry, input, interests) }))
    .sort((a, b) => {
      if (crisis) {
        const pinned = Number(b.entry.category === 'crisis') - Number(a.entry.category === 'crisis');
        if (pinned !== 0) return pinned;
      }
      if (b.score !== a.score) return b.score - a.score;
      return a.entry.id < b.entry.id ? -1 : a.entry.id > b.entry.id ? 1 : 0;
    });

  const count = Number.isFinite(limit) ? Math.max(0, Math.floor(limit)) : DEFAULT_SUGGESTION_LIMIT;
  return ranked.slice(0, count).map(({ entry }) => toSuggestion(entry));
}

function toSuggestion(entry: CatalogEntry): Suggestion {
  return {
    id: entry.id,
    title: entry.title,
    reason: entry.reason,
    permissionPrompt: entry.permissionPrompt,
    difficulty: entry.difficulty,
    category: entry.category,
    tiedTo: entry.tiedTo,
    source: 'catalog',
  };
}
