/**
 * @file Suggestion and feedback data models.
 */

import type { Phase } from '../scoring_service/models';

export const DIFFICULTIES = ['very_easy', 'easy', 'medium', 'hard'] as const;
export type Difficulty = typeof DIFFICULTIES[number];

export const CATEGORIES = ['crisis', 'comfort', 'creative', 'physical', 'social', 'reflective'] as const;
export type SuggestionCategory = typeof CATEGORIES[number];

export const TIED_TO = ['danger', 'stress', 'burnout', 'chaos', 'profile'] as const;
export type TiedTo = typeof TIED_TO[number];

export type SuggestionSource = 'catalog' | 'llm';

export interface Suggestion {
  id: string;
  title: string;
  reason: string;
  permissionPrompt: string;
  difficulty: Difficulty;
  category: SuggestionCategory;
  tiedTo: TiedTo;
  source: SuggestionSource;
}

/**
 * Catalog entry: a suggestion plus the phases it is offered in and the
 * words used for hobby and trigger matching.
 */
export interface CatalogEntry extends Omit<Suggestion, 'source'> {
  phases: Phase[];
  keywords: string[];
}

/**
 * Profile fields the generator reads.
 */
export interface SuggestionProfile {
  hobbies: string[];
  likes: string[];
  triggers: string[];
}

// ============================================================================
// FEEDBACK
// ============================================================================

export const FEEDBACK_ACTIONS = ['accepted', 'rejected', 'completed', 'dismissed'] as const;
export type FeedbackAction = typeof FEEDBACK_ACTIONS[number];

export interface FeedbackEntry {
  timestamp: string;          // ISO8601
  suggestionId: string;
  action: FeedbackAction;
  rating?: number;            // 1-5
  category?: SuggestionCategory;
  difficulty?: Difficulty;
}

export interface UserPreferences {
  preferredCategory: SuggestionCategory | null;
  preferredDifficulty: Difficulty | null;
  acceptanceRate: number;     // 0-1
  totalInteractions: number;
}

export const EMPTY_PREFERENCES: UserPreferences = {
  preferredCategory: null,
  preferredDifficulty: null,
  acceptanceRate: 0,
  totalInteractions: 0,
};

function includes<T extends string>(values: readonly T[], value: unknown): value is T {
  return typeof value === 'string' && values.some(candidate => candidate === value);
}

export const isDifficulty = (value: unknown): value is Difficulty => includes(DIFFICULTIES, value);
export const isCategory = (value: unknown): value is SuggestionCategory => includes(CATEGORIES, value);
export const isTiedTo = (value: unknown): value is TiedTo => includes(TIED_TO, value);
export const isFeedbackAction = (value: unknown): value is FeedbackAction => includes(FEEDBACK_ACTIONS, value);
