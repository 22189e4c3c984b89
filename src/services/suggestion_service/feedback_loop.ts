/**
 * @file Feedback Loop
 * Records how users respond to suggestions and turns that history into
 * preferences the generator can rank with.
 */

import type { FeedbackStore } from '../memory_service/models';
import type { Difficulty, FeedbackAction, FeedbackEntry, SuggestionCategory, UserPreferences } from './models';
import { EMPTY_PREFERENCES } from './models';
import { logger } from '../../utils/logger';

const POSITIVE_ACTIONS: readonly FeedbackAction[] = ['accepted', 'completed'];

export interface FeedbackInput {
  suggestionId: string;
  action: FeedbackAction;
  rating?: number;
  category?: SuggestionCategory;
  difficulty?: Difficulty;
}

/**
 * Most frequent value; ties go to the alphabetically first.
 */
function mostFrequent<T extends string>(values: readonly T[]): T | null {
  const counts = new Map<T, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  let best: T | null = null;
  let bestCount = 0;
  for (const [value, count] of counts) {
    if (count > bestCount || (count === bestCount && best !== null && value < best)) {
      best = value;
      bestCount = count;
    }
  }
  return best;
}

export function derivePreferences(entries: readonly FeedbackEntry[]): UserPreferences {
  if (entries.length === 0) return { ...EMPTY_PREFERENCES };

  const positive = entries.filter(entry => POSITIVE_ACTIONS.includes(entry.action));
  const categories = positive.flatMap(entry => (entry.category ? [entry.category] : []));
  const difficulties = positive.flatMap(entry => (entry.difficulty ? [entry.difficulty] : []));

  return {
    preferredCategory: mostFrequent(categories),
    preferredDifficulty: mostFrequent(difficulties),
    acceptanceRate: positive.length / entries.length,
    totalInteractions: entries.length,
  };
}

export class FeedbackLoop {
  constructor(
    private readonly store: FeedbackStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  async logInteraction(userId: string, input: FeedbackInput): Promise<FeedbackEntry> {
    const entry: FeedbackEntry = {
      timestamp: this.now().toISOString(),
      suggestionId: input.suggestionId,
      action: input.action,
    };
    if (input.rating !== undefined) entry.rating = Math.min(5, Math.max(1, Math.round(input.rating)));
    if (input.category) entry.category = input.category;
    if (input.difficulty) entry.difficulty = input.difficulty;

    await this.store.append(userId, entry);
    logger.debug(`[FeedbackLoop] ${userId} ${entry.action} ${entry.suggestionId}`);
    return entry;
  }

  async getPreferences(userId: string): Promise<UserPreferences> {
    return derivePreferences(await this.store.list(userId));
  }
}
