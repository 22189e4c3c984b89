/**
 * @file Suggestion Service
 *
 * Deterministic catalog ranking, optionally personalised by the LLM outside
 * CRISIS. Model output is validated entry by entry and the list is topped
 * up from the catalog, so a failing model only costs personalisation.
 */

import { v4 as uuidv4 } from 'uuid';
import type { LLMClient } from '../llm_service/llm_providers';
import type { PromptContext } from '../llm_service/prompt_renderer';
import { renderSuggestionPrompt, stripCodeFences } from '../llm_service/prompt_renderer';
import type { Phase } from '../scoring_service/models';
import type { Suggestion } from './models';
import { isCategory, isDifficulty, isTiedTo } from './models';
import type { SuggestionInput } from './suggestion_generator';
import { DEFAULT_SUGGESTION_LIMIT, allowedInCrisis, generateSuggestions } from './suggestion_generator';
import { logger } from '../../utils/logger';

export const MAX_TITLE_LENGTH = 300;
export const MAX_REASON_LENGTH = 200;

export interface SuggestionResult {
  phase: Phase;
  suggestions: Suggestion[];
  urgent: boolean;
  usedFallback: boolean;
}

// ============================================================================
// VALIDATION
// ============================================================================

function text(item: object, ...keys: string[]): string | null {
  for (const key of keys) {
    const value: unknown = Reflect.get(item, key);
    if (typeof value === 'string' && value.trim() !== '') return value.trim();
  }
  return null;
}

/**
 * Validate one model-produced suggestion. Crisis-category items are never
 * accepted from the model; they only come from the curated catalog.
 */
export function validateSuggestion(raw: unknown, phase: Phase, newId: () => string = uuidv4): Suggestion | null {
  if (typeof raw !== 'object' || raw === null) return null;

  const title = text(raw, 'title', 'text');
  const reason = text(raw, 'reason');
  const permissionPrompt = text(raw, 'permission_prompt', 'permissionPrompt');
  const difficulty: unknown = Reflect.get(raw, 'difficulty');
  const category: unknown = Reflect.get(raw, 'category');
  const tiedToRaw: unknown = Reflect.get(raw, 'tied_to') ?? Reflect.get(raw, 'tiedTo');

  if (!title || !reason || !permissionPrompt) return null;
  if (!isDifficulty(difficulty) || !isCategory(category) || category === 'crisis') return null;
  if (title.length > MAX_TITLE_LENGTH || reason.length > MAX_REASON_LENGTH) return null;
  if (phase === 'CRISIS' && !allowedInCrisis({ category, difficulty })) return null;

  return {
    id: newId(),
    title,
    reason,
    permissionPrompt,
    difficulty,
    category,
    tiedTo: isTiedTo(tiedToRaw) ? tiedToRaw : 'profile',
    source: 'llm',
  };
}

export function parseSuggestionResponse(response: string): unknown[] {
  try {
    const parsed: unknown = JSON.parse(stripCodeFences(response));
    return Array.isArray(parsed) ? parsed : [];
  } catch {
    logger.debug('[SuggestionService] LLM suggestions were not JSON');
    return [];
  }
}

// ============================================================================
// SERVICE
// ============================================================================

export class SuggestionService {
  constructor(private readonly llmClient: LLMClient | null = null) {}

  /**
   * Catalog list only; what the engine attaches to every turn.
   */
  rank(input: SuggestionInput, limit: number = DEFAULT_SUGGESTION_LIMIT): SuggestionResult {
    return {
      phase: input.phase,
      suggestions: generateSuggestions(input, limit),
      urgent: input.phase === 'CRISIS',
      usedFallback: true,
    };
  }

  /**
   * LLM-personalised list outside CRISIS, catalog list otherwise or on any
   * model failure.
   */
  async suggest(
    input: SuggestionInput,
    context: PromptContext | null,
    limit: number = DEFAULT_SUGGESTION_LIMIT
  ): Promise<SuggestionResult> {
    const fallback = this.rank(input, limit);
    if (input.phase === 'CRISIS' || !this.llmClient || !context || limit <= 0) {
      return fallback;
    }

    let personalised: Suggestion[] = [];
    try {
      const response = await this.llmClient.complete(
        renderSuggestionPrompt(context, limit, {
          category: input.preferences?.preferredCategory ?? null,
          difficulty: input.preferences?.preferredDifficulty ?? null,
        }),
        { temperature: 0.7, maxTokens: 800 }
      );
      personalised = parseSuggestionResponse(response)
        .map(raw => validateSuggestion(raw, input.phase))
        .filter((suggestion): suggestion is Suggestion => suggestion !== null)
        .slice(0, limit);
    } catch (error) {
      logger.warn('[SuggestionService] LLM suggestions failed, using catalog', error);
      return fallback;
    }

    if (personalised.length === 0) return fallback;

    const titles = new Set(personalised.map(suggestion => suggestion.title.toLowerCase()));
    for (const suggestion of fallback.suggestions) {
      if (personalised.length >= limit) break;
      if (!titles.has(suggestion.title.toLowerCase())) personalised.push(suggestion);
    }

    return { ...fallback, suggestions: personalised, usedFallback: false };
  }
}
