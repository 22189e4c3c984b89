/**
 * @file Validates incoming API payloads and turns them into typed requests.
 */

import type { ProfileUpdate } from '../memory_service/models';
import type { FeedbackInput } from '../suggestion_service/feedback_loop';
import { isCategory, isDifficulty, isFeedbackAction } from '../suggestion_service/models';
import { MAX_MESSAGE_LENGTH } from '../chat_engine/chat_engine';

/**
 * Either the typed value or the list of problems found.
 */
export type ValidationResult<T> =
  | { isValid: true; value: T; errors: [] }
  | { isValid: false; errors: string[] };

export interface ChatRequest {
  userId: string;
  message: string;
}

const USER_ID_PATTERN = /^[A-Za-z0-9_.@-]{1,128}$/;
const MAX_LIST_ITEMS = 50;
const MAX_ITEM_LENGTH = 200;
const MAX_NOTES_LENGTH = 2000;
export const MAX_SUGGESTION_LIMIT = 10;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function done<T>(value: T, errors: string[]): ValidationResult<T> {
  return errors.length === 0 ? { isValid: true, value, errors: [] } : { isValid: false, errors };
}

export class RequestValidator {
  validateUserId(userId: unknown): string[] {
    if (typeof userId !== 'string' || userId.trim() === '') {
      return ['userId is required and cannot be empty.'];
    }
    if (!USER_ID_PATTERN.test(userId)) {
      return ['userId may only contain letters, digits, and . _ @ - (max 128 characters).'];
    }
    return [];
  }

  validateChat(body: unknown): ValidationResult<ChatRequest> {
    if (!isRecord(body)) return { isValid: false, errors: ['Request body must be a JSON object.'] };

    const { userId, message } = body;
    const errors = this.validateUserId(userId);
    if (typeof message !== 'string' || message.trim() === '') {
      errors.push('message is required and cannot be empty.');
    } else if (message.length > MAX_MESSAGE_LENGTH) {
      errors.push(`message must be at most ${MAX_MESSAGE_LENGTH} characters.`);
    }

    return done({ userId: String(userId), message: String(message) }, errors);
  }

  validateProfile(body: unknown): ValidationResult<ProfileUpdate> {
    if (!isRecord(body)) return { isValid: false, errors: ['Request body must be a JSON object.'] };

    const errors: string[] = [];
    const update: ProfileUpdate = {};
    const { name, personalNotes } = body;

    if (name !== undefined) {
      if (typeof name !== 'string' || name.length > MAX_ITEM_LENGTH) {
        errors.push(`name must be a string of at most ${MAX_ITEM_LENGTH} characters.`);
      } else {
        update.name = name.trim();
      }
    }

    for (const key of ['hobbies', 'likes', 'goals', 'triggers'] as const) {
      const value = body[key];
      if (value === undefined) continue;
      const list = this.stringList(value);
      if (list === null) {
        errors.push(`${key} must be an array of at most ${MAX_LIST_ITEMS} non-empty strings.`);
      } else {
        update[key] = list;
      }
    }

    if (personalNotes !== undefined) {
      if (typeof personalNotes !== 'string' || personalNotes.length > MAX_NOTES_LENGTH) {
        errors.push(`personalNotes must be a string of at most ${MAX_NOTES_LENGTH} characters.`);
      } else {
        update.personalNotes = personalNotes;
      }
    }

    return done(update, errors);
  }

  validateFeedback(body: unknown): ValidationResult<FeedbackInput> {
    if (!isRecord(body)) return { isValid: false, errors: ['Request body must be a JSON object.'] };

    const errors: string[] = [];
    const { suggestionId, action, rating, category, difficulty } = body;

    if (typeof suggestionId !== 'string' || suggestionId.trim() === '') {
      errors.push('suggestionId is required and cannot be empty.');
    }
    if (!isFeedbackAction(action)) {
      errors.push('action must be one of: accepted, rejected, completed, dismissed.');
    }
    if (rating !== undefined && (typeof rating !== 'number' || !Number.isInteger(rating) || rating < 1 || rating > 5)) {
      errors.push('rating must be an integer from 1 to 5.');
    }
    if (category !== undefined && !isCategory(category)) {
      errors.push('category is not a known suggestion category.');
    }
    if (difficulty !== undefined && !isDifficulty(difficulty)) {
      errors.push('difficulty must be one of: very_easy, easy, medium, hard.');
    }

    if (typeof suggestionId !== 'string' || !isFeedbackAction(action) || errors.length > 0) {
      return { isValid: false, errors };
    }

    const input: FeedbackInput = { suggestionId: suggestionId.trim(), action };
    if (typeof rating === 'number') input.rating = rating;
    if (isCategory(category)) input.category = category;
    if (isDifficulty(difficulty)) input.difficulty = difficulty;
    return done(input, errors);
  }

  /**
   * Suggestion count from a query string value.
   */
  parseLimit(raw: unknown, fallback: number): ValidationResult<number> {
    if (raw === undefined) return done(fallback, []);
    const value = typeof raw === 'string' && /^\d+$/.test(raw) ? Number(raw) : NaN;
    if (!Number.isInteger(value) || value < 1 || value > MAX_SUGGESTION_LIMIT) {
      return { isValid: false, errors: [`limit must be an integer from 1 to ${MAX_SUGGESTION_LIMIT}.`] };
    }
    return done(value, []);
  }

  private stringList(value: unknown): string[] | null {
    if (!Array.isArray(value) || value.length > MAX_LIST_ITEMS) return null;
    const items: string[] = [];
    for (const item of value) {
      if (typeof item !== 'string' || item.trim() === '' || item.length > MAX_ITEM_LENGTH) return null;
      items.push(item.trim());
    }
    return items;
  }
}
