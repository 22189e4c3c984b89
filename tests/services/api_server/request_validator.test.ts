/**
 * @file Tests for API request validation
 */

import { MAX_SUGGESTION_LIMIT, RequestValidator } from '../../../src/services/api_server/request_validator';

describe('RequestValidator', () => {
  const validator = new RequestValidator();

  describe('validateChat', () => {
    it('should accept a valid request', () => {
      expect(validator.validateChat({ userId: 'user-1', message: 'hi' })).toEqual({
        isValid: true,
        value: { userId: 'user-1', message: 'hi' },
        errors: [],
      });
    });

    it('should collect every problem', () => {
      expect(validator.validateChat({})).toEqual({
        isValid: false,
        errors: ['userId is required and cannot be empty.', 'message is required and cannot be empty.'],
      });
    });

    it('should reject non-object bodies', () => {
      expect(validator.validateChat('hello').errors).toEqual(['Request body must be a JSON object.']);
      expect(validator.validateChat([1]).errors).toEqual(['Request body must be a JSON object.']);
    });

    it('should reject unsafe user ids and long messages', () => {
      const result = validator.validateChat({ userId: 'user 1', message: 'x'.repeat(4001) });

      expect(result.errors).toEqual([
        'userId may only contain letters, digits, and . _ @ - (max 128 characters).',
        'message must be at most 4000 characters.',
      ]);
    });
  });

  describe('validateProfile', () => {
    it('should keep only provided fields, trimmed', () => {
      const result = validator.validateProfile({ name: ' Sam ', hobbies: [' hiking ', 'music'] });

      expect(result).toEqual({ isValid: true, value: { name: 'Sam', hobbies: ['hiking', 'music'] }, errors: [] });
    });

    it('should reject malformed lists and notes', () => {
      const result = validator.validateProfile({ likes: 'tea', triggers: ['', 'x'], personalNotes: 5 });

      expect(result.errors).toEqual([
        'likes must be an array of at most 50 non-empty strings.',
        'triggers must be an array of at most 50 non-empty strings.',
        'personalNotes must be a string of at most 2000 characters.',
      ]);
    });
  });

  describe('validateFeedback', () => {
    it('should build a typed feedback input', () => {
      const result = validator.validateFeedback({
        suggestionId: ' comfort-song ',
        action: 'completed',
        rating: 4,
        category: 'comfort',
        difficulty: 'very_easy',
      });

      expect(result).toEqual({
        isValid: true,
        value: { suggestionId: 'comfort-song', action: 'completed', rating: 4, category: 'comfort', difficulty: 'very_easy' },
        errors: [],
      });
    });

    it('should reject unknown actions and bad ratings', () => {
      const result = validator.validateFeedback({ suggestionId: 's1', action: 'liked', rating: 4.5, category: 'fun' });

      expect(result.errors).toEqual([
        'action must be one of: accepted, rejected, completed, dismissed.',
        'rating must be an integer from 1 to 5.',
        'category is not a known suggestion category.',
      ]);
    });
  });

  describe('parseLimit', () => {
    it('should fall back when absent', () => {
      expect(validator.parseLimit(undefined, 3)).toEqual({ isValid: true, value: 3, errors: [] });
    });

    it('should parse digits within range only', () => {
      expect(validator.parseLimit('5', 3)).toEqual({ isValid: true, value: 5, errors: [] });
      expect(validator.parseLimit('0', 3).isValid).toBe(false);
      expect(validator.parseLimit(String(MAX_SUGGESTION_LIMIT + 1), 3).isValid).toBe(false);
      expect(validator.parseLimit('2.5', 3).isValid).toBe(false);
      expect(validator.parseLimit(['2'], 3).isValid).toBe(false);
    });
  });
});
