/**
 * @file HTTP-agnostic request handling. Each method takes raw request
 * input and resolves to a status code plus JSON body, so routes stay thin
 * and handlers can be exercised without a server.
 */

import type { ChatEngine } from '../chat_engine/chat_engine';
import type { ProfileStore } from '../memory_service/models';
import { ValidationError } from '../../utils/errors';
import { RequestValidator } from './request_validator';
import { logger } from '../../utils/logger';

export interface ApiResponse {
  statusCode: number;
  body: unknown;
}

function badRequest(errors: string[]): ApiResponse {
  return { statusCode: 400, body: { error: 'Bad Request', details: errors } };
}

export class ChatController {
  constructor(
    private readonly engine: ChatEngine,
    private readonly profiles: ProfileStore,
    private readonly validator: RequestValidator = new RequestValidator()
  ) {}

  /**
   * POST /api/chat
   */
  async chat(body: unknown): Promise<ApiResponse> {
    const request = this.validator.validateChat(body);
    if (!request.isValid) return badRequest(request.errors);

    try {
      const result = await this.engine.processMessage(request.value.userId, request.value.message);
      return { statusCode: 200, body: result };
    } catch (error) {
      if (error instanceof ValidationError) return badRequest(error.errors);
      throw error;
    }
  }

  /**
   * GET /api/users/:userId/predictions
   */
  async predictions(userId: unknown): Promise<ApiResponse> {
    const errors = this.validator.validateUserId(userId);
    if (errors.length > 0 || typeof userId !== 'string') return badRequest(errors);
    return { statusCode: 200, body: await this.engine.getPredictions(userId) };
  }

  /**
   * GET /api/users/:userId/suggestions?limit=n
   */
  async suggestions(userId: unknown, limit: unknown): Promise<ApiResponse> {
    const errors = this.validator.validateUserId(userId);
    const parsedLimit = this.validator.parseLimit(limit, 3);
    if (!parsedLimit.isValid) errors.push(...parsedLimit.errors);
    if (errors.length > 0 || typeof userId !== 'string' || !parsedLimit.isValid) return badRequest(errors);

    return { statusCode: 200, body: await this.engine.getSuggestions(userId, parsedLimit.value) };
  }

  /**
   * GET /api/users/:userId/profile
   */
  async getProfile(userId: unknown): Promise<ApiResponse> {
    const errors = this.validator.validateUserId(userId);
    if (errors.length > 0 || typeof userId !== 'string') return badRequest(errors);

    const profile = await this.profiles.get(userId);
    if (!profile) {
      return { statusCode: 404, body: { error: 'Not Found', details: [`No profile for user ${userId}.`] } };
    }
    return { statusCode: 200, body: profile };
  }

  /**
   * PUT /api/users/:userId/profile
   */
  async updateProfile(userId: unknown, body: unknown): Promise<ApiResponse> {
    const errors = this.validator.validateUserId(userId);
    const update = this.validator.validateProfile(body);
    if (!update.isValid) errors.push(...update.errors);
    if (errors.length > 0 || typeof userId !== 'string' || !update.isValid) return badRequest(errors);

    const profile = await this.profiles.upsert(userId, update.value);
    logger.info(`[ChatController] Profile updated for ${userId}`);
    return { statusCode: 200, body: profile };
  }

  /**
   * POST /api/users/:userId/feedback
   */
  async feedback(userId: unknown, body: unknown): Promise<ApiResponse> {
    const errors = this.validator.validateUserId(userId);
    const input = this.validator.validateFeedback(body);
    if (!input.isValid) errors.push(...input.errors);
    if (errors.length > 0 || typeof userId !== 'string' || !input.isValid) return badRequest(errors);

    const entry = await this.engine.feedback.logInteraction(userId, input.value);
    const preferences = await this.engine.getPreferences(userId);
    return { statusCode: 201, body: { entry, preferences } };
  }
}
