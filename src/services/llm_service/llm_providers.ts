/**
 * @file LLM Provider Abstraction
 *
 * Unified interface for the chat model behind the companion:
 * - Anthropic (direct API)
 * - OpenAI (direct API)
 * - Gemini (Google Generative Language API)
 *
 * Every provider failure surfaces as LLMUnavailableError so the engine
 * has a single place to switch to its heuristic fallback.
 */

import { LLMUnavailableError } from './errors';
import { logger } from '../../utils/logger';

/**
 * LLM client interface - can be implemented with any LLM provider.
 */
export interface LLMClient {
  complete(prompt: string, options?: LLMOptions): Promise<string>;
}

export interface LLMOptions {
  temperature?: number;
  maxTokens?: number;
  model?: string;
  signal?: AbortSignal;
}

// ============================================================================
// PROVIDER TYPES
// ============================================================================

export type LLMProvider = 'anthropic' | 'openai' | 'gemini';

const PROVIDERS: readonly LLMProvider[] = ['anthropic', 'openai', 'gemini'];

export interface LLMProviderConfig {
  provider?: LLMProvider;
  anthropicApiKey?: string;
  openaiApiKey?: string;
  geminiApiKey?: string;
  defaultModel?: string;
}

// ============================================================================
// RESPONSE HELPERS
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstOf(value: unknown): unknown {
  return Array.isArray(value) ? value[0] : undefined;
}

function field(value: unknown, key: string): unknown {
  return isRecord(value) ? value[key] : undefined;
}

async function postJson(
  provider: string,
  url: string,
  headers: Record<string, string>,
  body: unknown,
  signal?: AbortSignal
): Promise<unknown> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(body),
      signal,
    });
  } catch (error) {
    throw new LLMUnavailableError(`${provider} request failed`, { cause: error });
  }

  if (!response.ok) {
    const detail = await response.text();
    throw new LLMUnavailableError(`${provider} API error: ${response.status} - ${detail}`, {
      status: response.status,
      rateLimited: response.status === 429 || /quota|resource exhausted/i.test(detail),
    });
  }

  return response.json();
}

function requireText(provider: string, text: unknown): string {
  if (typeof text !== 'string' || text.trim() === '') {
    throw new LLMUnavailableError(`${provider} returned an empty response`);
  }
  return text;
}

// ============================================================================
// ANTHROPIC CLIENT
// ============================================================================

/**
 * Direct Anthropic API client.
 */
export class AnthropicLLMClient implements LLMClient {
  private apiKey: string;
  private defaultModel: string;

  constructor(config: { apiKey?: string; defaultModel?: string } = {}) {
    this.apiKey = config.apiKey || '';
    this.defaultModel = config.defaultModel || 'claude-3-haiku-20240307';

    if (!this.apiKey) {
      throw new Error('Anthropic API key is required');
    }
  }

  async complete(prompt: string, options?: LLMOptions): Promise<string> {
    const data = await postJson(
      'Anthropic',
      'https://api.anthropic.com/v1/messages',
      {
        'x-api-key': this.apiKey,
        'anthropic-version': '2023-06-01',
      },
      {
        model: options?.model || this.defaultModel,
        max_tokens: options?.maxTokens || 1024,
        temperature: options?.temperature ?? 0.3,
        messages: [{ role: 'user', content: prompt }],
      },
      options?.signal
    );

    return requireText('Anthropic', field(firstOf(field(data, 'content')), 'text'));
  }
}

// ============================================================================
// OPENAI CLIENT
// ============================================================================

/**
 * OpenAI API client.
 */
export class OpenAILLMClient implements LLMClient {
  private apiKey: string;
  private defaultModel: string;

  constructor(config: { apiKey?: string; defaultModel?: string } = {}) {
    this.apiKey = config.apiKey || '';
    this.defaultModel = config.defaultModel || 'gpt-4o-mini';

    if (!this.apiKey) {
      throw new Error('OpenAI API key is required');
    }
  }

  async complete(prompt: string, options?: LLMOptions): Promise<string> {
    const data = await postJson(
      'OpenAI',
      'https://api.openai.com/v1/chat/completions',
      { Authorization: `Bearer ${this.apiKey}` },
      {
        model: options?.model || this.defaultModel,
        max_tokens: options?.maxTokens || 1024,
        temperature: options?.temperature ?? 0.3,
        messages: [{ role: 'user', content: prompt }],
      },
      options?.signal
    );

    const message = field(firstOf(field(data, 'choices')), 'message');
    return requireText('OpenAI', field(message, 'content'));
  }
}

// ============================================================================
// GEMINI CLIENT
// ============================================================================

/**
 * Google Gemini client (generateContent endpoint).
 */
export class GeminiLLMClient implements LLMClient {
  private apiKey: string;
  private defaultModel: string;

  constructor(config: { apiKey?: string; defaultModel?: string } = {}) {
    this.apiKey = config.apiKey || '';
    this.defaultModel = config.defaultModel || 'gemini-1.5-flash';

    if (!this.apiKey) {
      throw new Error('Gemini API key is required');
    }
  }

  async complete(prompt: string, options?: LLMOptions): Promise<string> {
    const model = options?.model || this.defaultModel;
    const data = await postJson(
      'Gemini',
      `https://generativelanguage.googleapis.com/v1beta/models/${encodeURIComponent(model)}:generateContent`,
      { 'x-goog-api-key': this.apiKey },
      {
        contents: [{ role: 'user', parts: [{ text: prompt }] }],
        generationConfig: {
          temperature: options?.temperature ?? 0.3,
          maxOutputTokens: options?.maxTokens || 1024,
        },
      },
      options?.signal
    );

    const content = field(firstOf(field(data, 'candidates')), 'content');
    return requireText('Gemini', field(firstOf(field(content, 'parts')), 'text'));
  }
}

// ============================================================================
// FACTORY
// ============================================================================

/**
 * Create an LLM client based on configuration.
 * Returns null when no provider has credentials; the engine then runs
 * heuristic-only.
 */
export function createLLMClient(config: LLMProviderConfig = {}): LLMClient | null {
  const provider = config.provider || detectProvider(config);
  if (!provider) {
    logger.warn('[LLM] No provider credentials found, running heuristic-only');
    return null;
  }

  try {
    switch (provider) {
      case 'openai':
        logger.info('[LLM] Using OpenAI provider');
        return new OpenAILLMClient({ apiKey: config.openaiApiKey, defaultModel: config.defaultModel });

      case 'gemini':
        logger.info('[LLM] Using Gemini provider');
        return new GeminiLLMClient({ apiKey: config.geminiApiKey, defaultModel: config.defaultModel });

      case 'anthropic':
        logger.info('[LLM] Using Anthropic provider');
        return new AnthropicLLMClient({ apiKey: config.anthropicApiKey, defaultModel: config.defaultModel });
    }
  } catch (error) {
    logger.warn(`[LLM] Could not create ${provider} client, running heuristic-only`, error);
    return null;
  }
}

export function isLLMProvider(value: string | undefined): value is LLMProvider {
  return value !== undefined && PROVIDERS.some(provider => provider === value);
}

/**
 * First provider with credentials in the loaded configuration.
 */
function detectProvider(config: LLMProviderConfig): LLMProvider | null {
  if (config.anthropicApiKey) {
    return 'anthropic';
  }
  if (config.openaiApiKey) {
    return 'openai';
  }
  if (config.geminiApiKey) {
    return 'gemini';
  }

  return null;
}
