/**
 * @file Timeout and rate-limit retry around any LLMClient.
 *
 * - Each attempt is bounded by `timeoutMs`; on expiry the request is aborted
 *   and LLMTimeoutError is thrown.
 * - Rate-limited failures are retried with exponential backoff plus jitter.
 * - Anything else is normalised to LLMUnavailableError.
 */

import type { LLMClient, LLMOptions } from './llm_providers';
import { LLMTimeoutError, LLMUnavailableError } from './errors';
import { logger } from '../../utils/logger';

export interface ResilienceOptions {
  timeoutMs?: number;
  maxRetries?: number;
  baseDelayMs?: number;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise(resolve => {
    setTimeout(resolve, ms);
  });

export class ResilientLLMClient implements LLMClient {
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly baseDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(private readonly inner: LLMClient, options: ResilienceOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 15000;
    this.maxRetries = options.maxRetries ?? 3;
    this.baseDelayMs = options.baseDelayMs ?? 2000;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
  }

  async complete(prompt: string, options: LLMOptions = {}): Promise<string> {
    if (!prompt.trim()) {
      throw new LLMUnavailableError('Prompt cannot be empty');
    }

    for (let attempt = 0; ; attempt++) {
      try {
        return await this.attempt(prompt, options);
      } catch (error) {
        const normalized = normalizeError(error);
        const retryable = normalized instanceof LLMUnavailableError && normalized.rateLimited;
        if (!retryable || attempt >= this.maxRetries) {
          throw normalized;
        }
        const delay = this.baseDelayMs * 2 ** attempt + this.random() * 1000;
        logger.debug(`[LLM] Rate limited, retrying in ${Math.round(delay)}ms (attempt ${attempt + 1})`);
        await this.sleep(delay);
      }
    }
  }

  private attempt(prompt: string, options: LLMOptions): Promise<string> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new LLMTimeoutError(this.timeoutMs));
      }, this.timeoutMs);
    });

    const call = this.inner.complete(prompt, { ...options, signal: controller.signal });

    return Promise.race([call, timeout]).finally(() => {
      clearTimeout(timer);
    });
  }
}

function normalizeError(error: unknown): LLMUnavailableError | LLMTimeoutError {
  if (error instanceof LLMUnavailableError || error instanceof LLMTimeoutError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new LLMUnavailableError(message, {
    cause: error,
    rateLimited: /\b429\b|quota|resource exhausted/i.test(message),
  });
}
