/**
 * @file Failure modes of an LLM call.
 * Callers catch these to take the heuristic fallback path.
 */

export class LLMUnavailableError extends Error {
  readonly rateLimited: boolean;
  readonly status?: number;

  constructor(message: string, options: { rateLimited?: boolean; status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'LLMUnavailableError';
    this.rateLimited = options.rateLimited ?? false;
    this.status = options.status;
  }
}

export class LLMTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`LLM call timed out after ${timeoutMs}ms`);
    this.name = 'LLMTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export function isLLMFailure(error: unknown): error is LLMUnavailableError | LLMTimeoutError {
  return error instanceof LLMUnavailableError || error instanceof LLMTimeoutError;
}
