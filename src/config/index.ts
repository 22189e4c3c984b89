/**
 * @file Application configuration.
 * Read once from the environment into a typed object. Only the logger
 * (LOG_LEVEL, which must work before config loads) reads process.env itself.
 */

import type { LLMProviderConfig } from '../services/llm_service/llm_providers';
import { isLLMProvider } from '../services/llm_service/llm_providers';
import type { ScoringConfig } from '../services/scoring_service/models';
import { resolveScoringConfig } from '../services/scoring_service/models';

export { DEFAULT_SCORING_CONFIG } from '../services/scoring_service/models';

export type StorageBackend = 'memory' | 'mongo';
export type SessionBackend = 'memory' | 'redis';

export interface AppConfig {
  port: number;
  nodeEnv: string;
  storage: StorageBackend;
  mongoUri: string;
  mongoDbName: string;
  sessionBackend: SessionBackend;
  redisUrl: string;
  sessionIdleMinutes: number;
  corsOrigins: string[] | '*';
  llm: LLMProviderConfig & {
    timeoutMs: number;
    maxRetries: number;
  };
  scoring: ScoringConfig;
}

function intFrom(raw: string | undefined, fallback: number, min = 0): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number.parseInt(raw, 10);
  return Number.isFinite(value) && value >= min ? value : fallback;
}

function optional(raw: string | undefined): string | undefined {
  const value = raw?.trim();
  return value ? value : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const mongoUri = optional(env.MONGODB_URI);
  const redisUrl = optional(env.REDIS_URL);

  const storageEnv = optional(env.STORAGE_BACKEND)?.toLowerCase();
  const storage: StorageBackend =
    storageEnv === 'mongo' || storageEnv === 'memory' ? storageEnv : mongoUri ? 'mongo' : 'memory';

  const sessionEnv = optional(env.SESSION_BACKEND)?.toLowerCase();
  const sessionBackend: SessionBackend =
    sessionEnv === 'redis' || sessionEnv === 'memory' ? sessionEnv : redisUrl ? 'redis' : 'memory';

  const provider = optional(env.LLM_PROVIDER)?.toLowerCase();
  const origins = optional(env.CORS_ORIGINS);

  return {
    port: intFrom(env.PORT, 3000, 1),
    nodeEnv: env.NODE_ENV || 'development',
    storage,
    mongoUri: mongoUri ?? 'mongodb://localhost:27017/steadypulse',
    mongoDbName: optional(env.MONGODB_DB) ?? 'steadypulse',
    sessionBackend,
    redisUrl: redisUrl ?? 'redis://localhost:6379',
    sessionIdleMinutes: intFrom(env.SESSION_IDLE_MINUTES, 30, 1),
    corsOrigins: origins && origins !== '*' ? origins.split(',').map(origin => origin.trim()) : '*',
    llm: {
      provider: isLLMProvider(provider) ? provider : undefined,
      anthropicApiKey: optional(env.ANTHROPIC_API_KEY),
      openaiApiKey: optional(env.OPENAI_API_KEY),
      geminiApiKey: optional(env.GEMINI_API_KEY),
      defaultModel: optional(env.LLM_MODEL),
      timeoutMs: intFrom(env.LLM_TIMEOUT_MS, 15000, 1),
      maxRetries: intFrom(env.LLM_MAX_RETRIES, 3),
    },
    scoring: resolveScoringConfig({
      chaos: { windowSize: intFrom(env.CHAOS_WINDOW_SIZE, 5, 2) },
      retraction: { lookbackTurns: intFrom(env.RETRACTION_LOOKBACK_TURNS, 1, 1) },
      phase: { hysteresisTurns: intFrom(env.PHASE_HYSTERESIS_TURNS, 3, 1) },
    }),
  };
}
