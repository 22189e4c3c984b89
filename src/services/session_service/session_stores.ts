/**
 * @file SessionStore implementations: a process-local map and Redis.
 */

import type { RedisClient } from '../../config/redis';
import { isPhase } from '../scoring_service/phase_machine';
import type { DangerTrigger, PhaseState, RiskScores } from '../scoring_service/models';
import type { SessionState, SessionStore, Trajectory } from './models';
import { logger } from '../../utils/logger';

const SESSION_KEY = (userId: string): string => `session:${userId}`;

function clone(state: SessionState): SessionState {
  return structuredClone(state);
}

export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, SessionState>();

  async load(userId: string): Promise<SessionState | null> {
    const state = this.sessions.get(userId);
    return state ? clone(state) : null;
  }

  async save(state: SessionState): Promise<void> {
    this.sessions.set(state.userId, clone(state));
  }
}

// ============================================================================
// SERIALIZATION
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

function numberList(value: unknown): number[] {
  return Array.isArray(value) ? value.filter((item): item is number => typeof item === 'number') : [];
}

function toTrajectory(value: unknown): Trajectory {
  return value === 'escalating' || value === 'easing' ? value : 'steady';
}

function toPhaseState(value: unknown): PhaseState {
  if (!isRecord(value) || !isPhase(value.phase)) {
    return { phase: 'STABLE', calmStreak: 0, pendingPhase: null };
  }
  return {
    phase: value.phase,
    calmStreak: typeof value.calmStreak === 'number' ? value.calmStreak : 0,
    pendingPhase: isPhase(value.pendingPhase) ? value.pendingPhase : null,
  };
}

function toTrigger(value: unknown): DangerTrigger | null {
  if (!isRecord(value) || typeof value.turn !== 'number') return null;
  return { turn: value.turn, recordIds: stringList(value.recordIds) };
}

function toScores(value: unknown): RiskScores | null {
  if (!isRecord(value)) return null;
  const { stress, burnout, danger } = value;
  if (typeof stress !== 'number' || typeof burnout !== 'number' || typeof danger !== 'number') return null;
  return { stress, burnout, danger };
}

/**
 * Rebuild a SessionState from stored JSON; null when the payload is not a
 * session at all.
 */
export function parseSessionState(raw: string): SessionState | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isRecord(parsed)) return null;

  const { sessionId, userId, startedAt, lastActiveAt, turn, lastChaos } = parsed;
  if (
    typeof sessionId !== 'string' ||
    typeof userId !== 'string' ||
    typeof startedAt !== 'string' ||
    typeof lastActiveAt !== 'string' ||
    typeof turn !== 'number'
  ) {
    return null;
  }

  return {
    sessionId,
    userId,
    startedAt,
    lastActiveAt,
    turn,
    recentTopics: stringList(parsed.recentTopics),
    trajectory: toTrajectory(parsed.trajectory),
    recentSeverities: numberList(parsed.recentSeverities),
    phaseState: toPhaseState(parsed.phaseState),
    lastDangerTrigger: toTrigger(parsed.lastDangerTrigger),
    rollingScores: toScores(parsed.rollingScores),
    lastChaos:
      isRecord(lastChaos) && typeof lastChaos.score === 'number' && typeof lastChaos.reason === 'string'
        ? { score: lastChaos.score, reason: lastChaos.reason }
        : null,
  };
}

/**
 * The two Redis commands the session store issues.
 */
export interface SessionCache {
  get(key: string): Promise<string | null>;
  setEx(key: string, seconds: number, value: string): Promise<void>;
}

export function redisSessionCache(client: RedisClient): SessionCache {
  return {
    get: key => client.get(key),
    setEx: async (key, seconds, value) => {
      await client.setEx(key, seconds, value);
    },
  };
}

export const SESSION_TTL_SECONDS = 7 * 24 * 60 * 60;

export class RedisSessionStore implements SessionStore {
  constructor(
    private readonly redis: SessionCache,
    private readonly ttlSeconds: number = SESSION_TTL_SECONDS
  ) {}

  async load(userId: string): Promise<SessionState | null> {
    const raw = await this.redis.get(SESSION_KEY(userId));
    if (raw === null) return null;
    const state = parseSessionState(raw);
    if (!state) {
      logger.warn(`[SessionStore] Discarding unreadable session for ${userId}`);
    }
    return state;
  }

  async save(state: SessionState): Promise<void> {
    await this.redis.setEx(SESSION_KEY(state.userId), this.ttlSeconds, JSON.stringify(state));
  }
}
