/**
 * @file Session Manager
 *
 * Loads the caller's session, rotates it after an idle gap and applies the
 * per-turn bookkeeping (topics, trajectory, phase, pending danger trigger). The
 * update itself is a pure function so the engine can test it in isolation.
 */

import { v4 as uuidv4 } from 'uuid';
import type { DangerTrigger, Phase, PhaseState, RiskScores } from '../scoring_service/models';
import { INITIAL_PHASE_STATE } from '../scoring_service/phase_machine';
import { extractTopics } from '../scoring_service/lexicon';
import type { SessionState, SessionStore, Trajectory } from './models';
import { logger } from '../../utils/logger';

export const MAX_TOPICS = 5;
const SEVERITY_HISTORY = 5;
const TRAJECTORY_SPAN = 3;
const TRAJECTORY_DELTA = 2;

export interface SessionManagerOptions {
  idleMinutes?: number;
  now?: () => Date;
  newId?: () => string;
}

export interface TurnUpdate {
  text: string;
  severity: number;
  phaseState: PhaseState;
  scores: RiskScores;
  chaos: { score: number; reason: string };
  lastDangerTrigger: DangerTrigger | null;
  now: Date;
}

// ============================================================================
// PURE HELPERS
// ============================================================================

export function createSession(userId: string, now: Date, sessionId: string): SessionState {
  const timestamp = now.toISOString();
  return {
    sessionId,
    userId,
    startedAt: timestamp,
    lastActiveAt: timestamp,
    turn: 0,
    recentTopics: [],
    trajectory: 'steady',
    recentSeverities: [],
    phaseState: { ...INITIAL_PHASE_STATE },
    lastDangerTrigger: null,
    rollingScores: null,
    lastChaos: null,
  };
}

/**
 * Newly mentioned topics move to the end; only the last MAX_TOPICS are kept.
 */
export function mergeTopics(existing: readonly string[], text: string): string[] {
  const mentioned = extractTopics(text);
  const kept = existing.filter(topic => !mentioned.includes(topic));
  return [...kept, ...mentioned].slice(-MAX_TOPICS);
}

/**
 * Direction of the last few severities.
 */
export function computeTrajectory(severities: readonly number[]): Trajectory {
  const span = severities.slice(-TRAJECTORY_SPAN);
  if (span.length < 2) return 'steady';
  const delta = span[span.length - 1] - span[0];
  if (delta >= TRAJECTORY_DELTA) return 'escalating';
  if (delta <= -TRAJECTORY_DELTA) return 'easing';
  return 'steady';
}

const NEEDS_BY_PHASE: Record<Phase, string[]> = {
  CRISIS: ['Safety check', 'Crisis resources', 'Grounding'],
  HURT: ['Validation', 'Comfort', 'Gentle check-in'],
  AT_RISK: ['Validation', 'Stress relief'],
  STABLE: ['Active listening'],
};

export function immediateNeeds(phase: Phase, retractionActive = false): string[] {
  const needs = [...NEEDS_BY_PHASE[phase]];
  return retractionActive ? ['Reassurance', ...needs] : needs;
}

export function applyTurn(state: SessionState, update: TurnUpdate): SessionState {
  const recentSeverities = [...state.recentSeverities, update.severity].slice(-SEVERITY_HISTORY);
  return {
    ...state,
    lastActiveAt: update.now.toISOString(),
    turn: state.turn + 1,
    recentTopics: mergeTopics(state.recentTopics, update.text),
    trajectory: computeTrajectory(recentSeverities),
    recentSeverities,
    phaseState: { ...update.phaseState },
    lastDangerTrigger: update.lastDangerTrigger,
    rollingScores: { ...update.scores },
    lastChaos: { score: update.chaos.score, reason: update.chaos.reason },
  };
}

// ============================================================================
// MANAGER
// ============================================================================

export class SessionManager {
  private readonly idleMs: number;
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(private readonly store: SessionStore, options: SessionManagerOptions = {}) {
    this.idleMs = (options.idleMinutes ?? 30) * 60 * 1000;
    this.now = options.now ?? (() => new Date());
    this.newId = options.newId ?? uuidv4;
  }

  /**
   * Current session for the user, or a fresh one when none exists or the
   * previous one has been idle too long.
   */
  async resume(userId: string): Promise<SessionState> {
    const now = this.now();
    const existing = await this.store.load(userId);

    if (!existing) {
      return createSession(userId, now, this.newId());
    }

    const lastActive = Date.parse(existing.lastActiveAt);
    if (Number.isNaN(lastActive) || now.getTime() - lastActive > this.idleMs) {
      logger.info(`[SessionManager] Session ${existing.sessionId} idle, starting a new one for ${userId}`);
      return createSession(userId, now, this.newId());
    }

    return existing;
  }

  /**
   * Read-only view used by standalone queries; never rotates or saves.
   */
  async peek(userId: string): Promise<SessionState | null> {
    return this.store.load(userId);
  }

  async save(state: SessionState): Promise<void> {
    await this.store.save(state);
  }
}
