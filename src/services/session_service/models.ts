/**
 * @file Per-user session state carried between turns.
 */

import type { ChaosResult, DangerTrigger, PhaseState, RiskScores } from '../scoring_service/models';

export type Trajectory = 'escalating' | 'easing' | 'steady';

export interface SessionState {
  sessionId: string;
  userId: string;
  startedAt: string;          // ISO8601
  lastActiveAt: string;       // ISO8601
  /** Turns processed in this session; the next turn is `turn + 1` */
  turn: number;
  recentTopics: string[];
  trajectory: Trajectory;
  recentSeverities: number[];
  phaseState: PhaseState;
  lastDangerTrigger: DangerTrigger | null;
  rollingScores: RiskScores | null;
  lastChaos: Pick<ChaosResult, 'score' | 'reason'> | null;
}

export interface SessionStore {
  load(userId: string): Promise<SessionState | null>;
  save(state: SessionState): Promise<void>;
}
