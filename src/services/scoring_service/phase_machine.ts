/**
 * @file Phase State Machine
 *
 * STABLE < AT_RISK < HURT < CRISIS. Escalation happens on the turn the
 * scores justify it, and only up to the tier they justify. De-escalation
 * needs `hysteresisTurns` consecutive turns below the current phase, after
 * which the phase settles on the highest tier seen during that streak.
 * A retraction is the only way down without the delay.
 */

import type { PhaseConfig, Phase, PhaseState, RiskScores } from './models';
import { DEFAULT_SCORING_CONFIG, PHASES } from './models';

export const INITIAL_PHASE_STATE: PhaseState = {
  phase: 'STABLE',
  calmStreak: 0,
  pendingPhase: null,
};

export interface PhaseInput {
  scores: RiskScores;
  chaos: number;
  crisisDetected: boolean;
}

export function phaseRank(phase: Phase): number {
  return PHASES.indexOf(phase);
}

export function isPhase(value: unknown): value is Phase {
  return typeof value === 'string' && PHASES.some(phase => phase === value);
}

function higher(a: Phase, b: Phase): Phase {
  return phaseRank(a) >= phaseRank(b) ? a : b;
}

/**
 * Tier justified by this turn's scores alone.
 */
export function rawPhase(input: PhaseInput, config: PhaseConfig = DEFAULT_SCORING_CONFIG.phase): Phase {
  const { stress, burnout, danger } = input.scores;
  if (input.crisisDetected || danger >= config.crisisDanger) return 'CRISIS';
  if (Math.max(stress, burnout, danger) >= config.hurt) return 'HURT';
  if (Math.max(stress, burnout, danger) >= config.atRisk || input.chaos >= config.chaosAtRisk) {
    return 'AT_RISK';
  }
  return 'STABLE';
}

/**
 * Advance one turn.
 */
export function advancePhase(
  state: PhaseState,
  input: PhaseInput,
  config: PhaseConfig = DEFAULT_SCORING_CONFIG.phase,
  options: { retraction?: boolean } = {}
): PhaseState {
  const raw = rawPhase(input, config);

  if (options.retraction || phaseRank(raw) >= phaseRank(state.phase)) {
    return { phase: raw, calmStreak: 0, pendingPhase: null };
  }

  const calmStreak = state.calmStreak + 1;
  const pendingPhase = state.pendingPhase ? higher(state.pendingPhase, raw) : raw;

  if (calmStreak >= config.hysteresisTurns) {
    return { phase: pendingPhase, calmStreak: 0, pendingPhase: null };
  }
  return { phase: state.phase, calmStreak, pendingPhase };
}
