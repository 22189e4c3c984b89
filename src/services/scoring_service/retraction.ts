/**
 * @file Joke Retraction Protocol
 *
 * A user who says "just kidding" right after a danger signal gets that
 * signal withdrawn: the trigger records leave every later risk window,
 * danger drops to a safe floor and the phase is recomputed without the
 * usual de-escalation delay.
 */

import type { DangerTrigger, RetractionConfig, RiskAssessment } from './models';
import { DEFAULT_SCORING_CONFIG } from './models';
import { LEXICON, Lexicon, hasAnyTerm } from './lexicon';

export const RETRACTION_REASON = 'User retracted the alarming statement (stated it was a joke).';

/**
 * True when the message carries a retraction marker and no danger term of
 * its own ("I was kidding, I still want to die" is not a retraction).
 */
export function isRetractionMessage(text: string, lexicon: Lexicon = LEXICON): boolean {
  if (typeof text !== 'string' || text.trim() === '') return false;
  return hasAnyTerm(text, lexicon.retractionMarkers) && !hasAnyTerm(text, lexicon.dangerTerms);
}

/**
 * Decide whether the message on `turn` retracts `trigger`.
 */
export function detectRetraction(
  text: string,
  trigger: DangerTrigger | null,
  turn: number,
  config: RetractionConfig = DEFAULT_SCORING_CONFIG.retraction,
  lexicon: Lexicon = LEXICON
): boolean {
  if (!trigger) return false;
  const distance = turn - trigger.turn;
  if (distance < 1 || distance > config.lookbackTurns) return false;
  return isRetractionMessage(text, lexicon);
}

/**
 * Override a fresh assessment after a retraction.
 */
export function applyRetraction(
  assessment: RiskAssessment,
  config: RetractionConfig = DEFAULT_SCORING_CONFIG.retraction
): RiskAssessment {
  return {
    ...assessment,
    scores: { ...assessment.scores, danger: config.safeDangerFloor },
    reasons: { ...assessment.reasons, danger: RETRACTION_REASON },
    crisisDetected: false,
    dangerRecordIds: [],
    currentTurnTriggered: false,
  };
}

/**
 * Trigger to remember after this turn's assessment, or null when the turn
 * raised no danger of its own. Only the current record is attached, plus
 * the records of `previous` when that trigger is still retractable on the
 * next turn; older danger records are never swept into a retraction.
 */
export function raiseTrigger(
  assessment: RiskAssessment,
  turn: number,
  currentRecordId: string,
  previous: DangerTrigger | null = null,
  config: RetractionConfig = DEFAULT_SCORING_CONFIG.retraction
): DangerTrigger | null {
  if (!assessment.currentTurnTriggered) return null;
  const carried = previous && turn + 1 - previous.turn <= config.lookbackTurns ? previous.recordIds : [];
  return { turn, recordIds: [...new Set([...carried, currentRecordId])] };
}
