/**
 * @file Risk Predictor
 *
 * Stress, burnout and danger (each 0-100) from a user's emotion log and the
 * message being processed. Steps run in a fixed order and each one can only
 * raise a score:
 *
 *   1. explicit danger terms        -> danger floor, crisisDetected
 *   2. severity spikes              -> danger floor + per-spike weight
 *   3. hopelessness tags            -> additive danger and stress
 *   4. windowed aggregation         -> stress (7 days), burnout (30 days)
 *
 * Retracted records are invisible to every step.
 */

import type { EmotionRecord, RiskAssessment, ScoringConfig, Trend } from './models';
import { DEFAULT_SCORING_CONFIG, clampScore, clampSeverity } from './models';
import { LEXICON, Lexicon, findTerms, hasAnyTag, hasAnyTerm } from './lexicon';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface RiskInput {
  /** Full or partial emotion log, any order */
  records: readonly EmotionRecord[];
  /** Message being processed this turn */
  currentText?: string;
  /** Id of the record created for `currentText`, when already logged */
  currentRecordId?: string;
  profile?: { personalNotes?: string } | null;
  retractedRecordIds?: Iterable<string>;
  now?: Date;
}

interface TimedRecord {
  record: EmotionRecord;
  time: number;
  severity: number;
  tags: string[];
}

// ============================================================================
// WINDOWING
// ============================================================================

/**
 * Valid, non-retracted records inside the window, oldest first, capped at
 * `maxRecords` most recent.
 */
function windowRecords(
  records: readonly EmotionRecord[],
  excluded: ReadonlySet<string>,
  since: number,
  maxRecords: number
): TimedRecord[] {
  const timed: TimedRecord[] = [];
  for (const record of Array.isArray(records) ? records : []) {
    if (!record || excluded.has(record.id)) continue;
    const tags: unknown = record.tags;
    const time = Date.parse(record.timestamp);
    if (Number.isNaN(time) || time < since) continue;
    timed.push({
      record,
      time,
      severity: clampSeverity(Number(record.severity)),
      tags: Array.isArray(tags) ? tags.map((tag: unknown) => String(tag).toLowerCase()) : [],
    });
  }
  // Array.prototype.sort is stable, so same-instant records keep log order
  timed.sort((a, b) => a.time - b.time);
  return timed.slice(-maxRecords);
}

function mean(values: readonly number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function sampleStdDev(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const avg = mean(values);
  const variance = values.reduce((sum, value) => sum + (value - avg) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
}

/**
 * Weights 1..n, oldest to newest.
 */
export function recencyWeightedMean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let weighted = 0;
  let totalWeight = 0;
  values.forEach((value, index) => {
    weighted += value * (index + 1);
    totalWeight += index + 1;
  });
  return weighted / totalWeight;
}

function longestRun(values: readonly number[], threshold: number): number {
  let run = 0;
  let longest = 0;
  for (const value of values) {
    run = value >= threshold ? run + 1 : 0;
    longest = Math.max(longest, run);
  }
  return longest;
}

// ============================================================================
// COMPONENTS
// ============================================================================

interface DangerResult {
  danger: number;
  reason: string;
  crisisDetected: boolean;
  currentTextHit: boolean;
  keywordIds: string[];
  signalIds: string[];
  hopelessCount: number;
}

function computeDanger(
  window: readonly TimedRecord[],
  currentText: string,
  config: ScoringConfig,
  lexicon: Lexicon
): DangerResult {
  const risk = config.risk;
  const currentTextHit = currentText !== '' && findTerms(currentText, lexicon.dangerTerms).length > 0;

  const keywordIds: string[] = [];
  const spikeIds: string[] = [];
  const hopelessIds: string[] = [];
  for (const entry of window) {
    const textHit = hasAnyTerm(entry.record.text ?? '', lexicon.dangerTerms);
    if (textHit || hasAnyTag(entry.tags, lexicon.dangerTerms)) keywordIds.push(entry.record.id);
    if (entry.severity >= risk.spikeSeverity) spikeIds.push(entry.record.id);
    if (hasAnyTag(entry.tags, lexicon.hopelessTags)) hopelessIds.push(entry.record.id);
  }

  const spikeComponent = spikeIds.length > 0
    ? Math.max(risk.spikeFloor, spikeIds.length * risk.spikeWeight)
    : 0;
  let danger = spikeComponent + hopelessIds.length * risk.hopelessDangerWeight;

  const crisisDetected = currentTextHit || keywordIds.length > 0;
  if (crisisDetected) {
    danger = Math.max(danger, risk.dangerKeywordFloor);
  }
  danger = clampScore(danger);

  let reason: string;
  if (crisisDetected) {
    reason = 'Explicit crisis keywords detected in recent messages.';
  } else if (window.length === 0) {
    reason = 'No recent data.';
  } else if (danger >= config.phase.crisisDanger) {
    reason = 'Critical levels of distress and hopelessness detected.';
  } else if (danger > config.phase.atRisk) {
    reason = 'Concerning spikes in severity and negative outlook.';
  } else {
    reason = 'No immediate risks detected.';
  }

  const signalIds = window
    .map(entry => entry.record.id)
    .filter(id => keywordIds.includes(id) || spikeIds.includes(id) || hopelessIds.includes(id));

  return {
    danger,
    reason,
    crisisDetected,
    currentTextHit,
    keywordIds,
    signalIds,
    hopelessCount: hopelessIds.length,
  };
}

function computeStress(
  window: readonly TimedRecord[],
  hopelessCount: number,
  config: ScoringConfig,
  lexicon: Lexicon
): { stress: number; reason: string } {
  const risk = config.risk;
  const hopelessBonus = hopelessCount * risk.hopelessStressWeight;

  if (window.length === 0) {
    return {
      stress: clampScore(risk.stressBaseline + hopelessBonus),
      reason: 'Insufficient data for stress analysis.',
    };
  }

  const severities = window.map(entry => entry.severity);
  const average = recencyWeightedMean(severities);

  let tagCount = 0;
  for (const entry of window) {
    tagCount += entry.tags.filter(tag => lexicon.stressTags.includes(tag)).length;
  }
  const persistent = longestRun(severities, risk.consecutiveHighSeverity) >= risk.consecutiveHighCount;

  const score =
    average * risk.stressSeverityScale +
    sampleStdDev(severities) * risk.stressVolatilityWeight +
    tagCount * risk.stressTagWeight +
    (persistent ? risk.consecutiveHighPenalty : 0) +
    hopelessBonus;

  let reason = `Based on average severity of ${average.toFixed(1)}/10`;
  if (persistent) {
    reason += ' and persistent high intensity.';
  } else if (tagCount > 2) {
    reason += ' and frequent stress indicators.';
  } else {
    reason += '.';
  }

  return { stress: clampScore(score), reason };
}

function computeBurnout(
  window: readonly TimedRecord[],
  personalNotes: string,
  config: ScoringConfig,
  lexicon: Lexicon
): { burnout: number; reason: string } {
  const risk = config.risk;
  if (window.length === 0) {
    return { burnout: clampScore(risk.burnoutBaseline), reason: 'Insufficient data for burnout analysis.' };
  }

  const tagged = window.filter(entry => hasAnyTag(entry.tags, lexicon.burnoutTags)).length;
  let score = (tagged / window.length) * risk.burnoutTagRatioWeight;

  const mid = Math.floor(window.length / 2);
  if (mid > 0) {
    const first = window.slice(0, mid);
    const second = window.slice(mid);
    const stabilityOf = (entries: readonly TimedRecord[]): number =>
      mean(entries.map(entry => clampSeverity(Number(entry.record.stability))));
    const severityOf = (entries: readonly TimedRecord[]): number =>
      mean(entries.map(entry => entry.severity));
    if (stabilityOf(second) < stabilityOf(first) && severityOf(second) > severityOf(first)) {
      score += risk.burnoutTrendPenalty;
    }
  }

  if (personalNotes && hasAnyTerm(personalNotes, lexicon.workloadWords)) {
    score += risk.burnoutWorkloadPenalty;
  }

  const burnout = clampScore(score);
  let reason = 'Analysis of energy levels and stability trends.';
  if (burnout > 60) {
    reason = 'High indicators of exhaustion and declining stability detected.';
  } else if (burnout > 30) {
    reason = 'Moderate signs of fatigue observed.';
  }
  return { burnout, reason };
}

/**
 * True when the current record on its own moved the user into crisis: the
 * rest of the window, without it, stays below the crisis threshold and
 * holds no danger keyword. Danger inherited from older records is never
 * attributed to the current turn.
 */
function raisedByCurrentRecord(
  window: readonly TimedRecord[],
  danger: DangerResult,
  currentRecordId: string | undefined,
  config: ScoringConfig,
  lexicon: Lexicon
): boolean {
  if (currentRecordId === undefined || !danger.signalIds.includes(currentRecordId)) return false;
  if (!danger.crisisDetected && danger.danger < config.phase.crisisDanger) return false;

  const without = computeDanger(
    window.filter(entry => entry.record.id !== currentRecordId),
    '',
    config,
    lexicon
  );
  return !without.crisisDetected && without.danger < config.phase.crisisDanger;
}

/**
 * Compare mean severity of the older and newer halves. Rising severity is
 * a declining condition.
 */
export function computeTrend(severities: readonly number[], delta: number): Trend {
  if (severities.length < 2) return 'stable';
  const mid = Math.floor(severities.length / 2);
  const diff = mean(severities.slice(mid)) - mean(severities.slice(0, mid));
  if (diff > delta) return 'declining';
  if (diff < -delta) return 'improving';
  return 'stable';
}

// ============================================================================
// ENTRY POINT
// ============================================================================

/**
 * Assess risk for one user at one point in time. Never throws; malformed
 * records are skipped and every score is clamped to [0, 100].
 */
export function assessRisk(
  input: RiskInput,
  config: ScoringConfig = DEFAULT_SCORING_CONFIG,
  lexicon: Lexicon = LEXICON
): RiskAssessment {
  const risk = config.risk;
  const now = input.now?.getTime() ?? Date.now();
  const excluded = new Set(input.retractedRecordIds ?? []);
  const records = input.records ?? [];

  const longWindow = windowRecords(records, excluded, now - risk.longWindowDays * DAY_MS, risk.maxRecords);
  const shortSince = now - risk.shortWindowDays * DAY_MS;
  const shortWindow = longWindow.filter(entry => entry.time >= shortSince);

  const danger = computeDanger(longWindow, input.currentText ?? '', config, lexicon);
  const stress = computeStress(shortWindow, danger.hopelessCount, config, lexicon);
  const burnout = computeBurnout(longWindow, input.profile?.personalNotes ?? '', config, lexicon);

  const currentTurnTriggered =
    danger.currentTextHit || raisedByCurrentRecord(longWindow, danger, input.currentRecordId, config, lexicon);

  return {
    scores: {
      stress: stress.stress,
      burnout: burnout.burnout,
      danger: danger.danger,
    },
    reasons: {
      stress: stress.reason,
      burnout: burnout.reason,
      danger: danger.reason,
    },
    crisisDetected: danger.crisisDetected,
    dangerRecordIds: danger.signalIds,
    currentTurnTriggered,
    trends: {
      shortTerm: computeTrend(shortWindow.map(entry => entry.severity), risk.trendDelta),
      longTerm: computeTrend(longWindow.map(entry => entry.severity), risk.trendDelta),
    },
  };
}
