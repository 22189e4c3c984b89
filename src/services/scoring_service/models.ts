/**
 * @file Data models for the scoring pipeline.
 * Emotion records, risk scores, chaos results, phase state and the
 * tunable constants every scorer reads.
 */

// ============================================================================
// CONVERSATION
// ============================================================================

export type Sender = 'user' | 'assistant';

/**
 * A single chat message. Immutable once logged.
 */
export interface Message {
  text: string;
  timestamp: string;          // ISO8601
  sender: Sender;
}

// ============================================================================
// EMOTION
// ============================================================================

export type EmotionSource = 'heuristic' | 'llm';

/**
 * One entry of a user's emotion log. Appended, never mutated.
 */
export interface EmotionRecord {
  id: string;
  timestamp: string;          // ISO8601
  text: string;               // The message that was scored
  label: string;              // Dominant emotion, e.g. 'anxiety', 'neutral'
  severity: number;           // 0-10
  stability: number;          // 0-10, 10 = very stable
  tags: string[];
  summary: string;
  source: EmotionSource;
}

/**
 * Output of emotion analysis before it is stamped with id/timestamp.
 */
export interface EmotionAnalysis {
  label: string;
  severity: number;
  stability: number;
  tags: string[];
  summary: string;
  source: EmotionSource;
}

// ============================================================================
// SCORES
// ============================================================================

export interface RiskScores {
  stress: number;             // 0-100
  burnout: number;            // 0-100
  danger: number;             // 0-100
}

export type Trend = 'improving' | 'stable' | 'declining';

export interface RiskAssessment {
  scores: RiskScores;
  reasons: {
    stress: string;
    burnout: string;
    danger: string;
  };
  /** Explicit danger term found, forces CRISIS */
  crisisDetected: boolean;
  /** Records that contributed to danger (keyword, spike or hopelessness) */
  dangerRecordIds: string[];
  /** True when the current message itself carried a danger signal */
  currentTurnTriggered: boolean;
  trends: {
    shortTerm: Trend;         // 7 days
    longTerm: Trend;          // 30 days
  };
}

export type ChaosFactor = 'topic_volatility' | 'length_variance' | 'contradiction';

export interface ChaosResult {
  score: number;              // 0-100
  reason: string;
  dominantFactor: ChaosFactor | null;
  components: Record<ChaosFactor, number>;
}

/**
 * A user message paired with the emotion tags it was scored with.
 */
export interface ChaosSample {
  text: string;
  tags: readonly string[];
}

// ============================================================================
// PHASE
// ============================================================================

export const PHASES = ['STABLE', 'AT_RISK', 'HURT', 'CRISIS'] as const;
export type Phase = typeof PHASES[number];

export interface PhaseState {
  phase: Phase;
  /** Consecutive turns whose raw tier sat below `phase` */
  calmStreak: number;
  /** Highest raw tier seen during the current calm streak */
  pendingPhase: Phase | null;
}

export interface DangerTrigger {
  turn: number;
  recordIds: string[];
}

// ============================================================================
// CONFIGURATION
// ============================================================================

export interface ChaosConfig {
  windowSize: number;
  minMessages: number;
  topicChangeSaturation: number;
  lengthStdDevSaturation: number;
  pointsPerContradiction: number;
  weights: Record<ChaosFactor, number>;
  highThreshold: number;
  moderateThreshold: number;
}

export interface RiskConfig {
  shortWindowDays: number;
  longWindowDays: number;
  maxRecords: number;
  stressBaseline: number;
  burnoutBaseline: number;
  stressSeverityScale: number;
  stressVolatilityWeight: number;
  stressTagWeight: number;
  consecutiveHighSeverity: number;
  consecutiveHighCount: number;
  consecutiveHighPenalty: number;
  burnoutTagRatioWeight: number;
  burnoutTrendPenalty: number;
  burnoutWorkloadPenalty: number;
  dangerKeywordFloor: number;
  spikeSeverity: number;
  spikeFloor: number;
  spikeWeight: number;
  hopelessDangerWeight: number;
  hopelessStressWeight: number;
  trendDelta: number;
}

export interface RetractionConfig {
  lookbackTurns: number;
  safeDangerFloor: number;
}

export interface PhaseConfig {
  crisisDanger: number;
  hurt: number;
  atRisk: number;
  chaosAtRisk: number;
  hysteresisTurns: number;
}

export interface ScoringConfig {
  chaos: ChaosConfig;
  risk: RiskConfig;
  retraction: RetractionConfig;
  phase: PhaseConfig;
}

export const DEFAULT_SCORING_CONFIG: ScoringConfig = {
  chaos: {
    windowSize: 5,
    minMessages: 2,
    topicChangeSaturation: 3,
    lengthStdDevSaturation: 50,
    pointsPerContradiction: 40,
    weights: {
      topic_volatility: 0.4,
      contradiction: 0.4,
      length_variance: 0.2,
    },
    highThreshold: 70,
    moderateThreshold: 40,
  },
  risk: {
    shortWindowDays: 7,
    longWindowDays: 30,
    maxRecords: 50,
    stressBaseline: 20,
    burnoutBaseline: 10,
    stressSeverityScale: 9,
    stressVolatilityWeight: 10,
    stressTagWeight: 5,
    consecutiveHighSeverity: 6,
    consecutiveHighCount: 3,
    consecutiveHighPenalty: 15,
    burnoutTagRatioWeight: 50,
    burnoutTrendPenalty: 20,
    burnoutWorkloadPenalty: 15,
    dangerKeywordFloor: 100,
    spikeSeverity: 8,
    spikeFloor: 40,
    spikeWeight: 20,
    hopelessDangerWeight: 15,
    hopelessStressWeight: 5,
    trendDelta: 1.5,
  },
  retraction: {
    lookbackTurns: 1,
    safeDangerFloor: 20,
  },
  phase: {
    crisisDanger: 80,
    hurt: 60,
    atRisk: 40,
    chaosAtRisk: 70,
    hysteresisTurns: 3,
  },
};

/**
 * Deep-merge partial overrides onto the defaults.
 */
export function resolveScoringConfig(overrides: ScoringConfigOverrides = {}): ScoringConfig {
  return {
    chaos: {
      ...DEFAULT_SCORING_CONFIG.chaos,
      ...overrides.chaos,
      weights: { ...DEFAULT_SCORING_CONFIG.chaos.weights, ...overrides.chaos?.weights },
    },
    risk: { ...DEFAULT_SCORING_CONFIG.risk, ...overrides.risk },
    retraction: { ...DEFAULT_SCORING_CONFIG.retraction, ...overrides.retraction },
    phase: { ...DEFAULT_SCORING_CONFIG.phase, ...overrides.phase },
  };
}

export interface ScoringConfigOverrides {
  chaos?: Partial<Omit<ChaosConfig, 'weights'>> & { weights?: Partial<ChaosConfig['weights']> };
  risk?: Partial<RiskConfig>;
  retraction?: Partial<RetractionConfig>;
  phase?: Partial<PhaseConfig>;
}

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Clamp to [min, max]; NaN collapses to min.
 */
export function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min;
  return Math.min(max, Math.max(min, value));
}

/**
 * Integer score in [0, 100]. The epsilon keeps 56.99999999999999 at 57.
 */
export function clampScore(value: number): number {
  return Math.floor(clamp(value + 1e-9, 0, 100));
}

export function clampSeverity(value: number): number {
  return clamp(value, 0, 10);
}
