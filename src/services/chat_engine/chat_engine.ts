/**
 * @file Chat Engine
 *
 * Orchestrates one user turn:
 *   1. Resume (or rotate) the session and log the user message
 *   2. Analyze emotion and append the record
 *   3. Chaos over this session's user messages
 *   4. Retraction check, then risk over the non-retracted log
 *   5. Advance the phase and rank suggestions
 *   6. Build the prompt context and ask the LLM for a reply,
 *      falling back to a canned reply
 *   7. Attach the crisis safety notice, store the reply and the session
 *
 * Turns for the same user run one at a time; different users never share
 * state.
 */

import { v4 as uuidv4 } from 'uuid';
import type { LLMClient } from '../llm_service/llm_providers';
import type { PromptContext } from '../llm_service/prompt_renderer';
import { renderReplyPrompt } from '../llm_service/prompt_renderer';
import type { Stores, UserProfile } from '../memory_service/models';
import { createDefaultProfile } from '../memory_service/models';
import type {
  ChaosResult,
  DangerTrigger,
  EmotionRecord,
  Message,
  Phase,
  PredictiveAnalysis,
  RiskAssessment,
  RiskScores,
  ScoringConfig,
} from '../scoring_service';
import {
  DEFAULT_SCORING_CONFIG,
  EmotionAnalyzer,
  advancePhase,
  applyRetraction,
  assessRisk,
  computeChaos,
  detectRetraction,
  predictiveAnalysis,
  raiseTrigger,
  rawPhase,
} from '../scoring_service';
import type { SessionManager } from '../session_service/session_manager';
import { applyTurn, immediateNeeds } from '../session_service/session_manager';
import type { SessionState, Trajectory } from '../session_service/models';
import type { Suggestion, SuggestionResult, UserPreferences } from '../suggestion_service';
import { DEFAULT_SUGGESTION_LIMIT, FeedbackLoop, SuggestionService } from '../suggestion_service';
import { ValidationError } from '../../utils/errors';
import { logger } from '../../utils/logger';

const DAY_MS = 24 * 60 * 60 * 1000;

export const CRISIS_SAFETY_NOTICE =
  "If you are in danger or thinking about harming yourself, please reach out now: call your local emergency number, " +
  'or contact a crisis line such as 988 (call or text, US) or Samaritans on 116 123 (UK & ROI). ' +
  "I'm not a therapist, but I'm here with you while you get support.";

export const FALLBACK_REPLY =
  "I'm having a little trouble thinking clearly right now, but I'm here with you. How can I help?";

export const MAX_MESSAGE_LENGTH = 4000;

export type ReplySource = 'llm' | 'fallback';

export interface SessionSummary {
  sessionId: string;
  topics: string[];
  trajectory: Trajectory;
  immediateNeeds: string[];
}

export interface TurnResult {
  userId: string;
  turn: number;
  reply: string;
  replySource: ReplySource;
  phase: Phase;
  previousPhase: Phase;
  scores: RiskScores;
  reasons: RiskAssessment['reasons'] & { chaos: string };
  chaos: ChaosResult;
  emotion: EmotionRecord;
  crisisDetected: boolean;
  retraction: boolean;
  trends: RiskAssessment['trends'];
  outlook: PredictiveAnalysis;
  suggestions: Suggestion[];
  safetyNotice: string | null;
  session: SessionSummary;
  timestamp: string;
}

export interface PredictionResult {
  userId: string;
  phase: Phase;
  scores: RiskScores;
  chaos: { score: number; reason: string };
  reasons: RiskAssessment['reasons'] & { chaos: string };
  crisisDetected: boolean;
  trends: RiskAssessment['trends'];
  outlook: PredictiveAnalysis;
  safetyNotice: string | null;
  timestamp: string;
}

export interface ChatEngineOptions {
  stores: Stores;
  sessions: SessionManager;
  /** Expected to be wrapped in ResilientLLMClient; null runs heuristic-only */
  llmClient?: LLMClient | null;
  config?: ScoringConfig;
  historyLimit?: number;
  suggestionLimit?: number;
  now?: () => Date;
  newId?: () => string;
}

export class ChatEngine {
  private readonly stores: Stores;
  private readonly sessions: SessionManager;
  private readonly llmClient: LLMClient | null;
  private readonly config: ScoringConfig;
  private readonly historyLimit: number;
  private readonly suggestionLimit: number;
  private readonly now: () => Date;
  private readonly newId: () => string;
  private readonly analyzer: EmotionAnalyzer;
  private readonly suggestionService: SuggestionService;
  readonly feedback: FeedbackLoop;

  /** Tail of each user's turn queue */
  private readonly queues = new Map<string, Promise<void>>();

  constructor(options: ChatEngineOptions) {
    this.stores = options.stores;
    this.sessions = options.sessions;
    this.llmClient = options.llmClient ?? null;
    this.config = options.config ?? DEFAULT_SCORING_CONFIG;
    this.historyLimit = options.historyLimit ?? 10;
    this.suggestionLimit = options.suggestionLimit ?? DEFAULT_SUGGESTION_LIMIT;
    this.now = options.now ?? (() => new Date());
    this.newId = options.newId ?? uuidv4;
    this.analyzer = new EmotionAnalyzer(this.llmClient);
    this.suggestionService = new SuggestionService(this.llmClient);
    this.feedback = new FeedbackLoop(this.stores.feedback, this.now);
  }

  // ==========================================================================
  // TURN PROCESSING
  // ==========================================================================

  async processMessage(userId: string, text: string): Promise<TurnResult> {
    const errors: string[] = [];
    if (typeof userId !== 'string' || userId.trim() === '') errors.push('userId is required');
    if (typeof text !== 'string' || text.trim() === '') errors.push('message must not be empty');
    else if (text.length > MAX_MESSAGE_LENGTH) errors.push(`message must be at most ${MAX_MESSAGE_LENGTH} characters`);
    if (errors.length > 0) throw new ValidationError(errors);

    return this.serialize(userId, () => this.runTurn(userId, text));
  }

  private serialize<T>(userId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(userId) ?? Promise.resolve();
    const run = previous.then(task);
    const tail: Promise<void> = run.then(
      () => this.release(userId, tail),
      () => this.release(userId, tail)
    );
    this.queues.set(userId, tail);
    return run;
  }

  private release(userId: string, tail: Promise<void>): void {
    if (this.queues.get(userId) === tail) {
      this.queues.delete(userId);
    }
  }

  private async runTurn(userId: string, text: string): Promise<TurnResult> {
    const config = this.config;
    const now = this.now();
    const session = await this.sessions.resume(userId);
    const turn = session.turn + 1;
    const previousPhase = session.phaseState.phase;

    const history = await this.stores.chatHistory.recent(userId, this.historyLimit);
    await this.stores.chatHistory.append(userId, { text, timestamp: now.toISOString(), sender: 'user' });

    const analysis = await this.analyzer.analyze(text);
    const record: EmotionRecord = { id: this.newId(), timestamp: now.toISOString(), text, ...analysis };
    await this.stores.emotionLog.append(userId, record);

    const [profileDoc, records, preferences, alreadyRetracted] = await Promise.all([
      this.stores.profiles.get(userId),
      this.loadWindow(userId, now),
      this.feedback.getPreferences(userId),
      this.loadRetracted(userId, now),
    ]);
    const profile = profileDoc ?? createDefaultProfile(userId, now);

    const chaos = this.sessionChaos(records, session);

    // Retraction must be decided before risk so the trigger records leave the window
    const trigger = session.lastDangerTrigger;
    const retraction = detectRetraction(text, trigger, turn, config.retraction);
    let retractedRecordIds = alreadyRetracted;
    if (retraction && trigger) {
      await this.stores.retractions.append(userId, { retractedAt: now.toISOString(), recordIds: [...trigger.recordIds] });
      retractedRecordIds = union(alreadyRetracted, trigger.recordIds);
    }

    let assessment = assessRisk(
      {
        records,
        currentText: text,
        currentRecordId: record.id,
        profile,
        retractedRecordIds,
        now,
      },
      config
    );
    if (retraction) {
      assessment = applyRetraction(assessment, config.retraction);
      logger.info(`[ChatEngine] Danger signal retracted for ${userId} on turn ${turn}`);
    }

    const lastDangerTrigger = this.nextTrigger(session, assessment, turn, record.id, retraction);

    const outlook = predictiveAnalysis(assessment.scores);

    const phaseState = advancePhase(
      session.phaseState,
      { scores: assessment.scores, chaos: chaos.score, crisisDetected: assessment.crisisDetected },
      config.phase,
      { retraction }
    );
    const phase = phaseState.phase;
    if (phase !== previousPhase) {
      logger.info(`[ChatEngine] Phase ${previousPhase} -> ${phase} for ${userId}`);
    }

    const suggestions = this.suggestionService.rank(
      { phase, scores: assessment.scores, chaos: chaos.score, profile, preferences },
      this.suggestionLimit
    ).suggestions;

    const updatedSession = applyTurn(session, {
      text,
      severity: record.severity,
      phaseState,
      scores: assessment.scores,
      chaos,
      lastDangerTrigger,
      now,
    });
    const summary = summarize(updatedSession, phase, retraction);

    const context = buildPromptContext({
      profile,
      phase,
      assessment,
      chaos,
      emotion: record,
      session: summary,
      outlook,
      retractionActive: retraction,
      suggestions,
    });

    const { reply: rawReply, source } = await this.generateReply(context, history, text);
    const safetyNotice = phase === 'CRISIS' ? CRISIS_SAFETY_NOTICE : null;
    const reply = safetyNotice && !rawReply.includes(safetyNotice)
      ? `${rawReply}\n\n${safetyNotice}`
      : rawReply;

    await this.stores.chatHistory.append(userId, {
      text: reply,
      timestamp: this.now().toISOString(),
      sender: 'assistant',
    });
    await this.sessions.save(updatedSession);

    return {
      userId,
      turn,
      reply,
      replySource: source,
      phase,
      previousPhase,
      scores: assessment.scores,
      reasons: { ...assessment.reasons, chaos: chaos.reason },
      chaos,
      emotion: record,
      crisisDetected: assessment.crisisDetected,
      retraction,
      trends: assessment.trends,
      outlook,
      suggestions,
      safetyNotice,
      session: summary,
      timestamp: now.toISOString(),
    };
  }

  private loadWindow(userId: string, now: Date): Promise<EmotionRecord[]> {
    return this.stores.emotionLog.list(userId, {
      since: new Date(now.getTime() - this.config.risk.longWindowDays * DAY_MS),
      limit: this.config.risk.maxRecords,
    });
  }

  private loadRetracted(userId: string, now: Date): Promise<string[]> {
    return this.stores.retractions.recordIds(
      userId,
      new Date(now.getTime() - this.config.risk.longWindowDays * DAY_MS)
    );
  }

  private sessionChaos(records: readonly EmotionRecord[], session: SessionState): ChaosResult {
    const started = Date.parse(session.startedAt);
    const samples = records
      .filter(record => Number.isNaN(started) || Date.parse(record.timestamp) >= started)
      .map(record => ({ text: record.text, tags: record.tags }));
    return computeChaos(samples, this.config.chaos);
  }

  /**
   * Trigger to carry into the next turn. A new signal takes over the old
   * trigger's records while those are still retractable; a trigger that can
   * no longer be retracted is dropped.
   */
  private nextTrigger(
    session: SessionState,
    assessment: RiskAssessment,
    turn: number,
    recordId: string,
    retraction: boolean
  ): DangerTrigger | null {
    if (retraction) return null;
    const trigger =
      raiseTrigger(assessment, turn, recordId, session.lastDangerTrigger, this.config.retraction) ??
      session.lastDangerTrigger;
    if (trigger && turn + 1 - trigger.turn > this.config.retraction.lookbackTurns) {
      return null;
    }
    return trigger;
  }

  private async generateReply(
    context: PromptContext,
    history: readonly Message[],
    text: string
  ): Promise<{ reply: string; source: ReplySource }> {
    if (!this.llmClient) {
      return { reply: FALLBACK_REPLY, source: 'fallback' };
    }
    try {
      const reply = (await this.llmClient.complete(renderReplyPrompt(context, history, text), {
        temperature: 0.7,
        maxTokens: 400,
      })).trim();
      if (reply) return { reply, source: 'llm' };
      logger.warn('[ChatEngine] Empty LLM reply, using fallback reply');
    } catch (error) {
      logger.warn('[ChatEngine] LLM reply failed, using fallback reply', error);
    }
    return { reply: FALLBACK_REPLY, source: 'fallback' };
  }

  // ==========================================================================
  // STANDALONE QUERIES
  // ==========================================================================

  /**
   * Current risk picture without processing a message. Reads the session
   * but never advances it.
   */
  async getPredictions(userId: string): Promise<PredictionResult> {
    const now = this.now();
    const [session, records, profile, retractedRecordIds] = await Promise.all([
      this.sessions.peek(userId),
      this.loadWindow(userId, now),
      this.stores.profiles.get(userId),
      this.loadRetracted(userId, now),
    ]);

    const assessment = assessRisk(
      {
        records,
        profile,
        retractedRecordIds,
        now,
      },
      this.config
    );
    const chaos = session
      ? this.sessionChaos(records, session)
      : computeChaos([], this.config.chaos);

    const phase = session
      ? session.phaseState.phase
      : rawPhase({ scores: assessment.scores, chaos: chaos.score, crisisDetected: assessment.crisisDetected }, this.config.phase);

    return {
      userId,
      phase,
      scores: assessment.scores,
      chaos: { score: chaos.score, reason: chaos.reason },
      reasons: { ...assessment.reasons, chaos: chaos.reason },
      crisisDetected: assessment.crisisDetected,
      trends: assessment.trends,
      outlook: predictiveAnalysis(assessment.scores),
      safetyNotice: phase === 'CRISIS' ? CRISIS_SAFETY_NOTICE : null,
      timestamp: now.toISOString(),
    };
  }

  /**
   * Suggestions for the user's current state, personalised by the LLM when
   * one is configured and the user is not in CRISIS.
   */
  async getSuggestions(userId: string, limit: number = this.suggestionLimit): Promise<SuggestionResult & { safetyNotice: string | null }> {
    const [predictions, session, profileDoc, preferences, records] = await Promise.all([
      this.getPredictions(userId),
      this.sessions.peek(userId),
      this.stores.profiles.get(userId),
      this.feedback.getPreferences(userId),
      this.stores.emotionLog.list(userId, { limit: 1 }),
    ]);
    const profile = profileDoc ?? createDefaultProfile(userId, this.now());
    const input = {
      phase: predictions.phase,
      scores: predictions.scores,
      chaos: predictions.chaos.score,
      profile,
      preferences,
    };

    const context = buildPromptContext({
      profile,
      phase: predictions.phase,
      assessment: { scores: predictions.scores, reasons: predictions.reasons },
      chaos: predictions.chaos,
      emotion: records[records.length - 1] ?? null,
      session: session
        ? summarize(session, predictions.phase, false)
        : { sessionId: '', topics: [], trajectory: 'steady', immediateNeeds: immediateNeeds(predictions.phase) },
      outlook: predictions.outlook,
      retractionActive: false,
      suggestions: [],
    });

    const result = await this.suggestionService.suggest(input, context, limit);
    return { ...result, safetyNotice: predictions.safetyNotice };
  }

  async getPreferences(userId: string): Promise<UserPreferences> {
    return this.feedback.getPreferences(userId);
  }
}

// ============================================================================
// HELPERS
// ============================================================================

function union(a: readonly string[], b: readonly string[]): string[] {
  return [...new Set([...a, ...b])];
}

function summarize(session: SessionState, phase: Phase, retractionActive: boolean): SessionSummary {
  return {
    sessionId: session.sessionId,
    topics: [...session.recentTopics],
    trajectory: session.trajectory,
    immediateNeeds: immediateNeeds(phase, retractionActive),
  };
}

interface ContextParts {
  profile: UserProfile;
  phase: Phase;
  assessment: Pick<RiskAssessment, 'scores' | 'reasons'>;
  chaos: { score: number; reason: string };
  emotion: EmotionRecord | null;
  session: SessionSummary;
  outlook: PredictiveAnalysis;
  retractionActive: boolean;
  suggestions: readonly Suggestion[];
}

/**
 * Structured bundle handed to the prompt renderer. Scores, phase and
 * reason strings only; no prose is composed here.
 */
export function buildPromptContext(parts: ContextParts): PromptContext {
  return {
    profile: {
      displayName: parts.profile.name.trim() || 'Friend',
      hobbies: [...parts.profile.hobbies],
      likes: [...parts.profile.likes],
      goals: [...parts.profile.goals],
    },
    phase: parts.phase,
    scores: { ...parts.assessment.scores },
    chaos: { score: parts.chaos.score, reason: parts.chaos.reason },
    emotion: parts.emotion
      ? { label: parts.emotion.label, severity: parts.emotion.severity, summary: parts.emotion.summary }
      : { label: 'neutral', severity: 0, summary: 'Neutral' },
    session: {
      topics: [...parts.session.topics],
      trajectory: parts.session.trajectory,
      immediateNeeds: [...parts.session.immediateNeeds],
    },
    reasons: {
      stress: parts.assessment.reasons.stress,
      burnout: parts.assessment.reasons.burnout,
      danger: parts.assessment.reasons.danger,
    },
    predictiveAnalysis: parts.outlook.summary,
    retractionActive: parts.retractionActive,
    suggestions: parts.suggestions.map(suggestion => ({ title: suggestion.title, reason: suggestion.reason })),
  };
}
