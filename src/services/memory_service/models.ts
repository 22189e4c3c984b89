/**
 * @file User profile model and the store contracts the engine depends on.
 * Scoring never touches a concrete store; it receives data through these
 * interfaces.
 */

import type { EmotionRecord, Message } from '../scoring_service/models';
import type { FeedbackEntry } from '../suggestion_service/models';

export interface UserProfile {
  userId: string;
  name: string;
  hobbies: string[];
  likes: string[];
  goals: string[];
  triggers: string[];
  personalNotes: string;
  createdAt: string;          // ISO8601
  updatedAt: string;          // ISO8601
}

export type ProfileUpdate = Partial<Pick<UserProfile, 'name' | 'hobbies' | 'likes' | 'goals' | 'triggers' | 'personalNotes'>>;

export function createDefaultProfile(userId: string, now: Date = new Date()): UserProfile {
  const timestamp = now.toISOString();
  return {
    userId,
    name: '',
    hobbies: [],
    likes: [],
    goals: [],
    triggers: [],
    personalNotes: '',
    createdAt: timestamp,
    updatedAt: timestamp,
  };
}

export function applyProfileUpdate(profile: UserProfile, update: ProfileUpdate, now: Date = new Date()): UserProfile {
  return {
    ...profile,
    ...update,
    userId: profile.userId,
    createdAt: profile.createdAt,
    updatedAt: now.toISOString(),
  };
}

// ============================================================================
// STORE CONTRACTS
// ============================================================================

export interface EmotionLogQuery {
  /** Only records at or after this instant */
  since?: Date;
  /** Most recent N records */
  limit?: number;
}

/**
 * Append-only, per-user, returned oldest first.
 */
export interface EmotionLogStore {
  append(userId: string, record: EmotionRecord): Promise<void>;
  list(userId: string, query?: EmotionLogQuery): Promise<EmotionRecord[]>;
}

export interface ProfileStore {
  get(userId: string): Promise<UserProfile | null>;
  upsert(userId: string, update: ProfileUpdate): Promise<UserProfile>;
}

export interface ChatHistoryStore {
  append(userId: string, message: Message): Promise<void>;
  /** Last `limit` messages, oldest first */
  recent(userId: string, limit: number): Promise<Message[]>;
}

export interface FeedbackStore {
  append(userId: string, entry: FeedbackEntry): Promise<void>;
  list(userId: string): Promise<FeedbackEntry[]>;
}

/**
 * Records a user withdrew as a joke. Kept beside the emotion log rather than
 * in the session, so they outlive session expiry.
 */
export interface Retraction {
  retractedAt: string;        // ISO8601
  recordIds: string[];
}

export interface RetractionStore {
  append(userId: string, retraction: Retraction): Promise<void>;
  /**
   * Ids retracted at or after `since`. Older retractions can only cover
   * records that have left every risk window, so they are discarded.
   */
  recordIds(userId: string, since: Date): Promise<string[]>;
}

export interface Stores {
  emotionLog: EmotionLogStore;
  profiles: ProfileStore;
  chatHistory: ChatHistoryStore;
  feedback: FeedbackStore;
  retractions: RetractionStore;
}
