/**
 * @file Process-local store implementations. Used in tests and when no
 * database is configured; contents are lost on restart.
 */

import type { EmotionRecord, Message } from '../scoring_service/models';
import type { FeedbackEntry } from '../suggestion_service/models';
import type {
  ChatHistoryStore,
  EmotionLogQuery,
  EmotionLogStore,
  FeedbackStore,
  ProfileStore,
  ProfileUpdate,
  Retraction,
  RetractionStore,
  Stores,
  UserProfile,
} from './models';
import { applyProfileUpdate, createDefaultProfile } from './models';

class UserLists<T> {
  private readonly lists = new Map<string, T[]>();

  push(userId: string, item: T): void {
    const list = this.lists.get(userId);
    if (list) {
      list.push(item);
    } else {
      this.lists.set(userId, [item]);
    }
  }

  all(userId: string): T[] {
    return [...(this.lists.get(userId) ?? [])];
  }

  retain(userId: string, keep: (item: T) => boolean): void {
    const list = this.lists.get(userId);
    if (list) {
      this.lists.set(userId, list.filter(keep));
    }
  }
}

export class InMemoryEmotionLogStore implements EmotionLogStore {
  private readonly records = new UserLists<EmotionRecord>();

  async append(userId: string, record: EmotionRecord): Promise<void> {
    this.records.push(userId, { ...record, tags: [...record.tags] });
  }

  async list(userId: string, query: EmotionLogQuery = {}): Promise<EmotionRecord[]> {
    const since = query.since?.getTime();
    const matching = this.records
      .all(userId)
      .filter(record => since === undefined || Date.parse(record.timestamp) >= since)
      .map(record => ({ ...record, tags: [...record.tags] }));
    if (query.limit === undefined) return matching;
    return query.limit > 0 ? matching.slice(-query.limit) : [];
  }
}

export class InMemoryProfileStore implements ProfileStore {
  private readonly profiles = new Map<string, UserProfile>();

  async get(userId: string): Promise<UserProfile | null> {
    const profile = this.profiles.get(userId);
    return profile ? { ...profile } : null;
  }

  async upsert(userId: string, update: ProfileUpdate): Promise<UserProfile> {
    const current = this.profiles.get(userId) ?? createDefaultProfile(userId);
    const next = applyProfileUpdate(current, update);
    this.profiles.set(userId, next);
    return { ...next };
  }
}

export class InMemoryChatHistoryStore implements ChatHistoryStore {
  private readonly messages = new UserLists<Message>();

  async append(userId: string, message: Message): Promise<void> {
    this.messages.push(userId, { ...message });
  }

  async recent(userId: string, limit: number): Promise<Message[]> {
    if (limit <= 0) return [];
    return this.messages.all(userId).slice(-limit);
  }
}

export class InMemoryFeedbackStore implements FeedbackStore {
  private readonly entries = new UserLists<FeedbackEntry>();

  async append(userId: string, entry: FeedbackEntry): Promise<void> {
    this.entries.push(userId, { ...entry });
  }

  async list(userId: string): Promise<FeedbackEntry[]> {
    return this.entries.all(userId);
  }
}

export class InMemoryRetractionStore implements RetractionStore {
  private readonly retractions = new UserLists<Retraction>();

  async append(userId: string, retraction: Retraction): Promise<void> {
    this.retractions.push(userId, { ...retraction, recordIds: [...retraction.recordIds] });
  }

  async recordIds(userId: string, since: Date): Promise<string[]> {
    const cutoff = since.getTime();
    this.retractions.retain(userId, retraction => Date.parse(retraction.retractedAt) >= cutoff);
    const ids = this.retractions.all(userId).flatMap(retraction => retraction.recordIds);
    return [...new Set(ids)];
  }
}

export function createInMemoryStores(): Stores {
  return {
    emotionLog: new InMemoryEmotionLogStore(),
    profiles: new InMemoryProfileStore(),
    chatHistory: new InMemoryChatHistoryStore(),
    feedback: new InMemoryFeedbackStore(),
    retractions: new InMemoryRetractionStore(),
  };
}
