/**
 * @file MongoDB-backed stores. One document per record/message/entry,
 * keyed by userId; see database.ts for indexes.
 */

import type { Collection, Db, WithId } from 'mongodb';
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
import { createDefaultProfile } from './models';
import { COLLECTIONS } from './database';

type UserScoped<T> = T & { userId: string };

// ============================================================================
// DOCUMENT MAPPING
// ============================================================================

function toEmotionRecord(doc: WithId<UserScoped<EmotionRecord>>): EmotionRecord {
  return {
    id: doc.id,
    timestamp: doc.timestamp,
    text: doc.text,
    label: doc.label,
    severity: doc.severity,
    stability: doc.stability,
    tags: Array.isArray(doc.tags) ? doc.tags : [],
    summary: doc.summary,
    source: doc.source,
  };
}

function toMessage(doc: WithId<UserScoped<Message>>): Message {
  return { text: doc.text, timestamp: doc.timestamp, sender: doc.sender };
}

function toFeedbackEntry(doc: WithId<UserScoped<FeedbackEntry>>): FeedbackEntry {
  const entry: FeedbackEntry = {
    timestamp: doc.timestamp,
    suggestionId: doc.suggestionId,
    action: doc.action,
  };
  if (doc.rating !== undefined) entry.rating = doc.rating;
  if (doc.category !== undefined) entry.category = doc.category;
  if (doc.difficulty !== undefined) entry.difficulty = doc.difficulty;
  return entry;
}

function toProfile(doc: WithId<UserProfile>): UserProfile {
  return {
    userId: doc.userId,
    name: doc.name,
    hobbies: doc.hobbies,
    likes: doc.likes,
    goals: doc.goals,
    triggers: doc.triggers,
    personalNotes: doc.personalNotes,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

// ============================================================================
// STORES
// ============================================================================

export class MongoEmotionLogStore implements EmotionLogStore {
  private readonly collection: Collection<UserScoped<EmotionRecord>>;

  constructor(db: Db) {
    this.collection = db.collection<UserScoped<EmotionRecord>>(COLLECTIONS.emotionLogs);
  }

  async append(userId: string, record: EmotionRecord): Promise<void> {
    await this.collection.insertOne({ ...record, userId });
  }

  async list(userId: string, query: EmotionLogQuery = {}): Promise<EmotionRecord[]> {
    const filter = query.since
      ? { userId, timestamp: { $gte: query.since.toISOString() } }
      : { userId };
    let cursor = this.collection.find(filter).sort({ timestamp: -1, _id: -1 });
    if (query.limit !== undefined) {
      if (query.limit <= 0) return [];
      cursor = cursor.limit(query.limit);
    }
    const docs = await cursor.toArray();
    return docs.reverse().map(toEmotionRecord);
  }
}

export class MongoProfileStore implements ProfileStore {
  private readonly collection: Collection<UserProfile>;

  constructor(db: Db) {
    this.collection = db.collection<UserProfile>(COLLECTIONS.profiles);
  }

  async get(userId: string): Promise<UserProfile | null> {
    const doc = await this.collection.findOne({ userId });
    return doc ? toProfile(doc) : null;
  }

  async upsert(userId: string, update: ProfileUpdate): Promise<UserProfile> {
    const now = new Date();
    const defaults = createDefaultProfile(userId, now);
    const onInsert: Partial<UserProfile> = { userId, createdAt: defaults.createdAt };
    // Defaults only for fields this update does not set
    if (update.name === undefined) onInsert.name = defaults.name;
    if (update.hobbies === undefined) onInsert.hobbies = defaults.hobbies;
    if (update.likes === undefined) onInsert.likes = defaults.likes;
    if (update.goals === undefined) onInsert.goals = defaults.goals;
    if (update.triggers === undefined) onInsert.triggers = defaults.triggers;
    if (update.personalNotes === undefined) onInsert.personalNotes = defaults.personalNotes;

    const doc = await this.collection.findOneAndUpdate(
      { userId },
      { $set: { ...update, updatedAt: now.toISOString() }, $setOnInsert: onInsert },
      { upsert: true, returnDocument: 'after' }
    );
    if (!doc) {
      throw new Error(`Profile upsert for ${userId} returned no document`);
    }
    return toProfile(doc);
  }
}

export class MongoChatHistoryStore implements ChatHistoryStore {
  private readonly collection: Collection<UserScoped<Message>>;

  constructor(db: Db) {
    this.collection = db.collection<UserScoped<Message>>(COLLECTIONS.chatHistory);
  }

  async append(userId: string, message: Message): Promise<void> {
    await this.collection.insertOne({ ...message, userId });
  }

  async recent(userId: string, limit: number): Promise<Message[]> {
    if (limit <= 0) return [];
    const docs = await this.collection
      .find({ userId })
      .sort({ timestamp: -1, _id: -1 })
      .limit(limit)
      .toArray();
    return docs.reverse().map(toMessage);
  }
}

export class MongoFeedbackStore implements FeedbackStore {
  private readonly collection: Collection<UserScoped<FeedbackEntry>>;

  constructor(db: Db) {
    this.collection = db.collection<UserScoped<FeedbackEntry>>(COLLECTIONS.feedback);
  }

  async append(userId: string, entry: FeedbackEntry): Promise<void> {
    await this.collection.insertOne({ ...entry, userId });
  }

  async list(userId: string): Promise<FeedbackEntry[]> {
    const docs = await this.collection.find({ userId }).sort({ timestamp: 1, _id: 1 }).toArray();
    return docs.map(toFeedbackEntry);
  }
}

export class MongoRetractionStore implements RetractionStore {
  private readonly collection: Collection<UserScoped<Retraction>>;

  constructor(db: Db) {
    this.collection = db.collection<UserScoped<Retraction>>(COLLECTIONS.retractions);
  }

  async append(userId: string, retraction: Retraction): Promise<void> {
    await this.collection.insertOne({ ...retraction, userId });
  }

  async recordIds(userId: string, since: Date): Promise<string[]> {
    const cutoff = since.toISOString();
    await this.collection.deleteMany({ userId, retractedAt: { $lt: cutoff } });
    const docs = await this.collection.find({ userId, retractedAt: { $gte: cutoff } }).toArray();
    const ids = docs.flatMap(doc => (Array.isArray(doc.recordIds) ? doc.recordIds : []));
    return [...new Set(ids)];
  }
}

export function createMongoStores(db: Db): Stores {
  return {
    emotionLog: new MongoEmotionLogStore(db),
    profiles: new MongoProfileStore(db),
    chatHistory: new MongoChatHistoryStore(db),
    feedback: new MongoFeedbackStore(db),
    retractions: new MongoRetractionStore(db),
  };
}
