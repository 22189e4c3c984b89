/**
 * @file MongoDB collections and indexes for the engine's stores.
 */

import { Db, IndexSpecification, MongoServerError } from 'mongodb';
import { logger } from '../../utils/logger';

export const COLLECTIONS = {
  emotionLogs: 'emotion_logs',
  profiles: 'profiles',
  chatHistory: 'chat_history',
  feedback: 'suggestion_feedback',
  retractions: 'retractions',
} as const;

interface CollectionConfig {
  name: string;
  indexes: Array<{
    spec: IndexSpecification;
    options?: { unique?: boolean; sparse?: boolean; expireAfterSeconds?: number };
  }>;
}

const ENGINE_COLLECTIONS: CollectionConfig[] = [
  {
    name: COLLECTIONS.emotionLogs,
    indexes: [
      // Windowed risk queries
      { spec: { userId: 1, timestamp: -1 } },
      { spec: { id: 1 }, options: { unique: true } },
    ],
  },
  {
    name: COLLECTIONS.profiles,
    indexes: [
      { spec: { userId: 1 }, options: { unique: true } },
    ],
  },
  {
    name: COLLECTIONS.chatHistory,
    indexes: [
      { spec: { userId: 1, timestamp: -1 } },
    ],
  },
  {
    name: COLLECTIONS.feedback,
    indexes: [
      { spec: { userId: 1, timestamp: 1 } },
      { spec: { suggestionId: 1 } },
    ],
  },
  {
    name: COLLECTIONS.retractions,
    indexes: [
      { spec: { userId: 1, retractedAt: 1 } },
    ],
  },
];

// Index already exists / exists with different options
const INDEX_CONFLICT_CODES = new Set([85, 86]);

/**
 * Create missing collections and indexes. Safe to run on every start.
 */
export async function setupDatabase(db: Db): Promise<void> {
  for (const config of ENGINE_COLLECTIONS) {
    await ensureCollection(db, config);
  }
  logger.info('[Database] Engine collections and indexes ready');
}

async function ensureCollection(db: Db, config: CollectionConfig): Promise<void> {
  const existing = await db.listCollections({ name: config.name }).toArray();
  if (existing.length === 0) {
    await db.createCollection(config.name);
    logger.info(`[Database] Created collection: ${config.name}`);
  }

  const collection = db.collection(config.name);
  for (const index of config.indexes) {
    try {
      await collection.createIndex(index.spec, index.options ?? {});
    } catch (error) {
      if (error instanceof MongoServerError && typeof error.code === 'number' && INDEX_CONFLICT_CODES.has(error.code)) {
        logger.debug(`[Database] Index on ${config.name} already present`);
        continue;
      }
      throw error;
    }
  }
}
