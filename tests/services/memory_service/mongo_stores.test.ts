/**
 * @file Tests for the MongoDB stores
 *
 * The client is never connected. Cursor and collection calls are stubbed on
 * the driver's prototypes, so the stores run their real queries and mapping
 * against canned documents.
 */

import { AbstractCursor, Collection, FindCursor, MongoClient, ObjectId } from 'mongodb';
import {
  MongoChatHistoryStore,
  MongoEmotionLogStore,
  MongoFeedbackStore,
  MongoProfileStore,
  MongoRetractionStore,
} from '../../../src/services/memory_service/mongo_stores';
import type { EmotionRecord } from '../../../src/services/scoring_service/models';

const NOW = new Date('2026-03-02T09:00:00.000Z');

function emotionDoc(id: string, timestamp: string, tags: unknown = ['calm']) {
  return {
    _id: new ObjectId(),
    userId: 'user-1',
    id,
    timestamp,
    text: `text ${id}`,
    label: 'neutral',
    severity: 0,
    stability: 10,
    tags,
    summary: '',
    source: 'heuristic',
  };
}

describe('Mongo stores', () => {
  const client = new MongoClient('mongodb://127.0.0.1:27017');
  const db = client.db('steadypulse_test');

  let toArray: jest.SpyInstance;
  let insertOne: jest.SpyInstance;

  beforeEach(() => {
    jest.useFakeTimers({ now: NOW });
    toArray = jest.spyOn(AbstractCursor.prototype, 'toArray').mockResolvedValue([]);
    insertOne = jest
      .spyOn(Collection.prototype, 'insertOne')
      .mockResolvedValue({ acknowledged: true, insertedId: new ObjectId() });
  });

  afterEach(() => {
    jest.restoreAllMocks();
    jest.useRealTimers();
  });

  describe('emotion log', () => {
    it('should store the record under its user', async () => {
      const record: EmotionRecord = {
        id: 'a',
        timestamp: '2026-03-01T10:00:00.000Z',
        text: 'text a',
        label: 'neutral',
        severity: 0,
        stability: 10,
        tags: ['calm'],
        summary: '',
        source: 'heuristic',
      };

      await new MongoEmotionLogStore(db).append('user-1', record);

      expect(insertOne).toHaveBeenCalledWith({ ...record, userId: 'user-1' });
    });

    it('should query newest first and return the page oldest first', async () => {
      const find = jest.spyOn(Collection.prototype, 'find');
      const sort = jest.spyOn(FindCursor.prototype, 'sort');
      const limit = jest.spyOn(FindCursor.prototype, 'limit');
      toArray.mockResolvedValue([
        emotionDoc('c', '2026-03-01T12:00:00.000Z'),
        emotionDoc('b', '2026-03-01T11:00:00.000Z', 'not-a-list'),
      ]);

      const records = await new MongoEmotionLogStore(db).list('user-1', {
        since: new Date('2026-03-01T11:00:00.000Z'),
        limit: 2,
      });

      expect(find).toHaveBeenCalledWith({ userId: 'user-1', timestamp: { $gte: '2026-03-01T11:00:00.000Z' } });
      expect(sort).toHaveBeenCalledWith({ timestamp: -1, _id: -1 });
      expect(limit).toHaveBeenCalledWith(2);
      expect(records.map(record => record.id)).toEqual(['b', 'c']);
      expect(records[0]).toEqual({
        id: 'b',
        timestamp: '2026-03-01T11:00:00.000Z',
        text: 'text b',
        label: 'neutral',
        severity: 0,
        stability: 10,
        tags: [],
        summary: '',
        source: 'heuristic',
      });
    });

    it('should not query for an empty page', async () => {
      const find = jest.spyOn(Collection.prototype, 'find');

      expect(await new MongoEmotionLogStore(db).list('user-1', { limit: 0 })).toEqual([]);
      expect(toArray).not.toHaveBeenCalled();
      expect(find).toHaveBeenCalledWith({ userId: 'user-1' });
    });
  });

  describe('profiles', () => {
    it('should default only the fields the update leaves out on insert', async () => {
      const stored = {
        _id: new ObjectId(),
        userId: 'user-1',
        name: 'Sam',
        hobbies: ['hiking'],
        likes: [],
        goals: [],
        triggers: [],
        personalNotes: '',
        createdAt: NOW.toISOString(),
        updatedAt: NOW.toISOString(),
      };
      const findOneAndUpdate = jest.spyOn(Collection.prototype, 'findOneAndUpdate').mockResolvedValue(stored);

      const profile = await new MongoProfileStore(db).upsert('user-1', { name: 'Sam', hobbies: ['hiking'] });

      expect(findOneAndUpdate).toHaveBeenCalledWith(
        { userId: 'user-1' },
        {
          $set: { name: 'Sam', hobbies: ['hiking'], updatedAt: '2026-03-02T09:00:00.000Z' },
          $setOnInsert: {
            userId: 'user-1',
            createdAt: '2026-03-02T09:00:00.000Z',
            likes: [],
            goals: [],
            triggers: [],
            personalNotes: '',
          },
        },
        { upsert: true, returnDocument: 'after' }
      );
      const { _id, ...expected } = stored;
      expect(_id).toBeInstanceOf(ObjectId);
      expect(profile).toEqual(expected);
    });

    it('should fail when the upsert returns no document', async () => {
      jest.spyOn(Collection.prototype, 'findOneAndUpdate').mockResolvedValue(null);

      await expect(new MongoProfileStore(db).upsert('user-1', { likes: ['tea'] })).rejects.toThrow(
        'Profile upsert for user-1 returned no document'
      );
    });

    it('should return null for an unknown user', async () => {
      jest.spyOn(Collection.prototype, 'findOne').mockResolvedValue(null);

      expect(await new MongoProfileStore(db).get('user-9')).toBeNull();
    });
  });

  describe('chat history', () => {
    it('should return the latest messages oldest first without storage fields', async () => {
      const limit = jest.spyOn(FindCursor.prototype, 'limit');
      toArray.mockResolvedValue([
        { _id: new ObjectId(), userId: 'user-1', text: 'three', timestamp: '2026-03-01T12:00:00.000Z', sender: 'assistant' },
        { _id: new ObjectId(), userId: 'user-1', text: 'two', timestamp: '2026-03-01T11:00:00.000Z', sender: 'user' },
      ]);

      const messages = await new MongoChatHistoryStore(db).recent('user-1', 2);

      expect(limit).toHaveBeenCalledWith(2);
      expect(messages).toEqual([
        { text: 'two', timestamp: '2026-03-01T11:00:00.000Z', sender: 'user' },
        { text: 'three', timestamp: '2026-03-01T12:00:00.000Z', sender: 'assistant' },
      ]);
    });
  });

  describe('feedback', () => {
    it('should leave unset optional fields off the entry', async () => {
      toArray.mockResolvedValue([
        { _id: new ObjectId(), userId: 'user-1', timestamp: '2026-03-01T10:00:00.000Z', suggestionId: 's-1', action: 'accepted' },
        {
          _id: new ObjectId(),
          userId: 'user-1',
          timestamp: '2026-03-01T11:00:00.000Z',
          suggestionId: 's-2',
          action: 'completed',
          rating: 4,
        },
      ]);

      const entries = await new MongoFeedbackStore(db).list('user-1');

      expect(entries).toEqual([
        { timestamp: '2026-03-01T10:00:00.000Z', suggestionId: 's-1', action: 'accepted' },
        { timestamp: '2026-03-01T11:00:00.000Z', suggestionId: 's-2', action: 'completed', rating: 4 },
      ]);
      expect(Object.keys(entries[0])).toEqual(['timestamp', 'suggestionId', 'action']);
    });
  });

  describe('retractions', () => {
    it('should drop entries before the cutoff and return distinct record ids', async () => {
      const deleteMany = jest
        .spyOn(Collection.prototype, 'deleteMany')
        .mockResolvedValue({ acknowledged: true, deletedCount: 1 });
      const find = jest.spyOn(Collection.prototype, 'find');
      toArray.mockResolvedValue([
        { _id: new ObjectId(), userId: 'user-1', retractedAt: '2026-02-20T10:00:00.000Z', recordIds: ['r1', 'r2'] },
        { _id: new ObjectId(), userId: 'user-1', retractedAt: '2026-02-25T10:00:00.000Z', recordIds: ['r2', 'r3'] },
      ]);

      const ids = await new MongoRetractionStore(db).recordIds('user-1', new Date('2026-02-01T00:00:00.000Z'));

      expect(deleteMany).toHaveBeenCalledWith({ userId: 'user-1', retractedAt: { $lt: '2026-02-01T00:00:00.000Z' } });
      expect(find).toHaveBeenCalledWith({ userId: 'user-1', retractedAt: { $gte: '2026-02-01T00:00:00.000Z' } });
      expect(ids).toEqual(['r1', 'r2', 'r3']);
    });

    it('should store the retraction under its user', async () => {
      await new MongoRetractionStore(db).append('user-1', {
        retractedAt: '2026-03-01T10:00:00.000Z',
        recordIds: ['r1'],
      });

      expect(insertOne).toHaveBeenCalledWith({
        retractedAt: '2026-03-01T10:00:00.000Z',
        recordIds: ['r1'],
        userId: 'user-1',
      });
    });
  });
});
