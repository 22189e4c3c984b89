/**
 * @file MongoDB connection with startup retries.
 */

import { Db, MongoClient } from 'mongodb';
import { logger } from '../utils/logger';

export interface MongoConnection {
  client: MongoClient;
  db: Db;
}

export interface ConnectOptions {
  maxRetries?: number;
  retryDelayMs?: number;
}

const sleep = (ms: number): Promise<void> =>
  new Promise(resolve => {
    setTimeout(resolve, ms);
  });

export async function connectMongo(
  uri: string,
  dbName: string,
  options: ConnectOptions = {}
): Promise<MongoConnection> {
  const maxRetries = options.maxRetries ?? 5;
  const retryDelayMs = options.retryDelayMs ?? 2000;

  for (let attempt = 1; ; attempt++) {
    const client = new MongoClient(uri);
    try {
      await client.connect();
      logger.info(`[Database] Connected to MongoDB (${dbName})`);
      return { client, db: client.db(dbName) };
    } catch (error) {
      await client.close();
      if (attempt >= maxRetries) {
        throw error;
      }
      logger.warn(`[Database] Connection attempt ${attempt} failed, retrying in ${retryDelayMs}ms`, error);
      await sleep(retryDelayMs);
    }
  }
}
