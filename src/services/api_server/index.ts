/**
 * @file Server entry point. Wires storage, sessions and the LLM client from
 * configuration, then starts listening.
 */

import type { Server } from 'http';
import type { AppConfig } from '../../config';
import { loadConfig } from '../../config';
import { connectMongo } from '../../config/database';
import { connectRedis } from '../../config/redis';
import { ChatEngine } from '../chat_engine/chat_engine';
import { createLLMClient } from '../llm_service/llm_providers';
import { ResilientLLMClient } from '../llm_service/resilient_client';
import type { Stores } from '../memory_service';
import { createInMemoryStores, createMongoStores, setupDatabase } from '../memory_service';
import type { SessionStore } from '../session_service';
import { InMemorySessionStore, RedisSessionStore, SessionManager, redisSessionCache } from '../session_service';
import { ChatController } from './chat_controller';
import { createApp } from './app';
import { logger } from '../../utils/logger';

type Closer = () => Promise<void>;

async function initializeStores(config: AppConfig, closers: Closer[]): Promise<Stores> {
  if (config.storage === 'memory') {
    logger.warn('[Server] Using in-memory storage; data is lost on restart');
    return createInMemoryStores();
  }
  const { client, db } = await connectMongo(config.mongoUri, config.mongoDbName);
  closers.push(() => client.close());
  await setupDatabase(db);
  return createMongoStores(db);
}

async function initializeSessions(config: AppConfig, closers: Closer[]): Promise<SessionStore> {
  if (config.sessionBackend === 'memory') {
    return new InMemorySessionStore();
  }
  const redis = await connectRedis(config.redisUrl);
  closers.push(async () => {
    await redis.quit();
  });
  return new RedisSessionStore(redisSessionCache(redis));
}

export async function startServer(config: AppConfig = loadConfig()): Promise<{ server: Server; close: Closer }> {
  const closers: Closer[] = [];
  const stores = await initializeStores(config, closers);
  const sessionStore = await initializeSessions(config, closers);

  const provider = createLLMClient(config.llm);
  const llmClient = provider
    ? new ResilientLLMClient(provider, { timeoutMs: config.llm.timeoutMs, maxRetries: config.llm.maxRetries })
    : null;
  if (llmClient) {
    logger.info('[Server] LLM client initialized');
  } else {
    logger.info('[Server] No LLM API key found, using heuristic mode');
  }

  const engine = new ChatEngine({
    stores,
    sessions: new SessionManager(sessionStore, { idleMinutes: config.sessionIdleMinutes }),
    llmClient,
    config: config.scoring,
  });

  const app = createApp({
    controller: new ChatController(engine, stores.profiles),
    corsOrigins: config.corsOrigins,
    health: () => ({ storage: config.storage, sessions: config.sessionBackend, llm: llmClient !== null }),
  });

  const server = await new Promise<Server>(resolve => {
    const listening = app.listen(config.port, () => resolve(listening));
  });
  logger.info(`[Server] Listening on port ${config.port}`);

  const close: Closer = async () => {
    await new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
    });
    for (const closer of closers.reverse()) {
      await closer();
    }
  };
  return { server, close };
}

if (require.main === module && process.env.NODE_ENV !== 'test') {
  startServer()
    .then(({ close }) => {
      const shutdown = (signal: string): void => {
        logger.info(`[Server] ${signal} received, shutting down`);
        close()
          .then(() => process.exit(0))
          .catch(error => {
            logger.error('[Server] Error during shutdown', error);
            process.exit(1);
          });
      };
      process.on('SIGINT', () => shutdown('SIGINT'));
      process.on('SIGTERM', () => shutdown('SIGTERM'));
    })
    .catch(error => {
      logger.error('[Server] Failed to start', error);
      process.exit(1);
    });
}
