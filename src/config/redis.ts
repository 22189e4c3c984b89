/**
 * @file Redis client factory.
 */

import { createClient } from 'redis';
import { logger } from '../utils/logger';

export type RedisClient = ReturnType<typeof createClient>;

export async function connectRedis(url: string): Promise<RedisClient> {
  const client = createClient({ url });
  client.on('error', (error: unknown) => {
    logger.error('[Redis] Client error', error);
  });
  await client.connect();
  logger.info('[Redis] Connected');
  return client;
}
