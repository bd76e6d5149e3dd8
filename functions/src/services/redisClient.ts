/**
 * Shared Redis client for the due cache. Created lazily on first use so that
 * importing modules never opens a connection.
 */
import { Redis } from 'ioredis';
import * as functions from 'firebase-functions';
import { redisConfig } from '../config';

let client: Redis | null = null;

export function getRedis(): Redis {
  if (!client) {
    client = new Redis(redisConfig.url, {
      lazyConnect: true,
      maxRetriesPerRequest: 2,
    });
    client.on('error', (error) => {
      functions.logger.error('[Redis] Connection error:', error);
    });
  }

  return client;
}
