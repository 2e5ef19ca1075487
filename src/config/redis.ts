import Redis from 'ioredis';
import { logger } from '../utils/logger';

const REDIS_URL = process.env.REDIS_URL || 'redis://localhost:6379';

/**
 * Shared connection for the BullMQ queue and worker. BullMQ requires
 * `maxRetriesPerRequest: null` on connections used by workers.
 */
export const redis = new Redis(REDIS_URL, {
  maxRetriesPerRequest: null,
  retryStrategy: (times) => {
    if (process.env.NODE_ENV === 'test') {
      return null;
    }
    const delay = Math.min(times * 50, 2000);
    return delay;
  },
  reconnectOnError: (err) => {
    logger.error('Redis connection error', { error: err.message });
    return process.env.NODE_ENV !== 'test';
  },
  lazyConnect: process.env.NODE_ENV === 'test',
});

redis.on('connect', () => {
  logger.info('Redis connected');
});

redis.on('error', (err) => {
  logger.error('Redis error', { error: err.message });
});

redis.on('close', () => {
  logger.warn('Redis connection closed');
});

export async function closeRedisConnection() {
  await redis.quit();
}
