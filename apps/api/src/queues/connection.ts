// =====================================================
// Redis Connection for BullMQ
// =====================================================
// Lazily created connections shared by the rank sync queue
// (producer) and its worker.

import { Redis, RedisOptions } from 'ioredis';
import { config } from '../config';
import { logger } from '../utils/logger';

// ===========================================
// Connection Configuration
// ===========================================

const DEFAULT_REDIS_URL = 'redis://localhost:6379';

function usesRedisUrl(): boolean {
  return Boolean(config.redis.url) && config.redis.url !== DEFAULT_REDIS_URL;
}

export function getRedisOptions(): RedisOptions {
  const baseOptions: RedisOptions = {
    maxRetriesPerRequest: null, // Required by BullMQ
    enableReadyCheck: false,
    retryStrategy: (times: number) => {
      if (times > 10) {
        logger.error('Redis connection failed after 10 retries');
        return null;
      }
      const delay = Math.min(times * 100, 3000);
      logger.warn(`Redis connection retry #${times} in ${delay}ms`);
      return delay;
    },
  };

  if (usesRedisUrl()) {
    return baseOptions;
  }

  return {
    ...baseOptions,
    host: config.redis.host,
    port: config.redis.port,
    password: config.redis.password,
  };
}

function createConnection(label: string): Redis {
  const options = getRedisOptions();
  const redis = usesRedisUrl() ? new Redis(config.redis.url, options) : new Redis(options);

  redis.on('connect', () => {
    logger.info(`Redis ${label} connection established`);
  });

  redis.on('error', (err) => {
    logger.error(`Redis ${label} connection error:`, err);
  });

  return redis;
}

// ===========================================
// Singleton Connections
// ===========================================

let queueConnection: Redis | null = null;
let workerConnection: Redis | null = null;

export function getQueueConnection(): Redis {
  if (!queueConnection) {
    queueConnection = createConnection('queue');
  }
  return queueConnection;
}

/**
 * Workers block on Redis, so they get their own connection.
 */
export function getWorkerConnection(): Redis {
  if (!workerConnection) {
    workerConnection = createConnection('worker');
  }
  return workerConnection;
}

export async function closeRedisConnections(): Promise<void> {
  const closing: Promise<void>[] = [];

  if (queueConnection) {
    const redis = queueConnection;
    queueConnection = null;
    closing.push(redis.quit().then(() => logger.info('Redis queue connection closed')));
  }

  if (workerConnection) {
    const redis = workerConnection;
    workerConnection = null;
    closing.push(redis.quit().then(() => logger.info('Redis worker connection closed')));
  }

  await Promise.all(closing);
}
