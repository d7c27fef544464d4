/**
 * Redis connection for the shared burst counters.
 *
 * Commands fail fast instead of queueing while disconnected so the burst
 * limiter can switch to its in-process fallback without stalling requests.
 */

import { Redis } from 'ioredis';
import { logger } from '@/utils/logger';
import type { ScriptRunner } from '@/services/counterStore';

export interface RedisClientOptions {
  url: string;
  keyPrefix: string;
  commandTimeoutMs: number;
}

export function createRedisClient(options: RedisClientOptions): Redis {
  const client = new Redis(options.url, {
    keyPrefix: options.keyPrefix,
    commandTimeout: options.commandTimeoutMs,
    enableOfflineQueue: false,
    maxRetriesPerRequest: 1,
    retryStrategy: (attempt) => Math.min(attempt * 200, 5_000),
  });

  client.on('error', (err) => {
    logger.warn('Redis connection error', { error: String(err) });
  });
  client.on('ready', () => {
    logger.info('Redis connection ready');
  });

  return client;
}

export function redisScriptRunner(client: Redis): ScriptRunner {
  return {
    eval: (script, numKeys, ...args) => client.eval(script, numKeys, ...args),
  };
}

export async function closeRedis(client: Redis): Promise<void> {
  try {
    await client.quit();
  } catch (err) {
    logger.warn('Redis quit failed, disconnecting', { error: String(err) });
    client.disconnect();
  }
}
