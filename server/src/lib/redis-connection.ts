/**
 * Redis connection for the BullMQ queue and worker
 */

import Redis from 'ioredis';

const RETRY_DELAY_MIN_MS = 500;
const RETRY_DELAY_MAX_MS = 10000;

export function createRedisConnection(redisUrl: string): Redis {
  const connection = new Redis(redisUrl, {
    // Required by BullMQ for blocking commands
    maxRetriesPerRequest: null,
    retryStrategy: (times) => Math.min(times * RETRY_DELAY_MIN_MS, RETRY_DELAY_MAX_MS),
    reconnectOnError: (err) => err.message.includes('READONLY'),
    enableReadyCheck: true,
    enableOfflineQueue: true
  });

  connection.on('error', (err) => {
    console.error('[BullMQ Redis] Connection error:', err.message);
  });

  connection.on('reconnecting', () => {
    console.log('[BullMQ Redis] Reconnecting...');
  });

  connection.on('connect', () => {
    console.log('[BullMQ Redis] Connected');
  });

  connection.on('close', () => {
    console.warn('[BullMQ Redis] Connection closed');
  });

  return connection;
}
