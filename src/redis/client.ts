import Redis from 'ioredis';
import { env } from '../env';
import { log } from '../log';

export type RedisClient = Redis;

let singleton: Redis | null = null;

export function createRedisClient(url: string = env.REDIS_URL): Redis {
  const client = new Redis(url, {
    maxRetriesPerRequest: 2,
    enableReadyCheck: true,
    lazyConnect: true,
  });

  client.on('ready', () => {
    log.info({ event: 'redis_ready' }, 'redis ready');
  });

  client.on('error', (error) => {
    log.error({ err: error, event: 'redis_error' }, 'redis error');
  });

  client.on('end', () => {
    log.warn({ event: 'redis_end' }, 'redis connection ended');
  });

  return client;
}

/** Lazily created; the first command opens the connection. */
export function getRedisClient(): Redis {
  if (!singleton) {
    singleton = createRedisClient();
  }

  return singleton;
}

export async function closeRedisClient(): Promise<void> {
  const client = singleton;
  singleton = null;
  if (!client || client.status === 'end') {
    return;
  }
  try {
    await client.quit();
  } catch (error) {
    log.warn({ err: error, event: 'redis_quit_failed' }, 'redis quit failed');
    client.disconnect();
  }
}
