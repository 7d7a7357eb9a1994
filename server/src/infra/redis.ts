/**
 * redis.ts — Redis pub/sub pair for the Socket.IO adapter.
 *
 * With more than one server pod, lifecycle notifications pushed to a user's
 * personal channel (`user:<id>`) must reach sockets held by other pods. The
 * Redis adapter needs two connections: one publishing, one subscribed.
 *
 * Relay bindings themselves stay pod-local; only broadcasts cross pods.
 */
import Redis from 'ioredis';
import { logger } from '../utils/logger';

export interface RedisSettings {
  host: string;
  port: number;
  password: string | undefined;
}

export interface RedisPair {
  pub: Redis;
  sub: Redis;
}

const CONNECT_TIMEOUT_MS = 10_000;

function createClient(settings: RedisSettings, name: string): Redis {
  const client = new Redis({
    host: settings.host,
    port: settings.port,
    password: settings.password,
    maxRetriesPerRequest: null,
    lazyConnect: true,
  });
  client.on('error', (err: Error) => logger.error(`Redis ${name} error`, { error: err.message }));
  return client;
}

async function connectWithTimeout(client: Redis, name: string): Promise<void> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new Error(`${name} connection timeout`)), CONNECT_TIMEOUT_MS);
  });
  try {
    await Promise.race([client.connect(), timeout]);
    logger.info(`Redis ${name} connected`);
  } finally {
    clearTimeout(timer);
  }
}

export async function connectRedisPair(settings: RedisSettings): Promise<RedisPair> {
  const pub = createClient(settings, 'publisher');
  const sub = createClient(settings, 'subscriber');
  try {
    await Promise.all([connectWithTimeout(pub, 'publisher'), connectWithTimeout(sub, 'subscriber')]);
  } catch (err) {
    pub.disconnect();
    sub.disconnect();
    throw err;
  }
  return { pub, sub };
}

export async function disconnectRedisPair(pair: RedisPair): Promise<void> {
  const results = await Promise.allSettled([pair.pub.quit(), pair.sub.quit()]);
  for (const result of results) {
    if (result.status === 'rejected') {
      logger.warn('Redis quit failed', { error: String(result.reason) });
    }
  }
}
