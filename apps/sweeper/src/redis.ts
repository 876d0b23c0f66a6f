import { Redis } from 'ioredis';

export type RedisConnectionOptions = {
  url: string;
};

/** `localhost` is rewritten to 127.0.0.1 so IPv6-first resolvers don't miss a local Redis. */
export function normalizeRedisUrl(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.hostname === 'localhost') {
      parsed.hostname = '127.0.0.1';
      return parsed.toString();
    }
  } catch {
    // Not a URL; hand it to ioredis as-is.
  }
  return url;
}

export function createRedisConnection(options: RedisConnectionOptions): Redis {
  const redis = new Redis(normalizeRedisUrl(options.url), {
    // BullMQ workers need blocking commands without a retry cap.
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
  });

  redis.on('error', (err: Error) => {
    // eslint-disable-next-line no-console
    console.error('[redis] connection error', { err: err.message });
  });

  return redis;
}
