/**
 * Redis Connections
 *
 * Named ioredis connections for BullMQ, built from explicit settings.
 * Callers configure the settings once at startup; every connection opened
 * afterwards uses them.
 */

import { Redis, type RedisOptions } from 'ioredis';
import { createLogger } from '@bundlehub/orchestration';

const logger = createLogger('Redis');

export interface RedisSettings {
  /** redis://[:password@]host[:port][/db]; wins over the discrete fields */
  url?: string;
  host?: string;
  port: number;
  password?: string;
  db: number;
}

export function loadRedisSettings(env: NodeJS.ProcessEnv = process.env): RedisSettings {
  return {
    url: env.REDIS_URL || undefined,
    host: env.REDIS_HOST || undefined,
    port: parseInt(env.REDIS_PORT || '6379', 10),
    password: env.REDIS_PASSWORD || undefined,
    db: parseInt(env.REDIS_DB || '0', 10),
  };
}

export function isRedisConfigured(settings: RedisSettings): boolean {
  return Boolean(settings.url || settings.host);
}

/**
 * ioredis options for the settings. BullMQ needs `maxRetriesPerRequest: null`.
 */
export function toRedisOptions(settings: RedisSettings): RedisOptions {
  const bullmq = { maxRetriesPerRequest: null, enableReadyCheck: false };

  if (settings.url) {
    const url = new URL(settings.url);
    return {
      host: url.hostname,
      port: parseInt(url.port || '6379', 10),
      password: url.password || undefined,
      db: parseInt(url.pathname.slice(1), 10) || 0,
      ...bullmq,
    };
  }

  return {
    host: settings.host || 'localhost',
    port: settings.port,
    password: settings.password,
    db: settings.db,
    ...bullmq,
  };
}

export class RedisConnections {
  private readonly connections = new Map<string, Redis>();

  constructor(private settings: RedisSettings) {}

  /**
   * Replace the settings used for connections opened from now on.
   */
  configure(settings: RedisSettings): void {
    this.settings = settings;
  }

  getSettings(): RedisSettings {
    return { ...this.settings };
  }

  /**
   * The named connection, opened on first use or when the previous one ended.
   */
  get(name: string): Redis {
    const existing = this.connections.get(name);
    if (existing && existing.status !== 'end') {
      return existing;
    }

    const redis = new Redis(toRedisOptions(this.settings));
    const connectionLogger = logger.child(name);
    redis.on('error', (err: Error) => connectionLogger.error(`Connection error: ${err.message}`));
    redis.on('ready', () => connectionLogger.info('Ready'));

    this.connections.set(name, redis);
    return redis;
  }

  async ping(name: string): Promise<boolean> {
    try {
      return (await this.get(name).ping()) === 'PONG';
    } catch (error) {
      logger.warn(`Ping failed for ${name}: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  }

  async closeAll(): Promise<void> {
    const open = Array.from(this.connections.entries());
    this.connections.clear();
    await Promise.all(
      open.map(([name, redis]) =>
        redis.quit().catch((error: unknown) => {
          logger.warn(`Failed to close ${name}: ${error instanceof Error ? error.message : String(error)}`);
        })
      )
    );
  }
}

/**
 * Process-wide connections, configured from the environment until a
 * service calls `configureRedis`.
 */
export const redisConnections = new RedisConnections(loadRedisSettings());

export function configureRedis(settings: RedisSettings): void {
  redisConnections.configure(settings);
}

export function queueConnectionName(queueName: string): string {
  return `queue:${queueName}`;
}

export function createQueueConnection(queueName: string): Redis {
  return redisConnections.get(queueConnectionName(queueName));
}

export function createWorkerConnection(queueName: string): Redis {
  return redisConnections.get(`worker:${queueName}`);
}

export async function closeAllConnections(): Promise<void> {
  await redisConnections.closeAll();
}
