import { z } from 'zod';

const intFromEnv = (fallback: number, min: number, max = Number.MAX_SAFE_INTEGER) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

const booleanFromEnv = (fallback: boolean) =>
  z.enum(['true', 'false']).default(fallback ? 'true' : 'false').transform((v) => v === 'true');

/**
 * Environment schema. Every variable is optional; defaults suit a local
 * Redis on the standard port.
 */
const envSchema = z.object({
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: intFromEnv(3000, 0, 65_535),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  REDIS_URL: z.string().url().default('redis://localhost:6379'),
  EVENT_BACKEND: z.enum(['redis', 'memory']).default('redis'),
  EVENT_KEY_PREFIX: z.string().min(1).default('simulation_events'),
  EVENT_TTL_SECONDS: intFromEnv(86_400 * 30, 1),
  EVENT_MAX_PER_KEY: intFromEnv(1000, 1),
  MAX_REPLAY_EVENTS: intFromEnv(10_000, 1),
  EVENT_PUBLISH: booleanFromEnv(true),
  CLEANUP_INTERVAL_SECONDS: intFromEnv(0, 0),
});

export interface AppConfig {
  host: string;
  port: number;
  logLevel: string;
  redisUrl: string;
  eventBackend: 'redis' | 'memory';
  keyPrefix: string;
  eventTtlSeconds: number;
  maxEventsPerKey: number;
  maxReplayEvents: number;
  publishEvents: boolean;
  /** 0 disables the periodic cleanup. */
  cleanupIntervalSeconds: number;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Reads configuration from the environment.
 *
 * Empty strings count as unset. Throws `ConfigError` naming every
 * invalid variable at once.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const e = parsed.data;
  return {
    host: e.HOST,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    redisUrl: e.REDIS_URL,
    eventBackend: e.EVENT_BACKEND,
    keyPrefix: e.EVENT_KEY_PREFIX,
    eventTtlSeconds: e.EVENT_TTL_SECONDS,
    maxEventsPerKey: e.EVENT_MAX_PER_KEY,
    maxReplayEvents: e.MAX_REPLAY_EVENTS,
    publishEvents: e.EVENT_PUBLISH,
    cleanupIntervalSeconds: e.CLEANUP_INTERVAL_SECONDS,
  };
}
