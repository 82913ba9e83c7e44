import path from 'path'
import winston from 'winston'

export interface TrackerConfig {
  port: number
  logLevel: string
  memoryDir: string
  staleAfterMs: number
  fetch: {
    baseUrl: string
    userAgent: string
    timeoutMs: number
    callsPerMinute: number
    rateLimitCooldownMs: number
  }
  refresh: {
    redisUrl?: string
    intervalMs: number
  }
  planning: {
    postsPerDay: number
    minDaysBetween: number
  }
}

type Env = Record<string, string | undefined>

const HOUR_MS = 60 * 60 * 1000

function intFrom(env: Env, key: string, fallback: number): number {
  const raw = env[key]
  if (raw === undefined || raw === '') return fallback
  const value = parseInt(raw, 10)
  if (Number.isNaN(value) || value < 0) {
    throw new Error(`Environment variable ${key} must be a non-negative integer`)
  }
  return value
}

export function loadConfig(env: Env = process.env): TrackerConfig {
  return {
    port: intFrom(env, 'PORT', 3000),
    logLevel: env.LOG_LEVEL || 'info',
    memoryDir: path.resolve(env.MEMORY_DIR || 'memory'),
    staleAfterMs: intFrom(env, 'STALE_AFTER_HOURS', 48) * HOUR_MS,
    fetch: {
      baseUrl: env.REDDIT_BASE_URL || 'https://www.reddit.com',
      userAgent: env.REDDIT_USER_AGENT || 'post-tracker/0.1 (personal use)',
      timeoutMs: intFrom(env, 'FETCH_TIMEOUT_MS', 15000),
      callsPerMinute: Math.max(1, intFrom(env, 'FETCH_CALLS_PER_MINUTE', 30)),
      rateLimitCooldownMs: intFrom(env, 'RATE_LIMIT_COOLDOWN_MS', 60000),
    },
    refresh: {
      redisUrl: env.REDIS_URL || undefined,
      intervalMs: intFrom(env, 'REFRESH_INTERVAL_MS', 6 * HOUR_MS),
    },
    planning: {
      postsPerDay: intFrom(env, 'POSTS_PER_DAY', 3),
      minDaysBetween: intFrom(env, 'MIN_DAYS_BETWEEN_POSTS', 4),
    },
  }
}

export function validateEnv(logger: winston.Logger, env: Env = process.env): void {
  const recommended = ['MEMORY_DIR', 'REDDIT_USER_AGENT', 'REDIS_URL']

  const missing = recommended.filter(key => !env[key])
  if (missing.length > 0) {
    logger.warn(`Missing environment variables: ${missing.join(', ')}`)
  }
}
