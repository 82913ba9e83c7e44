import Bottleneck from 'bottleneck'
import winston from 'winston'
import {
  NotFoundError,
  RateLimitedError,
  TransientNetworkError,
} from '../domain/errors'
import { PostMetrics, SubredditInfo } from '../domain/types'
import { createLogger } from '../logging/logger'
import { PlatformAdapter } from '../platforms/PlatformAdapter'
import { FetchOutcome, TrackerMetrics } from '../telemetry/TrackerMetrics'

export const RATE_LIMIT_COOLDOWN_MS = 60_000
const MINUTE_MS = 60_000

export interface MetricsFetcherOptions {
  callsPerMinute: number
  rateLimitCooldownMs?: number
  limiter?: Bottleneck
  sleep?: (ms: number) => Promise<void>
  logger?: winston.Logger
  telemetry?: TrackerMetrics
}

const wait = (ms: number): Promise<void> =>
  new Promise(resolve => setTimeout(resolve, ms))

// One reservoir shared by every caller: once the minute's budget is
// spent, further calls queue until it refills.
export function createFetchLimiter(
  callsPerMinute: number,
  logger?: winston.Logger,
): Bottleneck {
  const limiter = new Bottleneck({
    maxConcurrent: 1,
    reservoir: callsPerMinute,
    reservoirRefreshAmount: callsPerMinute,
    reservoirRefreshInterval: MINUTE_MS,
  })

  limiter.on('depleted', () => {
    logger?.info('Fetch budget for this minute spent, queueing requests')
  })

  return limiter
}

export class MetricsFetcher {
  private limiter: Bottleneck
  private cooldownMs: number
  private sleep: (ms: number) => Promise<void>
  private logger: winston.Logger
  private telemetry?: TrackerMetrics

  constructor(
    private platform: PlatformAdapter,
    options: MetricsFetcherOptions,
  ) {
    this.logger = options.logger ?? createLogger('metrics-fetcher')
    this.limiter =
      options.limiter ?? createFetchLimiter(options.callsPerMinute, this.logger)
    this.cooldownMs = options.rateLimitCooldownMs ?? RATE_LIMIT_COOLDOWN_MS
    this.sleep = options.sleep ?? wait
    this.telemetry = options.telemetry
  }

  /**
   * Current score, comment count and upvote ratio of a post. A rate-limit
   * answer is retried once after the cooldown; any other failure, or a
   * second rate-limit answer, reaches the caller.
   */
  fetch(subreddit: string, postId: string): Promise<PostMetrics> {
    return this.withRetry(`r/${subreddit} post ${postId}`, () =>
      this.platform.getPostMetrics(subreddit, postId),
    )
  }

  fetchSubredditInfo(name: string): Promise<SubredditInfo> {
    return this.withRetry(`r/${name}`, () => this.platform.getSubredditInfo(name))
  }

  async stop(): Promise<void> {
    await this.limiter.stop({ dropWaitingJobs: true })
  }

  private async withRetry<T>(what: string, call: () => Promise<T>): Promise<T> {
    try {
      return await this.throttled(call)
    } catch (error) {
      if (!(error instanceof RateLimitedError)) throw error

      this.logger.warn(`Rate limited on ${what}, retrying once`, {
        cooldownMs: this.cooldownMs,
      })
      await this.sleep(this.cooldownMs)
      this.telemetry?.rateLimitRetryCounter.inc()
      return this.throttled(call)
    }
  }

  private throttled<T>(call: () => Promise<T>): Promise<T> {
    return this.limiter.schedule(async () => {
      const endTimer = this.telemetry?.fetchLatency.startTimer()
      try {
        const result = await call()
        this.record('success')
        return result
      } catch (error) {
        this.record(outcomeOf(error))
        throw error
      } finally {
        endTimer?.()
      }
    })
  }

  private record(outcome: FetchOutcome): void {
    this.telemetry?.fetchCounter.inc({ outcome })
  }
}

function outcomeOf(error: unknown): FetchOutcome {
  if (error instanceof RateLimitedError) return 'rate_limited'
  if (error instanceof NotFoundError) return 'not_found'
  if (error instanceof TransientNetworkError) return 'transient'
  return 'error'
}
