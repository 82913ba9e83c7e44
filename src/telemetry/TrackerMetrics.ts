import promClient from 'prom-client'

export type FetchOutcome =
  | 'success'
  | 'rate_limited'
  | 'not_found'
  | 'transient'
  | 'error'

export class TrackerMetrics {
  readonly register: promClient.Registry

  readonly fetchCounter: promClient.Counter<'outcome'>
  readonly rateLimitRetryCounter: promClient.Counter
  readonly refreshCounter: promClient.Counter<'result'>
  readonly postsLoggedCounter: promClient.Counter
  readonly reportsCounter: promClient.Counter
  readonly fetchLatency: promClient.Histogram

  constructor(register: promClient.Registry = new promClient.Registry()) {
    this.register = register

    this.fetchCounter = new promClient.Counter({
      name: 'reddit_fetch_total',
      help: 'Outbound Reddit reads by outcome',
      labelNames: ['outcome'] as const,
      registers: [register],
    })

    this.rateLimitRetryCounter = new promClient.Counter({
      name: 'reddit_rate_limit_retries_total',
      help: 'Retries performed after a rate-limit cooldown',
      registers: [register],
    })

    this.refreshCounter = new promClient.Counter({
      name: 'refresh_records_total',
      help: 'Records handled by refresh passes',
      labelNames: ['result'] as const,
      registers: [register],
    })

    this.postsLoggedCounter = new promClient.Counter({
      name: 'posts_logged_total',
      help: 'Posts recorded in the log',
      registers: [register],
    })

    this.reportsCounter = new promClient.Counter({
      name: 'reports_generated_total',
      help: 'Monthly reports generated',
      registers: [register],
    })

    this.fetchLatency = new promClient.Histogram({
      name: 'reddit_fetch_latency_seconds',
      help: 'Latency of outbound Reddit reads, excluding queueing',
      buckets: [0.1, 0.5, 1, 2, 5, 15],
      registers: [register],
    })
  }
}
