import winston from 'winston'
import {
  NotFoundError,
  RateLimitedError,
  TransientNetworkError,
  ValidationError,
  errorMessage,
} from '../domain/errors'
import { PostRecord, PostStatus, RefreshSummary } from '../domain/types'
import { EventBus, EventType } from '../events/EventBus'
import { createLogger } from '../logging/logger'
import { MetricsFetcher } from '../metrics/MetricsFetcher'
import { RecordStore } from '../store/RecordStore'
import { TrackerMetrics } from '../telemetry/TrackerMetrics'
import { DEFAULT_STALE_AFTER_MS, isDue } from './StalenessPolicy'

export interface RefreshOptions {
  // Refresh every active record regardless of staleness
  force?: boolean
}

export interface RefreshOrchestratorOptions {
  staleAfterMs?: number
  clock?: () => Date
  logger?: winston.Logger
  eventBus?: EventBus
  telemetry?: TrackerMetrics
}

type RecordOutcome = 'updated' | 'unreachable' | 'transient' | 'rate_limited'

export class RefreshOrchestrator {
  // Records currently being refreshed by some pass of this orchestrator
  private claimed = new Set<string>()
  private staleAfterMs: number
  private clock: () => Date
  private logger: winston.Logger
  private eventBus?: EventBus
  private telemetry?: TrackerMetrics

  constructor(
    private store: RecordStore,
    private fetcher: Pick<MetricsFetcher, 'fetch'>,
    options: RefreshOrchestratorOptions = {},
  ) {
    this.staleAfterMs = options.staleAfterMs ?? DEFAULT_STALE_AFTER_MS
    this.clock = options.clock ?? (() => new Date())
    this.logger = options.logger ?? createLogger('refresh')
    this.eventBus = options.eventBus
    this.telemetry = options.telemetry
  }

  /**
   * One pass over every due record. Updates are written record by record,
   * so a pass that stops early keeps what it already applied. A rate-limit
   * failure ends the pass; transient failures only skip their record.
   */
  async refresh(options: RefreshOptions = {}): Promise<RefreshSummary> {
    const now = this.clock()
    const records = await this.store.list()
    const due = records.filter(record =>
      options.force
        ? record.status === PostStatus.ACTIVE
        : isDue(record, now, this.staleAfterMs),
    )

    const summary: RefreshSummary = {
      checked: records.length,
      due: due.length,
      updated: 0,
      skippedTransient: 0,
      markedUnreachable: 0,
      rateLimitAborted: 0,
      inFlightElsewhere: 0,
      aborted: false,
    }

    const owned = due.filter(record => {
      if (this.claimed.has(record.id)) {
        summary.inFlightElsewhere += 1
        return false
      }
      this.claimed.add(record.id)
      return true
    })

    try {
      for (const [index, record] of owned.entries()) {
        const outcome = await this.refreshOne(record)
        this.telemetry?.refreshCounter.inc({ result: outcome })

        if (outcome === 'rate_limited') {
          summary.aborted = true
          summary.rateLimitAborted = owned.length - index
          break
        }
        if (outcome === 'updated') summary.updated += 1
        if (outcome === 'unreachable') summary.markedUnreachable += 1
        if (outcome === 'transient') summary.skippedTransient += 1
      }
    } finally {
      owned.forEach(record => this.claimed.delete(record.id))
    }

    this.logger.info('Refresh pass finished', { ...summary })
    await this.eventBus?.emit(
      summary.aborted
        ? { type: EventType.REFRESH_ABORTED, payload: summary }
        : { type: EventType.METRICS_REFRESHED, payload: summary },
    )
    return summary
  }

  private async refreshOne(record: Readonly<PostRecord>): Promise<RecordOutcome> {
    try {
      const metrics = await this.fetcher.fetch(record.subreddit, record.id)
      await this.store.updateMetrics(record.id, metrics, this.clock())
      return 'updated'
    } catch (error) {
      if (error instanceof RateLimitedError) {
        this.logger.warn('Rate limit persisted after retry, halting pass', {
          id: record.id,
        })
        return 'rate_limited'
      }
      if (error instanceof NotFoundError && error.kind === 'upstream') {
        const marked = await this.store.markUnreachable(record.id, this.clock())
        this.logger.warn('Post no longer available upstream', {
          id: record.id,
          reason: error.message,
        })
        await this.eventBus?.emit({ type: EventType.POST_UNREACHABLE, payload: marked })
        return 'unreachable'
      }
      if (error instanceof TransientNetworkError) {
        this.logger.warn('Skipping post after network error', {
          id: record.id,
          error: errorMessage(error),
        })
        return 'transient'
      }
      if (error instanceof ValidationError) {
        this.logger.warn('Skipping post with metrics the store rejects', {
          id: record.id,
          error: errorMessage(error),
        })
        return 'transient'
      }
      throw error
    }
  }
}
