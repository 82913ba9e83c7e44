import winston from 'winston'
import { z } from 'zod'
import { TrackerConfig } from '../config/config'
import {
  logPostInputSchema,
  parseInput,
  profileInputSchema,
} from '../domain/schemas'
import {
  PostRecord,
  PostStatus,
  PostingTarget,
  RefreshSummary,
  StoredReport,
  SubredditProfile,
} from '../domain/types'
import { DraftStore, SavedDraft } from '../drafts/DraftStore'
import { EventBus, EventType } from '../events/EventBus'
import { createLogger } from '../logging/logger'
import { MetricsFetcher } from '../metrics/MetricsFetcher'
import { RotationOptions, planTargets } from '../planning/SubredditRotation'
import { PlatformAdapter } from '../platforms/PlatformAdapter'
import { parseRedditUrl } from '../platforms/redditUrl'
import { ReportBuilder } from '../reports/ReportBuilder'
import { RepairResult } from '../store/JsonCollection'
import { RecordStore } from '../store/RecordStore'
import { TrackerMetrics } from '../telemetry/TrackerMetrics'
import { RefreshOptions, RefreshOrchestrator } from './RefreshOrchestrator'

const collectionSchema = z.enum(['posts', 'profiles'])

export interface PostTrackerDeps {
  store: RecordStore
  fetcher: MetricsFetcher
  orchestrator: RefreshOrchestrator
  reports: ReportBuilder
  drafts: DraftStore
  eventBus: EventBus
  telemetry: TrackerMetrics
  rotation: RotationOptions
  clock?: () => Date
  logger?: winston.Logger
}

export interface CreateTrackerOptions {
  eventBus?: EventBus
  telemetry?: TrackerMetrics
  clock?: () => Date
  sleep?: (ms: number) => Promise<void>
}

/**
 * Entry points used by the HTTP layer and the scheduler: log a post,
 * refresh metrics, build reports and keep subreddit profiles.
 */
export class PostTracker {
  readonly store: RecordStore
  readonly eventBus: EventBus
  readonly telemetry: TrackerMetrics
  private fetcher: MetricsFetcher
  private orchestrator: RefreshOrchestrator
  private reports: ReportBuilder
  private drafts: DraftStore
  private rotation: RotationOptions
  private clock: () => Date
  private logger: winston.Logger

  constructor(deps: PostTrackerDeps) {
    this.store = deps.store
    this.fetcher = deps.fetcher
    this.orchestrator = deps.orchestrator
    this.reports = deps.reports
    this.drafts = deps.drafts
    this.eventBus = deps.eventBus
    this.telemetry = deps.telemetry
    this.rotation = deps.rotation
    this.clock = deps.clock ?? (() => new Date())
    this.logger = deps.logger ?? createLogger('post-tracker')
  }

  static create(
    config: TrackerConfig,
    platform: PlatformAdapter,
    options: CreateTrackerOptions = {},
  ): PostTracker {
    const logger = createLogger('post-tracker', config.logLevel)
    const eventBus = options.eventBus ?? EventBus.getInstance()
    const telemetry = options.telemetry ?? new TrackerMetrics()
    const clock = options.clock ?? (() => new Date())

    const store = new RecordStore(config.memoryDir, createLogger('record-store', config.logLevel))
    const fetcher = new MetricsFetcher(platform, {
      callsPerMinute: config.fetch.callsPerMinute,
      rateLimitCooldownMs: config.fetch.rateLimitCooldownMs,
      sleep: options.sleep,
      telemetry,
      logger: createLogger('metrics-fetcher', config.logLevel),
    })

    return new PostTracker({
      store,
      fetcher,
      orchestrator: new RefreshOrchestrator(store, fetcher, {
        staleAfterMs: config.staleAfterMs,
        clock,
        eventBus,
        telemetry,
        logger: createLogger('refresh', config.logLevel),
      }),
      reports: new ReportBuilder(store, {
        clock,
        eventBus,
        telemetry,
        logger: createLogger('reports', config.logLevel),
      }),
      drafts: new DraftStore(config.memoryDir),
      eventBus,
      telemetry,
      rotation: config.planning,
      clock,
      logger,
    })
  }

  async logPost(input: unknown): Promise<PostRecord> {
    const request = parseInput(logPostInputSchema, input, 'post')
    const ref = parseRedditUrl(request.url)

    const record = await this.store.append({
      id: ref.postId,
      url: ref.url,
      subreddit: ref.subreddit,
      title: request.title ?? '',
      angle: request.angle,
      draftRef: request.draftRef ?? null,
      postedAt: this.clock().toISOString(),
      score: null,
      commentCount: null,
      upvoteRatio: null,
      lastChecked: null,
      status: PostStatus.ACTIVE,
      unreachableSince: null,
    })

    this.telemetry.postsLoggedCounter.inc()
    await this.eventBus.emit({ type: EventType.POST_LOGGED, payload: record })
    return record
  }

  listPosts(): Promise<ReadonlyArray<Readonly<PostRecord>>> {
    return this.store.list()
  }

  refreshMetrics(options: RefreshOptions = {}): Promise<RefreshSummary> {
    return this.orchestrator.refresh(options)
  }

  buildReport(period: string): Promise<StoredReport> {
    return this.reports.build(period)
  }

  readReport(period: string): Promise<StoredReport> {
    return this.reports.read(period)
  }

  async upsertProfile(input: unknown): Promise<SubredditProfile> {
    const profile = parseInput(profileInputSchema, input, 'profile')
    const stored = await this.store.upsertProfile({
      ...profile,
      lastUpdated: this.clock().toISOString(),
    })

    await this.eventBus.emit({ type: EventType.PROFILE_UPDATED, payload: stored })
    return stored
  }

  listProfiles(): Promise<ReadonlyArray<Readonly<SubredditProfile>>> {
    return this.store.listProfiles()
  }

  /**
   * Refreshes the subscriber count of a profile from the platform,
   * creating a default profile for communities not researched before.
   */
  async researchSubreddit(name: string): Promise<SubredditProfile> {
    const query = parseInput(profileInputSchema.shape.name, name, 'subreddit')
    const info = await this.fetcher.fetchSubredditInfo(query)
    const lastUpdated = this.clock().toISOString()

    const stored = await this.store.updateProfile(info.name, existing =>
      existing
        ? { ...existing, subscriberCount: info.subscriberCount, lastUpdated }
        : {
            name: info.name,
            subscriberCount: info.subscriberCount,
            activityLevel: 'medium',
            selfPromoPolicy: '',
            bestAngle: 'mixed',
            notes: info.description,
            lastUpdated,
          },
    )
    this.logger.info('Subreddit researched', {
      name: stored.name,
      subscribers: stored.subscriberCount,
    })
    await this.eventBus.emit({ type: EventType.PROFILE_UPDATED, payload: stored })
    return stored
  }

  async planTargets(today: Date = this.clock()): Promise<PostingTarget[]> {
    const [profiles, posts] = await Promise.all([
      this.store.listProfiles(),
      this.store.list(),
    ])
    return planTargets(profiles, posts, today, this.rotation)
  }

  async saveDraft(input: unknown): Promise<SavedDraft> {
    const saved = await this.drafts.save(input, this.clock())
    await this.eventBus.emit({ type: EventType.DRAFT_SAVED, payload: saved })
    return saved
  }

  async repairStore(collection: unknown): Promise<RepairResult> {
    const name = parseInput(collectionSchema, collection, 'collection')
    const result = await this.store.repair(name, this.clock())
    await this.eventBus.emit({ type: EventType.STORE_REPAIRED, payload: result })
    return result
  }

  async stop(): Promise<void> {
    await this.fetcher.stop()
  }
}
