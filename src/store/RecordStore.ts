import path from 'path'
import Bottleneck from 'bottleneck'
import winston from 'winston'
import { z } from 'zod'
import {
  CorruptStoreError,
  DuplicateUrlError,
  NotFoundError,
  errorMessage,
} from '../domain/errors'
import {
  postRecordSchema,
  reportMetaSchema,
  reportSchema,
  subredditProfileSchema,
} from '../domain/schemas'
import { normalizeSubreddit, profileKey } from '../domain/subreddit'
import {
  PostMetrics,
  PostRecord,
  PostStatus,
  Report,
  StoredReport,
  SubredditProfile,
} from '../domain/types'
import { createLogger } from '../logging/logger'
import { readFileIfExists, writeFileAtomic } from './files'
import { JsonCollection, RepairResult } from './JsonCollection'

export type CollectionName = 'posts' | 'profiles'

export const POSTS_FILE = 'posted-log.json'
export const PROFILES_FILE = 'subreddit-profiles.json'
export const REPORTS_DIR = 'reports'

export class RecordStore {
  private posts: JsonCollection<PostRecord>
  private profiles: JsonCollection<SubredditProfile>
  private reportLocks = new Bottleneck.Group({ maxConcurrent: 1 })
  private logger: winston.Logger

  constructor(
    readonly memoryDir: string,
    logger?: winston.Logger,
  ) {
    this.logger = logger ?? createLogger('record-store')
    this.posts = new JsonCollection(
      path.join(memoryDir, POSTS_FILE),
      postRecordSchema,
      record => [`url:${record.url}`, `id:${record.id}`],
      this.logger,
    )
    this.profiles = new JsonCollection(
      path.join(memoryDir, PROFILES_FILE),
      subredditProfileSchema,
      profile => [profileKey(profile.name)],
      this.logger,
    )
  }

  async append(record: PostRecord): Promise<PostRecord> {
    const stored = await this.posts.transact(items => {
      if (items.some(item => item.url === record.url || item.id === record.id)) {
        throw new DuplicateUrlError(record.url)
      }
      return { items: [...items, record], result: record }
    })
    this.logger.info('Post logged', { id: stored.id, subreddit: stored.subreddit })
    return stored
  }

  async list(): Promise<ReadonlyArray<Readonly<PostRecord>>> {
    const items = await this.posts.read()
    return Object.freeze(items.map(item => Object.freeze(item)))
  }

  async get(id: string): Promise<PostRecord> {
    const items = await this.posts.read()
    const record = items.find(item => item.id === id)
    if (!record) {
      throw new NotFoundError(`Post ${id} is not logged`, 'record')
    }
    return record
  }

  /**
   * Overwrites the metrics of one post. An update stamped before the
   * stored `lastChecked` is dropped so metrics never move backwards.
   */
  updateMetrics(
    id: string,
    metrics: PostMetrics,
    checkedAt: Date,
  ): Promise<PostRecord> {
    return this.posts.transact(items => {
      const index = this.indexOf(items, id)
      const current = items[index]

      if (
        current.lastChecked !== null &&
        Date.parse(current.lastChecked) > checkedAt.getTime()
      ) {
        return { result: current }
      }

      const next: PostRecord = {
        ...current,
        title: current.title || metrics.title || '',
        score: metrics.score,
        commentCount: metrics.commentCount,
        upvoteRatio: metrics.upvoteRatio,
        lastChecked: checkedAt.toISOString(),
      }
      return { items: replaceAt(items, index, next), result: next }
    })
  }

  markUnreachable(id: string, at: Date): Promise<PostRecord> {
    return this.posts.transact(items => {
      const index = this.indexOf(items, id)
      const current = items[index]
      if (current.status === PostStatus.UNREACHABLE) {
        return { result: current }
      }

      const next: PostRecord = {
        ...current,
        status: PostStatus.UNREACHABLE,
        unreachableSince: at.toISOString(),
      }
      return { items: replaceAt(items, index, next), result: next }
    })
  }

  upsertProfile(profile: SubredditProfile): Promise<SubredditProfile> {
    return this.updateProfile(profile.name, () => profile)
  }

  /**
   * Looks up the profile for `name` and stores what `update` derives from
   * it, within one transaction on the profiles file.
   */
  updateProfile(
    name: string,
    update: (existing: SubredditProfile | undefined) => SubredditProfile,
  ): Promise<SubredditProfile> {
    const key = profileKey(name)

    return this.profiles.transact(items => {
      const index = items.findIndex(item => profileKey(item.name) === key)
      const updated = update(index === -1 ? undefined : items[index])
      const stored: SubredditProfile = {
        ...updated,
        name: normalizeSubreddit(updated.name),
      }
      const next = index === -1 ? [...items, stored] : replaceAt(items, index, stored)
      return { items: next, result: stored }
    })
  }

  async listProfiles(): Promise<ReadonlyArray<Readonly<SubredditProfile>>> {
    const items = await this.profiles.read()
    return Object.freeze(items.map(item => Object.freeze(item)))
  }

  async getProfile(name: string): Promise<SubredditProfile | undefined> {
    const key = profileKey(name)
    const items = await this.profiles.read()
    return items.find(item => profileKey(item.name) === key)
  }

  saveReport(
    report: Report,
    markdown: string,
    generatedAt: Date,
  ): Promise<StoredReport> {
    return this.reportLocks.key(report.period).schedule(async () => {
      const base = this.reportPath(report.period)
      await writeFileAtomic(`${base}.json`, JSON.stringify(report, null, 2) + '\n')
      await writeFileAtomic(`${base}.md`, markdown)
      await writeFileAtomic(
        `${base}.meta.json`,
        JSON.stringify(
          { period: report.period, generatedAt: generatedAt.toISOString() },
          null,
          2,
        ) + '\n',
      )
      return { report, markdown, generatedAt: generatedAt.toISOString() }
    })
  }

  async readReport(period: string): Promise<StoredReport> {
    const base = this.reportPath(period)
    const [rawReport, markdown, rawMeta] = await Promise.all([
      readFileIfExists(`${base}.json`),
      readFileIfExists(`${base}.md`),
      readFileIfExists(`${base}.meta.json`),
    ])
    if (rawReport === null || markdown === null || rawMeta === null) {
      throw new NotFoundError(`No report generated for ${period}`, 'report')
    }

    const report = parseJsonFile(`${base}.json`, rawReport, reportSchema)
    const meta = parseJsonFile(`${base}.meta.json`, rawMeta, reportMetaSchema)
    return { report, markdown, generatedAt: meta.generatedAt }
  }

  repair(collection: CollectionName, now?: Date): Promise<RepairResult> {
    return collection === 'posts'
      ? this.posts.repair(now)
      : this.profiles.repair(now)
  }

  private reportPath(period: string): string {
    return path.join(this.memoryDir, REPORTS_DIR, period)
  }

  private indexOf(items: PostRecord[], id: string): number {
    const index = items.findIndex(item => item.id === id)
    if (index === -1) {
      throw new NotFoundError(`Post ${id} is not logged`, 'record')
    }
    return index
  }
}

function replaceAt<T>(items: T[], index: number, item: T): T[] {
  const next = [...items]
  next[index] = item
  return next
}

function parseJsonFile<T>(
  filePath: string,
  raw: string,
  schema: z.ZodType<T>,
): T {
  let data: unknown
  try {
    data = JSON.parse(raw)
  } catch (error) {
    throw new CorruptStoreError(filePath, `unparsable JSON (${errorMessage(error)})`)
  }
  const parsed = schema.safeParse(data)
  if (!parsed.success) {
    throw new CorruptStoreError(filePath, 'content does not match the report shape')
  }
  return parsed.data
}
