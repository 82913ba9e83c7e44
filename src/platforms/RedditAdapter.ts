import axios, { AxiosInstance } from 'axios'
import { z } from 'zod'
import {
  NotFoundError,
  RateLimitedError,
  TransientNetworkError,
} from '../domain/errors'
import { PostMetrics, SubredditInfo } from '../domain/types'
import { PlatformAdapter } from './PlatformAdapter'

export interface RedditConfig {
  baseUrl: string
  userAgent: string
  timeoutMs: number
}

const postListingSchema = z
  .array(
    z.object({
      data: z.object({
        children: z.array(
          z.object({
            kind: z.string(),
            data: z.object({
              id: z.string(),
              title: z.string().default(''),
              score: z.number().int(),
              num_comments: z.number().int().nonnegative(),
              upvote_ratio: z.number().min(0).max(1),
              removed_by_category: z.string().nullable().optional(),
            }),
          }),
        ),
      }),
    }),
  )
  .min(1)

const aboutSchema = z.object({
  data: z.object({
    display_name: z.string(),
    subscribers: z.number().int().nonnegative().nullable().default(0),
    active_user_count: z.number().nullable().optional(),
    public_description: z.string().default(''),
    over18: z.boolean().default(false),
  }),
})

export class RedditAdapter implements PlatformAdapter {
  readonly platform = 'reddit'
  private client: AxiosInstance | null = null

  async initialize(config: RedditConfig): Promise<void> {
    this.client = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      headers: {
        'User-Agent': config.userAgent,
        Accept: 'application/json',
      },
    })
  }

  async getPostMetrics(subreddit: string, postId: string): Promise<PostMetrics> {
    const what = `r/${subreddit} post ${postId}`
    const data = await this.get(
      `/r/${encodeURIComponent(subreddit)}/comments/${encodeURIComponent(postId)}.json`,
      what,
    )

    const parsed = postListingSchema.safeParse(data)
    if (!parsed.success) {
      throw new TransientNetworkError(`Unexpected response for ${what}`)
    }

    const post = parsed.data[0].data.children.find(child => child.kind === 't3')
    if (!post) {
      throw new NotFoundError(`${what} no longer exists`, 'upstream')
    }
    if (post.data.removed_by_category) {
      throw new NotFoundError(
        `${what} was removed (${post.data.removed_by_category})`,
        'upstream',
      )
    }

    return {
      score: post.data.score,
      commentCount: post.data.num_comments,
      upvoteRatio: post.data.upvote_ratio,
      title: post.data.title,
    }
  }

  async getSubredditInfo(name: string): Promise<SubredditInfo> {
    const what = `r/${name}`
    const data = await this.get(`/r/${encodeURIComponent(name)}/about.json`, what)

    const parsed = aboutSchema.safeParse(data)
    if (!parsed.success) {
      throw new TransientNetworkError(`Unexpected response for ${what}`)
    }

    const about = parsed.data.data
    return {
      name: about.display_name,
      subscriberCount: about.subscribers ?? 0,
      activeUsers: about.active_user_count ?? 0,
      description: about.public_description.slice(0, 300),
      over18: about.over18,
    }
  }

  private async get(path: string, what: string): Promise<unknown> {
    if (!this.client) throw new Error('Reddit client not initialized')

    try {
      const response = await this.client.get<unknown>(path)
      return response.data
    } catch (error) {
      throw translateError(error, what)
    }
  }
}

function translateError(error: unknown, what: string): Error {
  if (!axios.isAxiosError(error)) {
    return error instanceof Error ? error : new Error(String(error))
  }

  const status = error.response?.status
  if (status === 429) {
    return new RateLimitedError(`Reddit rate limited the request for ${what}`)
  }
  if (status === 403 || status === 404 || status === 410) {
    return new NotFoundError(`${what} is not available (HTTP ${status})`, 'upstream')
  }
  if (status === undefined) {
    return new TransientNetworkError(`Request for ${what} failed: ${error.message}`)
  }
  return new TransientNetworkError(`Request for ${what} failed with HTTP ${status}`)
}
