import { PostMetrics, SubredditInfo } from '../domain/types'

/**
 * Read-only view of the platform. Implementations report failures through
 * the tracker error taxonomy: RateLimitedError when throttled,
 * NotFoundError (kind "upstream") when the post or community is gone and
 * TransientNetworkError for everything that may work on a later attempt.
 */
export interface PlatformAdapter {
  readonly platform: string

  getPostMetrics(subreddit: string, postId: string): Promise<PostMetrics>
  getSubredditInfo(name: string): Promise<SubredditInfo>
}
