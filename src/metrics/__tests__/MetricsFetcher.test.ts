import {
  NotFoundError,
  RateLimitedError,
  TransientNetworkError,
} from '../../domain/errors'
import { PostMetrics, SubredditInfo } from '../../domain/types'
import { PlatformAdapter } from '../../platforms/PlatformAdapter'
import { TrackerMetrics } from '../../telemetry/TrackerMetrics'
import { MetricsFetcher, RATE_LIMIT_COOLDOWN_MS, createFetchLimiter } from '../MetricsFetcher'

const metrics: PostMetrics = { score: 10, commentCount: 2, upvoteRatio: 0.8 }

describe('MetricsFetcher', () => {
  let getPostMetrics: jest.Mock<Promise<PostMetrics>, [string, string]>
  let getSubredditInfo: jest.Mock<Promise<SubredditInfo>, [string]>
  let platform: PlatformAdapter
  let sleep: jest.Mock<Promise<void>, [number]>
  let telemetry: TrackerMetrics
  let fetcher: MetricsFetcher

  beforeEach(() => {
    getPostMetrics = jest.fn<Promise<PostMetrics>, [string, string]>()
    getSubredditInfo = jest.fn<Promise<SubredditInfo>, [string]>()
    platform = { platform: 'reddit', getPostMetrics, getSubredditInfo }
    sleep = jest.fn<Promise<void>, [number]>().mockResolvedValue(undefined)
    telemetry = new TrackerMetrics()
    fetcher = new MetricsFetcher(platform, { callsPerMinute: 30, sleep, telemetry })
  })

  afterEach(async () => {
    await fetcher.stop()
  })

  const outcomeCount = async (outcome: string): Promise<number> => {
    const { values } = await telemetry.fetchCounter.get()
    return values.find(value => value.labels.outcome === outcome)?.value ?? 0
  }

  test('should return the platform metrics', async () => {
    getPostMetrics.mockResolvedValue(metrics)

    await expect(fetcher.fetch('SaaS', 'p1')).resolves.toEqual(metrics)
    expect(getPostMetrics).toHaveBeenCalledWith('SaaS', 'p1')
    expect(sleep).not.toHaveBeenCalled()
    expect(await outcomeCount('success')).toBe(1)
  })

  test('should retry once after the cooldown when rate limited', async () => {
    getPostMetrics.mockRejectedValueOnce(new RateLimitedError()).mockResolvedValueOnce(metrics)

    await expect(fetcher.fetch('SaaS', 'p1')).resolves.toEqual(metrics)
    expect(sleep).toHaveBeenCalledTimes(1)
    expect(sleep).toHaveBeenCalledWith(RATE_LIMIT_COOLDOWN_MS)
    expect(getPostMetrics).toHaveBeenCalledTimes(2)
    expect(await outcomeCount('rate_limited')).toBe(1)
    expect(await outcomeCount('success')).toBe(1)
  })

  test('should give up after a second rate-limit answer', async () => {
    getPostMetrics.mockRejectedValue(new RateLimitedError())

    await expect(fetcher.fetch('SaaS', 'p1')).rejects.toBeInstanceOf(RateLimitedError)
    expect(sleep).toHaveBeenCalledTimes(1)
    expect(getPostMetrics).toHaveBeenCalledTimes(2)
  })

  test('should use the configured cooldown', async () => {
    await fetcher.stop()
    fetcher = new MetricsFetcher(platform, {
      callsPerMinute: 30,
      rateLimitCooldownMs: 5000,
      sleep,
    })
    getPostMetrics.mockRejectedValueOnce(new RateLimitedError()).mockResolvedValueOnce(metrics)

    await fetcher.fetch('SaaS', 'p1')

    expect(sleep).toHaveBeenCalledWith(5000)
  })

  test.each([
    ['not found', new NotFoundError('gone', 'upstream'), 'not_found'],
    ['transient', new TransientNetworkError('reset'), 'transient'],
  ])('should pass %s failures through without retrying', async (_name, error, outcome) => {
    getPostMetrics.mockRejectedValue(error)

    await expect(fetcher.fetch('SaaS', 'p1')).rejects.toBe(error)
    expect(getPostMetrics).toHaveBeenCalledTimes(1)
    expect(sleep).not.toHaveBeenCalled()
    expect(await outcomeCount(outcome)).toBe(1)
  })

  test('should apply the same retry to subreddit lookups', async () => {
    const info: SubredditInfo = {
      name: 'SaaS',
      subscriberCount: 10,
      activeUsers: 1,
      description: '',
      over18: false,
    }
    getSubredditInfo.mockRejectedValueOnce(new RateLimitedError()).mockResolvedValueOnce(info)

    await expect(fetcher.fetchSubredditInfo('SaaS')).resolves.toEqual(info)
    expect(sleep).toHaveBeenCalledTimes(1)
  })

  test('should queue calls once the minute budget is spent', async () => {
    await fetcher.stop()
    const limiter = createFetchLimiter(2)
    fetcher = new MetricsFetcher(platform, { callsPerMinute: 2, limiter, sleep })
    getPostMetrics.mockResolvedValue(metrics)

    const all = Promise.all([
      fetcher.fetch('SaaS', 'p1'),
      fetcher.fetch('SaaS', 'p2'),
      fetcher.fetch('SaaS', 'p3'),
    ])
    await new Promise(resolve => setTimeout(resolve, 100))

    expect(getPostMetrics).toHaveBeenCalledTimes(2)

    await limiter.incrementReservoir(1)
    await all

    expect(getPostMetrics).toHaveBeenCalledTimes(3)
    expect(getPostMetrics).toHaveBeenLastCalledWith('SaaS', 'p3')
  })
})
