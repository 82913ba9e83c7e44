import { PostAngle, PostStatus, SubredditProfile } from '../../domain/types'
import { postRecord } from '../../test/fixtures'
import { planTargets } from '../SubredditRotation'

const profile = (name: string, subscriberCount: number, bestAngle: SubredditProfile['bestAngle'] = 'mixed'): SubredditProfile => ({
  name,
  subscriberCount,
  activityLevel: 'medium',
  selfPromoPolicy: '',
  bestAngle,
  notes: '',
  lastUpdated: '2026-03-01T00:00:00.000Z',
})

describe('planTargets', () => {
  const today = new Date('2026-03-10T09:00:00.000Z')
  const profiles = [
    profile('alpha', 1000),
    profile('beta', 500, PostAngle.VALUE),
    profile('gamma', 100),
    profile('delta', 200),
  ]
  const history = [
    postRecord({ id: 'h1', subreddit: 'alpha', angle: PostAngle.STORY, postedAt: '2026-03-01T12:00:00.000Z', score: 30 }),
    postRecord({ id: 'h2', subreddit: 'delta', angle: PostAngle.STORY, postedAt: '2026-03-08T12:00:00.000Z' }),
  ]

  test('should rank rested subreddits and rotate angles', () => {
    expect(planTargets(profiles, history, today)).toEqual([
      {
        subreddit: 'beta',
        angle: PostAngle.VALUE,
        profile: profiles[1],
        rank: { score: 509.5, daysSince: 999, averageScore: 0 },
      },
      {
        subreddit: 'gamma',
        angle: PostAngle.STORY,
        profile: profiles[2],
        rank: { score: 501.5, daysSince: 999, averageScore: 0 },
      },
      {
        subreddit: 'alpha',
        angle: PostAngle.FEEDBACK,
        profile: profiles[0],
        rank: { score: 33.5, daysSince: 9, averageScore: 30 },
      },
    ])
  })

  test('should count posts already made today against the daily limit', () => {
    const todays = [
      postRecord({ id: 't1', subreddit: 'other', postedAt: '2026-03-10T07:00:00.000Z' }),
      postRecord({ id: 't2', subreddit: 'other', postedAt: '2026-03-10T08:00:00.000Z' }),
    ]

    const targets = planTargets(profiles, [...history, ...todays], today)
    expect(targets.map(target => target.subreddit)).toEqual(['beta'])

    const full = [...todays, postRecord({ id: 't3', subreddit: 'other', postedAt: '2026-03-10T08:30:00.000Z' })]
    expect(planTargets(profiles, full, today)).toEqual([])
  })

  test('should ignore unreachable posts when measuring rest', () => {
    const removed = postRecord({
      id: 'h3',
      subreddit: 'delta',
      postedAt: '2026-03-09T12:00:00.000Z',
      status: PostStatus.UNREACHABLE,
      unreachableSince: '2026-03-09T18:00:00.000Z',
    })

    const targets = planTargets([profile('delta', 200)], [removed], today)
    expect(targets).toHaveLength(1)
    expect(targets[0].rank.daysSince).toBe(999)
  })

  test('should honour custom rotation options', () => {
    const targets = planTargets(profiles, history, today, { postsPerDay: 4, minDaysBetween: 1 })
    expect(targets.map(target => target.subreddit)).toEqual(['beta', 'gamma', 'alpha', 'delta'])
  })
})
