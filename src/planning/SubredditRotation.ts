import {
  ANGLE_ORDER,
  PostAngle,
  PostRecord,
  PostStatus,
  PostingTarget,
  SubredditProfile,
} from '../domain/types'
import { profileKey } from '../domain/subreddit'
import { compareText, round2 } from '../reports/aggregate'

export interface RotationOptions {
  postsPerDay: number
  minDaysBetween: number
}

export const DEFAULT_ROTATION: RotationOptions = {
  postsPerDay: 3,
  minDaysBetween: 4,
}

const DAY_MS = 24 * 60 * 60 * 1000
const NEVER_POSTED_DAYS = 999

const WEIGHT_RECENCY = 0.5
const WEIGHT_PERFORMANCE = 0.3
const WEIGHT_REACH = 0.2

function utcDay(date: Date): number {
  return Math.floor(date.getTime() / DAY_MS)
}

function nextAngle(last: PostAngle | undefined): PostAngle {
  if (!last) return PostAngle.STORY
  const index = ANGLE_ORDER.indexOf(last)
  return ANGLE_ORDER[(index + 1) % ANGLE_ORDER.length]
}

/**
 * Picks today's subreddits and angles. Communities posted to recently are
 * left to cool down; the rest are ranked by time since the last post,
 * past average score and audience size.
 */
export function planTargets(
  profiles: ReadonlyArray<Readonly<SubredditProfile>>,
  posts: ReadonlyArray<Readonly<PostRecord>>,
  today: Date,
  options: RotationOptions = DEFAULT_ROTATION,
): PostingTarget[] {
  const day = utcDay(today)
  const postedToday = posts.filter(post => utcDay(new Date(post.postedAt)) === day)
  const remaining = options.postsPerDay - postedToday.length
  if (remaining <= 0) return []

  const active = posts.filter(post => post.status !== PostStatus.UNREACHABLE)
  const maxSubscribers = Math.max(0, ...profiles.map(profile => profile.subscriberCount))

  const candidates = profiles
    .map(profile => {
      const key = profileKey(profile.name)
      const history = active
        .filter(post => profileKey(post.subreddit) === key)
        .sort((a, b) => Date.parse(b.postedAt) - Date.parse(a.postedAt))

      const daysSince = history.length
        ? day - utcDay(new Date(history[0].postedAt))
        : NEVER_POSTED_DAYS
      const scores = history.flatMap(post => (post.score === null ? [] : [post.score]))
      const averageScore = scores.length
        ? scores.reduce((sum, score) => sum + score, 0) / scores.length
        : 0
      const reach = maxSubscribers > 0 ? profile.subscriberCount / maxSubscribers : 0

      return {
        profile,
        lastAngle: history[0]?.angle,
        daysSince,
        averageScore,
        score:
          daysSince * WEIGHT_RECENCY +
          averageScore * WEIGHT_PERFORMANCE +
          reach * WEIGHT_REACH * 100,
      }
    })
    .filter(candidate => candidate.daysSince >= options.minDaysBetween)
    .sort(
      (a, b) => b.score - a.score || compareText(a.profile.name, b.profile.name),
    )

  const usedAngles = new Set<PostAngle>()
  return candidates.slice(0, remaining).map(candidate => {
    let angle = nextAngle(candidate.lastAngle)

    if (usedAngles.has(angle) && usedAngles.size < ANGLE_ORDER.length) {
      const alternative = ANGLE_ORDER.find(
        option => !usedAngles.has(option) && option !== candidate.lastAngle,
      )
      if (alternative) angle = alternative
    }
    if (!candidate.lastAngle && candidate.profile.bestAngle !== 'mixed') {
      angle = candidate.profile.bestAngle
    }
    usedAngles.add(angle)

    return {
      subreddit: candidate.profile.name,
      angle,
      profile: { ...candidate.profile },
      rank: {
        score: round2(candidate.score),
        daysSince: candidate.daysSince,
        averageScore: round2(candidate.averageScore),
      },
    }
  })
}
