import { profileKey } from '../domain/subreddit'
import {
  ANGLE_LABELS,
  ANGLE_ORDER,
  GroupAverage,
  PostRecord,
  Report,
  ReportInsights,
  ReportRow,
  TopPost,
} from '../domain/types'

export const WEEKDAYS = [
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
  'Sunday',
]

// Posts with lots of comments but few points: discussion without approval
const DISCUSSION_COMMENTS = 10
const DISCUSSION_MAX_SCORE = 5

type Scored = Readonly<PostRecord> & { score: number }

type DeltaScope = 'subreddit-angle' | 'angle' | 'subreddit'
const SCOPE_ORDER: DeltaScope[] = ['subreddit-angle', 'angle', 'subreddit']

interface Delta {
  scope: DeltaScope
  subject: string
  leader: GroupAverage
  trailer: GroupAverage
  delta: number
}

export function periodOf(timestamp: string): string {
  const date = new Date(timestamp)
  const month = String(date.getUTCMonth() + 1).padStart(2, '0')
  return `${date.getUTCFullYear()}-${month}`
}

export function weekdayOf(timestamp: string): string {
  const day = new Date(timestamp).getUTCDay()
  return WEEKDAYS[(day + 6) % 7]
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100
}

/**
 * Aggregates the posts of one month. Output depends only on the records
 * given, never on the clock, so the same input always yields the same report.
 */
export function aggregateReport(
  period: string,
  records: ReadonlyArray<Readonly<PostRecord>>,
): Report {
  const merged = withCanonicalSubreddits(records)
  const scored = merged.filter(isScored)

  return {
    period,
    rows: buildRows(merged),
    insights: buildInsights(merged, scored),
    recommendations: buildRecommendations(scored),
  }
}

// Spellings that differ only in case name one community; the earliest post's spelling wins
function withCanonicalSubreddits(
  records: ReadonlyArray<Readonly<PostRecord>>,
): Array<Readonly<PostRecord>> {
  const names = new Map<string, string>()
  for (const record of [...records].sort(compareChronologically)) {
    const key = profileKey(record.subreddit)
    if (!names.has(key)) names.set(key, record.subreddit)
  }
  return records.map(record => ({
    ...record,
    subreddit: names.get(profileKey(record.subreddit)) ?? record.subreddit,
  }))
}

function isScored(record: Readonly<PostRecord>): record is Scored {
  return record.score !== null
}

function compareChronologically(
  a: Readonly<PostRecord>,
  b: Readonly<PostRecord>,
): number {
  return Date.parse(a.postedAt) - Date.parse(b.postedAt) || compareText(a.id, b.id)
}

function buildRows(records: ReadonlyArray<Readonly<PostRecord>>): ReportRow[] {
  const ordered = [...records].sort((a, b) => {
    if (a.score === null || b.score === null) {
      if (a.score !== b.score) return a.score === null ? 1 : -1
      return compareChronologically(a, b)
    }
    return b.score - a.score || compareChronologically(a, b)
  })

  return ordered.map(record => ({
    id: record.id,
    title: record.title,
    subreddit: record.subreddit,
    angle: record.angle,
    score: record.score,
    commentCount: record.commentCount,
    upvoteRatio: record.upvoteRatio,
    postedAt: record.postedAt,
    pending: record.score === null,
  }))
}

function averageBy(
  scored: Scored[],
  keyOf: (record: Scored) => string,
  tieBreak: (a: string, b: string) => number,
): GroupAverage[] {
  const groups = new Map<string, number[]>()
  for (const record of scored) {
    const key = keyOf(record)
    const scores = groups.get(key) ?? []
    scores.push(record.score)
    groups.set(key, scores)
  }

  return Array.from(groups.entries())
    .map(([name, scores]) => ({
      name,
      averageScore: round2(scores.reduce((sum, score) => sum + score, 0) / scores.length),
      postCount: scores.length,
    }))
    .sort((a, b) => b.averageScore - a.averageScore || tieBreak(a.name, b.name))
}

export function compareText(a: string, b: string): number {
  if (a === b) return 0
  return a < b ? -1 : 1
}

const angleIndex = (name: string): number =>
  ANGLE_ORDER.findIndex(angle => angle === name)

const byName = compareText
const byAngle = (a: string, b: string): number => angleIndex(a) - angleIndex(b)
const byWeekday = (a: string, b: string): number =>
  WEEKDAYS.indexOf(a) - WEEKDAYS.indexOf(b)

function buildInsights(
  records: ReadonlyArray<Readonly<PostRecord>>,
  scored: Scored[],
): ReportInsights {
  const count = records.length
  const mean = (value: (record: Readonly<PostRecord>) => number | null): number =>
    count === 0
      ? 0
      : round2(records.reduce((sum, record) => sum + (value(record) ?? 0), 0) / count)

  return {
    bestSubreddit: averageBy(scored, record => record.subreddit, byName)[0] ?? null,
    bestAngle: averageBy(scored, record => record.angle, byAngle)[0] ?? null,
    bestWeekday:
      averageBy(scored, record => weekdayOf(record.postedAt), byWeekday)[0] ?? null,
    topPost: topPostOf(scored),
    averages: {
      score: mean(record => record.score),
      commentCount: mean(record => record.commentCount),
      upvoteRatio: mean(record => record.upvoteRatio),
    },
    postCount: count,
    pendingCount: count - scored.length,
  }
}

function topPostOf(scored: Scored[]): TopPost | null {
  const [top] = [...scored].sort(
    (a, b) => b.score - a.score || compareChronologically(a, b),
  )
  if (!top) return null
  return {
    id: top.id,
    title: top.title,
    subreddit: top.subreddit,
    score: top.score,
    commentCount: top.commentCount ?? 0,
  }
}

function spread(
  scope: DeltaScope,
  subject: string,
  groups: GroupAverage[],
): Delta | null {
  if (groups.length < 2) return null
  const leader = groups[0]
  const trailer = groups[groups.length - 1]
  const delta = round2(leader.averageScore - trailer.averageScore)
  return delta > 0 ? { scope, subject, leader, trailer, delta } : null
}

function comparativeDeltas(scored: Scored[]): Delta[] {
  const deltas: Delta[] = []

  const subreddits = Array.from(new Set(scored.map(record => record.subreddit))).sort()
  for (const subreddit of subreddits) {
    const inSubreddit = scored.filter(record => record.subreddit === subreddit)
    const delta = spread(
      'subreddit-angle',
      subreddit,
      averageBy(inSubreddit, record => record.angle, byAngle),
    )
    if (delta) deltas.push(delta)
  }

  const angleDelta = spread('angle', '', averageBy(scored, record => record.angle, byAngle))
  if (angleDelta) deltas.push(angleDelta)

  const subredditDelta = spread(
    'subreddit',
    '',
    averageBy(scored, record => record.subreddit, byName),
  )
  if (subredditDelta) deltas.push(subredditDelta)

  return deltas.sort(
    (a, b) =>
      b.delta - a.delta ||
      SCOPE_ORDER.indexOf(a.scope) - SCOPE_ORDER.indexOf(b.scope) ||
      compareText(a.subject, b.subject),
  )
}

function angleLabel(name: string): string {
  const angle = ANGLE_ORDER.find(candidate => candidate === name)
  return angle ? ANGLE_LABELS[angle] : name
}

const fixed = (value: number): string => value.toFixed(1)

function renderDelta(delta: Delta): string {
  const { leader, trailer } = delta
  const figures = `${fixed(leader.averageScore)} vs ${fixed(trailer.averageScore)}`
  const gap = `(+${fixed(delta.delta)})`

  switch (delta.scope) {
    case 'subreddit-angle':
      return `In r/${delta.subject}, ${angleLabel(leader.name)} posts average ${figures} for ${angleLabel(trailer.name)} ${gap}; lead with ${angleLabel(leader.name)} there.`
    case 'angle':
      return `${angleLabel(leader.name)} posts average ${figures} for ${angleLabel(trailer.name)} ${gap}; favour ${angleLabel(leader.name)} in the next drafts.`
    case 'subreddit':
      return `r/${leader.name} averages ${figures} for r/${trailer.name} ${gap}; prioritise r/${leader.name} when planning.`
  }
}

function buildRecommendations(scored: Scored[]): string[] {
  const recommendations = comparativeDeltas(scored).slice(0, 2).map(renderDelta)

  const discussed = scored.filter(
    record =>
      (record.commentCount ?? 0) > DISCUSSION_COMMENTS &&
      record.score < DISCUSSION_MAX_SCORE,
  )
  if (discussed.length > 0) {
    recommendations.push(
      `${discussed.length} post(s) drew more than ${DISCUSSION_COMMENTS} comments but scored under ${DISCUSSION_MAX_SCORE}; the topic lands, so work on the titles.`,
    )
  }

  if (recommendations.length === 0) {
    recommendations.push(
      'Not enough comparable data yet; keep logging posts across angles and subreddits.',
    )
  }
  return recommendations
}
