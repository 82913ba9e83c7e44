export enum PostAngle {
  STORY = 'story',
  FEEDBACK = 'feedback',
  VALUE = 'value',
}

export const ANGLE_ORDER: PostAngle[] = [
  PostAngle.STORY,
  PostAngle.FEEDBACK,
  PostAngle.VALUE,
]

export const ANGLE_LABELS: Record<PostAngle, string> = {
  [PostAngle.STORY]: 'Story/Journey',
  [PostAngle.FEEDBACK]: 'Feedback Request',
  [PostAngle.VALUE]: 'Value/Insight',
}

export enum PostStatus {
  ACTIVE = 'active',
  UNREACHABLE = 'unreachable',
}

export type ActivityLevel = 'high' | 'medium' | 'low'

// ISO-8601, always UTC
export type Timestamp = string

export interface PostMetrics {
  score: number
  commentCount: number
  upvoteRatio: number
  title?: string
}

export interface PostRecord {
  id: string
  url: string
  subreddit: string
  title: string
  angle: PostAngle
  draftRef: string | null
  postedAt: Timestamp
  score: number | null
  commentCount: number | null
  upvoteRatio: number | null
  lastChecked: Timestamp | null
  status: PostStatus
  unreachableSince: Timestamp | null
}

export interface SubredditProfile {
  name: string
  subscriberCount: number
  activityLevel: ActivityLevel
  selfPromoPolicy: string
  bestAngle: PostAngle | 'mixed'
  notes: string
  lastUpdated: Timestamp
}

export interface SubredditInfo {
  name: string
  subscriberCount: number
  activeUsers: number
  description: string
  over18: boolean
}

export interface ReportRow {
  id: string
  title: string
  subreddit: string
  angle: PostAngle
  score: number | null
  commentCount: number | null
  upvoteRatio: number | null
  postedAt: Timestamp
  pending: boolean
}

export interface GroupAverage {
  name: string
  averageScore: number
  postCount: number
}

export interface TopPost {
  id: string
  title: string
  subreddit: string
  score: number
  commentCount: number
}

export interface ReportInsights {
  bestSubreddit: GroupAverage | null
  bestAngle: GroupAverage | null
  bestWeekday: GroupAverage | null
  topPost: TopPost | null
  averages: {
    score: number
    commentCount: number
    upvoteRatio: number
  }
  postCount: number
  pendingCount: number
}

export interface Report {
  period: string
  rows: ReportRow[]
  insights: ReportInsights
  recommendations: string[]
}

export interface StoredReport {
  report: Report
  markdown: string
  generatedAt: Timestamp
}

export interface RefreshSummary {
  checked: number
  due: number
  updated: number
  skippedTransient: number
  markedUnreachable: number
  rateLimitAborted: number
  inFlightElsewhere: number
  aborted: boolean
}

export interface PostingTarget {
  subreddit: string
  angle: PostAngle
  profile: SubredditProfile
  rank: {
    score: number
    daysSince: number
    averageScore: number
  }
}
