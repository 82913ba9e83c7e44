import { z } from 'zod'
import { ValidationError } from './errors'
import { normalizeSubreddit } from './subreddit'
import {
  PostAngle,
  PostRecord,
  PostStatus,
  SubredditProfile,
  Report,
} from './types'

const timestamp = z.string().datetime({ offset: true })

export const postRecordSchema: z.ZodType<PostRecord> = z.object({
  id: z.string().min(1),
  url: z.string().url(),
  subreddit: z.string().min(1),
  title: z.string(),
  angle: z.nativeEnum(PostAngle),
  draftRef: z.string().nullable(),
  postedAt: timestamp,
  score: z.number().int().nullable(),
  commentCount: z.number().int().nonnegative().nullable(),
  upvoteRatio: z.number().min(0).max(1).nullable(),
  lastChecked: timestamp.nullable(),
  status: z.nativeEnum(PostStatus),
  unreachableSince: timestamp.nullable(),
})

const bestAngle = z.union([z.nativeEnum(PostAngle), z.literal('mixed')])
const activityLevel = z.enum(['high', 'medium', 'low'])

export const subredditProfileSchema: z.ZodType<SubredditProfile> = z.object({
  name: z.string().min(1),
  subscriberCount: z.number().int().nonnegative(),
  activityLevel,
  selfPromoPolicy: z.string(),
  bestAngle,
  notes: z.string(),
  lastUpdated: timestamp,
})

const reportRowSchema = z.object({
  id: z.string(),
  title: z.string(),
  subreddit: z.string(),
  angle: z.nativeEnum(PostAngle),
  score: z.number().nullable(),
  commentCount: z.number().nullable(),
  upvoteRatio: z.number().nullable(),
  postedAt: timestamp,
  pending: z.boolean(),
})

const groupAverageSchema = z.object({
  name: z.string(),
  averageScore: z.number(),
  postCount: z.number(),
})

export const reportSchema: z.ZodType<Report> = z.object({
  period: z.string(),
  rows: z.array(reportRowSchema),
  insights: z.object({
    bestSubreddit: groupAverageSchema.nullable(),
    bestAngle: groupAverageSchema.nullable(),
    bestWeekday: groupAverageSchema.nullable(),
    topPost: z
      .object({
        id: z.string(),
        title: z.string(),
        subreddit: z.string(),
        score: z.number(),
        commentCount: z.number(),
      })
      .nullable(),
    averages: z.object({
      score: z.number(),
      commentCount: z.number(),
      upvoteRatio: z.number(),
    }),
    postCount: z.number(),
    pendingCount: z.number(),
  }),
  recommendations: z.array(z.string()),
})

export const reportMetaSchema = z.object({
  period: z.string(),
  generatedAt: timestamp,
})

// Command inputs

// The name is checked after the r/ prefix is stripped, as it will be stored
const subredditName = z.string().transform(normalizeSubreddit).pipe(z.string().min(1))

export const logPostInputSchema = z.object({
  url: z.string().trim().min(1),
  angle: z.nativeEnum(PostAngle),
  title: z.string().trim().optional(),
  draftRef: z.string().trim().min(1).optional(),
})

export const profileInputSchema = z.object({
  name: subredditName,
  subscriberCount: z.number().int().nonnegative().default(0),
  activityLevel: activityLevel.default('medium'),
  selfPromoPolicy: z.string().default(''),
  bestAngle: bestAngle.default('mixed'),
  notes: z.string().default(''),
})

export const draftInputSchema = z.object({
  subreddit: subredditName,
  angle: z.nativeEnum(PostAngle),
  title: z.string().trim().min(1),
  body: z.string().min(1),
  notes: z.string().optional(),
})

export const periodSchema = z
  .string()
  .regex(/^\d{4}-(0[1-9]|1[0-2])$/, 'period must look like YYYY-MM')

export function parseInput<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  what: string,
): z.output<S> {
  const result = schema.safeParse(input)
  if (!result.success) {
    const issues = result.error.issues.map(issue =>
      issue.path.length
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message,
    )
    throw new ValidationError(`Invalid ${what}: ${issues.join('; ')}`, issues)
  }
  return result.data
}
