import { PostRecord, PostStatus } from '../domain/types'

export const DEFAULT_STALE_AFTER_MS = 48 * 60 * 60 * 1000

type StalenessFields = Pick<PostRecord, 'lastChecked' | 'status'>

// Post age plays no part: only the time since the last successful check.
export function isDue(
  record: StalenessFields,
  now: Date,
  thresholdMs: number = DEFAULT_STALE_AFTER_MS,
): boolean {
  if (record.status === PostStatus.UNREACHABLE) return false
  if (record.lastChecked === null) return true

  const checkedAt = Date.parse(record.lastChecked)
  if (Number.isNaN(checkedAt)) return true

  return now.getTime() - checkedAt >= thresholdMs
}
