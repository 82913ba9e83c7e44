import { PostStatus } from '../../domain/types'
import { postRecord } from '../../test/fixtures'
import { DEFAULT_STALE_AFTER_MS, isDue } from '../StalenessPolicy'

describe('isDue', () => {
  const now = new Date('2026-03-10T12:00:00.000Z')

  test('should be due when never checked', () => {
    expect(isDue({ lastChecked: null, status: PostStatus.ACTIVE }, now)).toBe(true)
  })

  test('should be due when never checked even if posted in the future', () => {
    const skewed = postRecord({ postedAt: '2026-03-11T08:00:00.000Z', lastChecked: null })
    expect(isDue(skewed, now)).toBe(true)
  })

  test('should be due exactly at the threshold', () => {
    expect(
      isDue({ lastChecked: '2026-03-08T12:00:00.000Z', status: PostStatus.ACTIVE }, now),
    ).toBe(true)
  })

  test('should not be due a minute before the threshold', () => {
    expect(
      isDue({ lastChecked: '2026-03-08T12:01:00.000Z', status: PostStatus.ACTIVE }, now),
    ).toBe(false)
  })

  test('should never be due once unreachable', () => {
    expect(isDue({ lastChecked: null, status: PostStatus.UNREACHABLE }, now)).toBe(false)
    expect(
      isDue({ lastChecked: '2026-01-01T00:00:00.000Z', status: PostStatus.UNREACHABLE }, now),
    ).toBe(false)
  })

  test('should honour a custom threshold', () => {
    const record = { lastChecked: '2026-03-10T11:00:00.000Z', status: PostStatus.ACTIVE }
    expect(isDue(record, now, 60 * 60 * 1000)).toBe(true)
    expect(isDue(record, now, DEFAULT_STALE_AFTER_MS)).toBe(false)
  })
})
