import { promises as fs } from 'fs'
import http from 'http'
import os from 'os'
import path from 'path'
import { PostAngle, PostRecord, PostStatus } from '../domain/types'

export function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'post-tracker-'))
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true })
}

export function postRecord(overrides: Partial<PostRecord> = {}): PostRecord {
  const id = overrides.id ?? 'abc123'
  const subreddit = overrides.subreddit ?? 'SideProject'
  return {
    id,
    url: `https://www.reddit.com/r/${subreddit}/comments/${id}`,
    subreddit,
    title: 'Launch day',
    angle: PostAngle.STORY,
    draftRef: null,
    postedAt: '2026-03-02T10:00:00.000Z',
    score: null,
    commentCount: null,
    upvoteRatio: null,
    lastChecked: null,
    status: PostStatus.ACTIVE,
    unreachableSince: null,
    ...overrides,
  }
}

export const fixedClock =
  (iso: string): (() => Date) =>
  () =>
    new Date(iso)

export async function listenLocal(server: http.Server): Promise<number> {
  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve))
  const address = server.address()
  if (address === null || typeof address === 'string') {
    throw new Error('server is not listening on a TCP port')
  }
  return address.port
}

export async function closeServer(server: http.Server): Promise<void> {
  server.closeAllConnections()
  await new Promise<void>((resolve, reject) =>
    server.close(error => (error ? reject(error) : resolve())),
  )
}
