import { promises as fs } from 'fs'
import path from 'path'
import { ValidationError } from '../../domain/errors'
import { makeTempDir, removeDir } from '../../test/fixtures'
import { DraftStore } from '../DraftStore'

describe('DraftStore', () => {
  const now = new Date('2026-03-10T09:00:00.000Z')
  let dir: string
  let drafts: DraftStore

  beforeEach(async () => {
    dir = await makeTempDir()
    drafts = new DraftStore(dir)
  })

  afterEach(async () => {
    await removeDir(dir)
  })

  const input = {
    subreddit: 'r/SideProject',
    angle: 'feedback',
    title: 'Would you pay for this?',
    body: 'Short description of the tool.',
  }

  test('should write a dated markdown draft', async () => {
    const saved = await drafts.save(input, now)

    expect(saved).toEqual({
      path: path.join(dir, 'drafts', '2026-03-10-sideproject.md'),
      subreddit: 'SideProject',
    })
    const content = await fs.readFile(saved.path, 'utf-8')
    expect(content.split('\n').slice(0, 5)).toEqual([
      '# Draft: r/SideProject',
      '',
      '**Date:** 2026-03-10',
      '**Status:** draft',
      '**Angle:** feedback (Feedback Request)',
    ])
    expect(content).toContain('\n## Notes\n\n(none)\n')
  })

  test('should never overwrite an existing draft', async () => {
    const first = await drafts.save(input, now)
    const second = await drafts.save({ ...input, title: 'Second take' }, now)

    expect(path.basename(first.path)).toBe('2026-03-10-sideproject.md')
    expect(path.basename(second.path)).toBe('2026-03-10-sideproject-1.md')
    expect(await fs.readFile(first.path, 'utf-8')).toContain('Would you pay for this?')
  })

  test('should reject a draft without a title', async () => {
    await expect(drafts.save({ ...input, title: '' }, now)).rejects.toBeInstanceOf(ValidationError)
  })
})
