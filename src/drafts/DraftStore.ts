import { promises as fs } from 'fs'
import path from 'path'
import { draftInputSchema, parseInput } from '../domain/schemas'
import { ANGLE_LABELS } from '../domain/types'

export const DRAFTS_DIR = 'drafts'

export interface SavedDraft {
  path: string
  subreddit: string
}

/**
 * Keeps hand-written drafts as markdown files so a logged post can point
 * back at the text it was published from.
 */
export class DraftStore {
  constructor(private memoryDir: string) {}

  async save(input: unknown, now: Date = new Date()): Promise<SavedDraft> {
    const draft = parseInput(draftInputSchema, input, 'draft')
    const subreddit = draft.subreddit
    const day = now.toISOString().slice(0, 10)
    const slug = subreddit.toLowerCase().replace(/[^a-z0-9_-]+/g, '-')

    const content = [
      `# Draft: r/${subreddit}`,
      '',
      `**Date:** ${day}`,
      '**Status:** draft',
      `**Angle:** ${draft.angle} (${ANGLE_LABELS[draft.angle]})`,
      '',
      '---',
      '',
      '## Title',
      '',
      draft.title,
      '',
      '---',
      '',
      '## Body',
      '',
      draft.body,
      '',
      '---',
      '',
      '## Notes',
      '',
      draft.notes || '(none)',
      '',
    ].join('\n')

    const dir = path.join(this.memoryDir, DRAFTS_DIR)
    await fs.mkdir(dir, { recursive: true })

    // 'wx' fails when the name is taken, so concurrent saves never share a file
    for (let attempt = 0; ; attempt++) {
      const suffix = attempt === 0 ? '' : `-${attempt}`
      const filePath = path.join(dir, `${day}-${slug}${suffix}.md`)
      try {
        await fs.writeFile(filePath, content, { encoding: 'utf-8', flag: 'wx' })
        return { path: filePath, subreddit }
      } catch (error) {
        if (!isAlreadyExists(error)) throw error
      }
    }
  }
}

function isAlreadyExists(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'EEXIST'
  )
}
