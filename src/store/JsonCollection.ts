import { promises as fs } from 'fs'
import Bottleneck from 'bottleneck'
import winston from 'winston'
import { z } from 'zod'
import {
  CorruptStoreError,
  TrackerError,
  ValidationError,
  errorMessage,
} from '../domain/errors'
import { fileStamp, readFileIfExists, writeFileAtomic } from './files'

export interface Mutation<T, R> {
  // Omit to leave the file untouched
  items?: T[]
  result: R
}

export interface RepairResult {
  file: string
  backupPath: string | null
  kept: number
  dropped: number
  unreadable: boolean
}

/**
 * A JSON array persisted as one file. Every mutation re-reads the file,
 * applies the change and rewrites the whole array, one at a time.
 */
export class JsonCollection<T> {
  private writer = new Bottleneck({ maxConcurrent: 1 })

  constructor(
    readonly filePath: string,
    private schema: z.ZodType<T>,
    private keysOf: (item: T) => string[],
    private logger: winston.Logger,
  ) {}

  async read(): Promise<T[]> {
    const raw = await readFileIfExists(this.filePath)
    if (raw === null) return []
    return this.parse(raw)
  }

  transact<R>(mutate: (items: T[]) => Mutation<T, R>): Promise<R> {
    return this.writer.schedule(async () => {
      const items = await this.read()
      const mutation = mutate(items)
      if (mutation.items) {
        // Nothing is written that the next read would reject
        const checked = this.validate(
          mutation.items,
          reason => new ValidationError(`Refusing to write ${this.filePath}: ${reason}`, [reason]),
        )
        await this.write(checked)
      }
      return mutation.result
    })
  }

  /**
   * Backs up an unreadable file and rewrites it with whatever elements
   * still validate. A readable collection is left as it is.
   */
  repair(now: Date = new Date()): Promise<RepairResult> {
    return this.writer.schedule(async () => {
      const raw = await readFileIfExists(this.filePath)
      if (raw === null) {
        await this.write([])
        return this.result(null, 0, 0, false)
      }

      try {
        const items = this.parse(raw)
        return this.result(null, items.length, 0, false)
      } catch (error) {
        if (!(error instanceof CorruptStoreError)) throw error
        this.logger.warn('Repairing corrupt collection', {
          file: this.filePath,
          reason: error.reason,
        })
      }

      const backupPath = `${this.filePath}.backup-${fileStamp(now)}`
      await fs.copyFile(this.filePath, backupPath)

      const salvaged = this.salvage(raw)
      await this.write(salvaged.kept)

      this.logger.info('Collection repaired', {
        file: this.filePath,
        backupPath,
        kept: salvaged.kept.length,
        dropped: salvaged.dropped,
      })
      return this.result(
        backupPath,
        salvaged.kept.length,
        salvaged.dropped,
        salvaged.unreadable,
      )
    })
  }

  private parse(raw: string): T[] {
    let data: unknown
    try {
      data = JSON.parse(raw)
    } catch (error) {
      throw new CorruptStoreError(
        this.filePath,
        `unparsable JSON (${errorMessage(error)})`,
      )
    }

    if (!Array.isArray(data)) {
      throw new CorruptStoreError(this.filePath, 'root value is not an array')
    }

    return this.validate(data, reason => new CorruptStoreError(this.filePath, reason))
  }

  private validate(
    elements: unknown[],
    fail: (reason: string) => TrackerError,
  ): T[] {
    const seen = new Set<string>()
    return elements.map((element: unknown, index) => {
      const parsed = this.schema.safeParse(element)
      if (!parsed.success) {
        const issue = parsed.error.issues[0]
        const where = issue?.path.length ? ` at ${issue.path.join('.')}` : ''
        throw fail(`element ${index} is invalid${where}: ${issue?.message ?? 'unknown'}`)
      }
      for (const key of this.keysOf(parsed.data)) {
        if (seen.has(key)) {
          throw fail(`element ${index} repeats key ${key}`)
        }
        seen.add(key)
      }
      return parsed.data
    })
  }

  private salvage(raw: string): {
    kept: T[]
    dropped: number
    unreadable: boolean
  } {
    let data: unknown
    try {
      data = JSON.parse(raw)
    } catch {
      return { kept: [], dropped: 0, unreadable: true }
    }
    if (!Array.isArray(data)) {
      return { kept: [], dropped: 0, unreadable: true }
    }

    const kept: T[] = []
    const seen = new Set<string>()
    for (const element of data) {
      const parsed = this.schema.safeParse(element)
      if (!parsed.success) continue
      const keys = this.keysOf(parsed.data)
      if (keys.some(key => seen.has(key))) continue
      keys.forEach(key => seen.add(key))
      kept.push(parsed.data)
    }
    return { kept, dropped: data.length - kept.length, unreadable: false }
  }

  private async write(items: T[]): Promise<void> {
    await writeFileAtomic(this.filePath, JSON.stringify(items, null, 2) + '\n')
  }

  private result(
    backupPath: string | null,
    kept: number,
    dropped: number,
    unreadable: boolean,
  ): RepairResult {
    return { file: this.filePath, backupPath, kept, dropped, unreadable }
  }
}
