import { promises as fs } from 'fs'
import path from 'path'
import { z } from 'zod'
import { CorruptStoreError, ValidationError } from '../../domain/errors'
import { createLogger } from '../../logging/logger'
import { makeTempDir, removeDir } from '../../test/fixtures'
import { JsonCollection } from '../JsonCollection'

interface Item {
  id: string
  value: number
}

const itemSchema: z.ZodType<Item> = z.object({ id: z.string(), value: z.number() })

describe('JsonCollection', () => {
  let dir: string
  let file: string
  let collection: JsonCollection<Item>

  beforeEach(async () => {
    dir = await makeTempDir()
    file = path.join(dir, 'items.json')
    collection = new JsonCollection(file, itemSchema, item => [item.id], createLogger('test'))
  })

  afterEach(async () => {
    await removeDir(dir)
  })

  const corruptReason = async (content: string): Promise<string> => {
    await fs.writeFile(file, content, 'utf-8')
    try {
      await collection.read()
    } catch (error) {
      if (error instanceof CorruptStoreError) return error.reason
      throw error
    }
    throw new Error('expected the collection to be corrupt')
  }

  test('should read a missing file as an empty collection', async () => {
    await expect(collection.read()).resolves.toEqual([])
  })

  test('should persist the items returned by a transaction', async () => {
    const result = await collection.transact(items => ({
      items: [...items, { id: 'a', value: 1 }],
      result: 'added',
    }))

    expect(result).toBe('added')
    expect(await fs.readFile(file, 'utf-8')).toBe(
      JSON.stringify([{ id: 'a', value: 1 }], null, 2) + '\n',
    )
  })

  test('should leave the file untouched when a transaction returns no items', async () => {
    await collection.transact(() => ({ result: null }))
    await expect(fs.access(file)).rejects.toThrow()
  })

  test('should apply concurrent transactions one after another', async () => {
    await Promise.all(
      Array.from({ length: 20 }, (_, index) =>
        collection.transact(items => ({
          items: [...items, { id: `item-${index}`, value: index }],
          result: undefined,
        })),
      ),
    )

    const items = await collection.read()
    expect(items).toHaveLength(20)
    expect(new Set(items.map(item => item.id)).size).toBe(20)
  })

  test('should not write when the mutation throws', async () => {
    await collection.transact(() => ({ items: [{ id: 'a', value: 1 }], result: undefined }))

    await expect(
      collection.transact(() => {
        throw new Error('rejected')
      }),
    ).rejects.toThrow('rejected')
    expect(await collection.read()).toEqual([{ id: 'a', value: 1 }])
  })

  test('should refuse to write an element the schema rejects', async () => {
    await collection.transact(() => ({ items: [{ id: 'a', value: 1 }], result: undefined }))
    const before = await fs.readFile(file, 'utf-8')

    const attempt = collection.transact(items => ({
      items: [...items, { id: 'b', value: Number.NaN }],
      result: undefined,
    }))

    await expect(attempt).rejects.toBeInstanceOf(ValidationError)
    await expect(attempt).rejects.toMatchObject({
      issues: ['element 1 is invalid at value: Expected number, received nan'],
    })
    expect(await fs.readFile(file, 'utf-8')).toBe(before)
  })

  test('should refuse to write repeated keys', async () => {
    await expect(
      collection.transact(() => ({
        items: [
          { id: 'a', value: 1 },
          { id: 'a', value: 2 },
        ],
        result: undefined,
      })),
    ).rejects.toThrow(`Refusing to write ${file}: element 1 repeats key a`)
    await expect(collection.read()).resolves.toEqual([])
  })

  test('should reject unparsable JSON', async () => {
    expect(await corruptReason('not json')).toMatch(/^unparsable JSON/)
  })

  test('should reject an empty file', async () => {
    expect(await corruptReason('')).toMatch(/^unparsable JSON/)
  })

  test('should reject a root value that is not an array', async () => {
    expect(await corruptReason('{"id":"a"}')).toBe('root value is not an array')
  })

  test('should reject an element missing a field', async () => {
    expect(await corruptReason('[{"id":"a","value":1},{"id":"b"}]')).toBe(
      'element 1 is invalid at value: Required',
    )
  })

  test('should reject repeated keys', async () => {
    expect(
      await corruptReason('[{"id":"a","value":1},{"id":"a","value":2}]'),
    ).toBe('element 1 repeats key a')
  })

  test('should refuse to mutate a corrupt file', async () => {
    await fs.writeFile(file, '[{', 'utf-8')

    await expect(
      collection.transact(items => ({ items, result: undefined })),
    ).rejects.toBeInstanceOf(CorruptStoreError)
    expect(await fs.readFile(file, 'utf-8')).toBe('[{')
  })

  describe('repair', () => {
    const now = new Date('2026-03-05T12:00:00.000Z')

    test('should back up the file and keep the valid elements', async () => {
      const original = '[{"id":"a","value":1},{"id":"b"},{"id":"a","value":3}]'
      await fs.writeFile(file, original, 'utf-8')

      const result = await collection.repair(now)

      expect(result).toEqual({
        file,
        backupPath: `${file}.backup-2026-03-05T12-00-00-000Z`,
        kept: 1,
        dropped: 2,
        unreadable: false,
      })
      expect(await fs.readFile(`${file}.backup-2026-03-05T12-00-00-000Z`, 'utf-8')).toBe(
        original,
      )
      expect(await collection.read()).toEqual([{ id: 'a', value: 1 }])
    })

    test('should be a no-op on a second run', async () => {
      await fs.writeFile(file, '[{"id":"a","value":1},{"id":"b"}]', 'utf-8')
      await collection.repair(now)

      const again = await collection.repair(new Date('2026-03-05T13:00:00.000Z'))

      expect(again).toEqual({ file, backupPath: null, kept: 1, dropped: 0, unreadable: false })
      expect(await collection.read()).toEqual([{ id: 'a', value: 1 }])
    })

    test('should reset an unparsable file to an empty collection', async () => {
      await fs.writeFile(file, '[{"id": "a", "val', 'utf-8')

      const result = await collection.repair(now)

      expect(result.unreadable).toBe(true)
      expect(result.kept).toBe(0)
      expect(await collection.read()).toEqual([])
    })

    test('should create a missing file', async () => {
      const result = await collection.repair(now)

      expect(result).toEqual({ file, backupPath: null, kept: 0, dropped: 0, unreadable: false })
      expect(await fs.readFile(file, 'utf-8')).toBe('[]\n')
    })
  })
})
