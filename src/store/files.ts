import { promises as fs } from 'fs'
import path from 'path'

let tempCounter = 0

// Readers never see a half-written file: content goes to a sibling temp
// file first and is renamed over the target.
export async function writeFileAtomic(
  filePath: string,
  content: string,
): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true })
  tempCounter += 1
  const tempPath = `${filePath}.${process.pid}.${tempCounter}.tmp`
  try {
    await fs.writeFile(tempPath, content, 'utf-8')
    await fs.rename(tempPath, filePath)
  } catch (error) {
    await fs.rm(tempPath, { force: true })
    throw error
  }
}

export async function readFileIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8')
  } catch (error) {
    if (isMissingFile(error)) return null
    throw error
  }
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  )
}

export function fileStamp(date: Date): string {
  return date.toISOString().replace(/[:.]/g, '-')
}
