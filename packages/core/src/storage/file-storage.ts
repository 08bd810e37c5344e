/**
 * Filesystem-backed DurableStorage
 *
 * Atomic writes go to a sibling temp file which is fsynced and renamed
 * over the target. Temp files left by a crash are never listed.
 */

import * as path from 'node:path'
import { appendFile, mkdir, open, readFile, readdir, rename, rm } from 'node:fs/promises'
import { ulid } from 'ulid'
import type { DurableStorage } from './types.js'

const TEMP_SUFFIX = '.tmp'

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

export class FileStorage implements DurableStorage {
  readonly rootDir: string

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir)
  }

  async writeAtomic(key: string, data: string): Promise<void> {
    const target = this.resolve(key)
    await mkdir(path.dirname(target), { recursive: true })

    const temp = `${target}.${ulid()}${TEMP_SUFFIX}`
    try {
      const handle = await open(temp, 'w')
      try {
        await handle.writeFile(data, 'utf-8')
        await handle.sync()
      } finally {
        await handle.close()
      }
      await rename(temp, target)
    } catch (error) {
      await rm(temp, { force: true })
      throw error
    }
  }

  async appendLine(key: string, line: string): Promise<void> {
    const target = this.resolve(key)
    await mkdir(path.dirname(target), { recursive: true })
    await appendFile(target, `${line}\n`, 'utf-8')
  }

  async read(key: string): Promise<string | null> {
    try {
      return await readFile(this.resolve(key), 'utf-8')
    } catch (error) {
      if (isNotFound(error)) return null
      throw error
    }
  }

  async list(dir: string): Promise<string[]> {
    let entries
    try {
      entries = await readdir(this.resolve(dir), { withFileTypes: true })
    } catch (error) {
      if (isNotFound(error)) return []
      throw error
    }
    return entries
      .filter((entry) => entry.isFile() && !entry.name.endsWith(TEMP_SUFFIX))
      .map((entry) => path.posix.join(dir, entry.name))
      .sort()
  }

  async remove(key: string): Promise<boolean> {
    try {
      await rm(this.resolve(key))
      return true
    } catch (error) {
      if (isNotFound(error)) return false
      throw error
    }
  }

  private resolve(key: string): string {
    const target = path.resolve(this.rootDir, key)
    if (target !== this.rootDir && !target.startsWith(this.rootDir + path.sep)) {
      throw new Error(`Storage key escapes root: ${key}`)
    }
    return target
  }
}
