import * as path from 'node:path'
import type { DurableStorage } from './types.js'

/**
 * In-process DurableStorage. Writes replace whole values, so every write is atomic.
 */
export class MemoryStorage implements DurableStorage {
  private readonly values = new Map<string, string>()

  async writeAtomic(key: string, data: string): Promise<void> {
    this.values.set(normalize(key), data)
  }

  async appendLine(key: string, line: string): Promise<void> {
    const k = normalize(key)
    this.values.set(k, (this.values.get(k) ?? '') + `${line}\n`)
  }

  async read(key: string): Promise<string | null> {
    return this.values.get(normalize(key)) ?? null
  }

  async list(dir: string): Promise<string[]> {
    const prefix = normalize(dir) + '/'
    return Array.from(this.values.keys())
      .filter((key) => key.startsWith(prefix) && !key.slice(prefix.length).includes('/'))
      .sort()
  }

  async remove(key: string): Promise<boolean> {
    return this.values.delete(normalize(key))
  }
}

function normalize(key: string): string {
  return path.posix.normalize(key).replace(/^\.\/+|\/+$/g, '')
}
