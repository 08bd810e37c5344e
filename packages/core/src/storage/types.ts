/**
 * Durable key-value storage
 *
 * Keys are slash-separated relative paths, e.g. `context/research.jsonl`.
 * `writeAtomic` must leave either the previous value or the new one visible,
 * never a torn write.
 */
export interface DurableStorage {
  writeAtomic(key: string, data: string): Promise<void>
  /** Append one line (a trailing newline is added) */
  appendLine(key: string, line: string): Promise<void>
  /** Returns null when the key does not exist */
  read(key: string): Promise<string | null>
  /** Keys directly under `dir`, sorted */
  list(dir: string): Promise<string[]>
  /** Returns false when the key did not exist */
  remove(key: string): Promise<boolean>
}
