export { FileStorage } from './file-storage.js'
export { MemoryStorage } from './memory-storage.js'
export type { DurableStorage } from './types.js'
