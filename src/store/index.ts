/**
 * @entry Store
 *
 * SQLite memory store with dual embeddings:
 * - createMemoryStore: open or create the `memories` table
 * - searchByTask / searchByContent: exact cosine ranking
 * - updateOutcome / updateMemory: atomic per-row updates
 */

export {
  createMemoryStore,
  type MemoryStore,
  type MemoryStoreOptions,
  type ListOptions,
  type SearchOptions,
  type OutcomeOptions,
} from './MemoryStore.js'
export { getDataDir, getMemoryDbPath, MEMORY_DB_FILE } from './paths.js'
export { cosineSimilarity, vectorToBlob, blobToVector } from './vectorMath.js'
