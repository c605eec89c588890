/**
 * Storage paths
 *
 * Data directory precedence:
 * 1. HINDSIGHT_DATA_DIR (absolute, or relative to cwd)
 * 2. .hindsight-data under cwd
 */

import { existsSync, mkdirSync } from 'fs'
import { join } from 'path'

const DEFAULT_DATA_DIR_NAME = '.hindsight-data'

export const MEMORY_DB_FILE = 'memories.db'

export function getDataDir(): string {
  const envDir = process.env.HINDSIGHT_DATA_DIR
  if (envDir) {
    return envDir.startsWith('/') ? envDir : join(process.cwd(), envDir)
  }
  return join(process.cwd(), DEFAULT_DATA_DIR_NAME)
}

/** SQLite file path, creating the data directory on first use */
export function getMemoryDbPath(): string {
  const dataDir = getDataDir()
  if (!existsSync(dataDir)) {
    mkdirSync(dataDir, { recursive: true })
  }
  return join(dataDir, MEMORY_DB_FILE)
}
