import { readFile } from 'fs/promises'
import { existsSync } from 'fs'
import { join } from 'path'
import { homedir } from 'os'
import YAML from 'yaml'
import { createLogger } from '../shared/logger.js'
import { configSchema, type Config } from './schema.js'

const logger = createLogger('config')

export const CONFIG_FILENAME = '.hindsight.yaml'

let cachedConfig: Config | null = null

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Locate config files. The global file is the base, the project file overrides it.
 */
function findConfigPaths(cwd?: string): { globalPath: string | null; projectPath: string | null } {
  const homePath = join(homedir(), CONFIG_FILENAME)
  const projectDir = cwd || process.cwd()
  const projectPath = join(projectDir, CONFIG_FILENAME)

  // Same directory as home: load once
  const isHomeCwd = projectDir === homedir()

  return {
    globalPath: existsSync(homePath) ? homePath : null,
    projectPath: !isHomeCwd && existsSync(projectPath) ? projectPath : null,
  }
}

/**
 * Load configuration.
 * Order: ~/.hindsight.yaml, then <cwd>/.hindsight.yaml, then env overrides.
 * An invalid file is reported and replaced by defaults.
 */
export async function loadConfig(options: { cwd?: string } = {}): Promise<Config> {
  if (cachedConfig) return cachedConfig

  const { globalPath, projectPath } = findConfigPaths(options.cwd)

  if (!globalPath && !projectPath) {
    cachedConfig = applyEnvOverrides(getDefaultConfig())
    return cachedConfig
  }

  const globalRaw = globalPath ? await parseYamlFile(globalPath) : {}
  const projectRaw = projectPath ? await parseYamlFile(projectPath) : {}
  const merged = deepMergeConfig(globalRaw, projectRaw)

  const result = configSchema.safeParse(merged)
  if (!result.success) {
    logger.warn('Config file format error, using defaults', result.error.issues)
    cachedConfig = applyEnvOverrides(getDefaultConfig())
    return cachedConfig
  }

  cachedConfig = applyEnvOverrides(result.data)
  return cachedConfig
}

/**
 * Parse a YAML file; empty or comment-only files yield an empty object
 */
async function parseYamlFile(filePath: string): Promise<Record<string, unknown>> {
  const content = await readFile(filePath, 'utf-8')
  const parsed: unknown = YAML.parse(content)
  return isRecord(parsed) ? parsed : {}
}

/**
 * Merge config objects: nested objects merge key by key, arrays and scalars are replaced.
 */
function deepMergeConfig(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...base }
  for (const [key, val] of Object.entries(override)) {
    if (val === undefined || val === null) continue
    const current = result[key]
    result[key] = isRecord(val) && isRecord(current) ? deepMergeConfig(current, val) : val
  }
  return result
}

/**
 * Apply environment variable overrides. Runs after schema validation.
 */
export function applyEnvOverrides(config: Config): Config {
  const env = process.env

  const apiKey = env.HINDSIGHT_OPENAI_API_KEY || env.OPENAI_API_KEY
  if (apiKey || env.HINDSIGHT_OPENAI_BASE_URL) {
    config = {
      ...config,
      openai: {
        ...config.openai,
        ...(apiKey ? { apiKey } : {}),
        ...(env.HINDSIGHT_OPENAI_BASE_URL ? { baseURL: env.HINDSIGHT_OPENAI_BASE_URL } : {}),
      },
    }
  }

  if (env.HINDSIGHT_EXTRACTION_MODEL) {
    config = { ...config, extraction: { ...config.extraction, model: env.HINDSIGHT_EXTRACTION_MODEL } }
  }

  if (env.HINDSIGHT_EMBEDDING_MODEL) {
    config = { ...config, embedding: { ...config.embedding, model: env.HINDSIGHT_EMBEDDING_MODEL } }
  }

  return config
}

export function getDefaultConfig(): Config {
  return configSchema.parse({})
}

/** Drop the cached config (tests, CLI reload) */
export function clearConfigCache(): void {
  cachedConfig = null
}
