import * as path from 'node:path'
import { existsSync, readFileSync } from 'node:fs'
import { parse } from 'yaml'
import { z } from 'zod'
import { ConfigError } from './errors.js'
import { createLogger } from './logger.js'
import type { CofounderConfig } from './types.js'

const log = createLogger('config')

const AGENT_DIRNAME = '.cofounder'
const CONFIG_FILENAME = 'config.yaml'

export const DEFAULT_CATEGORIES = [
  'active-task',
  'task-state',
  'decisions',
  'research',
  'codebase-map',
  'deployment-log',
  'user-preferences',
]

export function findAgentDir(): string {
  // Walk up from cwd looking for an existing .cofounder/ directory
  let dir = process.cwd()
  while (dir !== path.dirname(dir)) {
    const candidate = path.join(dir, AGENT_DIRNAME)
    if (existsSync(candidate)) return candidate
    dir = path.dirname(dir)
  }
  // None found: default to project root (where .git lives)
  dir = process.cwd()
  while (dir !== path.dirname(dir)) {
    if (existsSync(path.join(dir, '.git'))) {
      return path.join(dir, AGENT_DIRNAME)
    }
    dir = path.dirname(dir)
  }
  return path.resolve(AGENT_DIRNAME)
}

const backoffSchema = z.object({
  initialMs: z.number().nonnegative().default(1000),
  maxMs: z.number().nonnegative().default(10000),
  factor: z.number().min(1).default(2),
  jitter: z.number().min(0).max(1).default(0.1),
})

const categoryName = z
  .string()
  .regex(/^[a-z0-9][a-z0-9_-]*$/, 'category names are lower-case slugs')

const configSchema = z.object({
  model: z
    .object({
      provider: z.enum(['ollama', 'openai-compatible']).default('ollama'),
      host: z.string().url().default('http://localhost:11434'),
      model: z.string().min(1).default('qwen2.5:7b-instruct'),
      maxInputTokens: z.number().int().positive().default(8192),
      maxOutputTokens: z.number().int().positive().default(4096),
      temperature: z.number().min(0).max(2).default(0.2),
      timeoutMs: z.number().int().positive().default(300000),
    })
    .default({}),
  context: z
    .object({
      budget: z.number().int().positive().default(32000),
      unit: z.enum(['tokens', 'chars']).default('tokens'),
      categories: z.array(categoryName).min(1).default(DEFAULT_CATEGORIES),
      maxEntriesPerCategory: z.number().int().positive().default(50),
      policy: z.enum(['drop-oldest', 'summarize-oldest']).default('drop-oldest'),
      snapshotTokens: z.number().int().positive().default(4000),
    })
    .default({}),
  executor: z
    .object({
      checkpointEvery: z.number().int().positive().default(5),
      maxAttempts: z.number().int().positive().default(2),
      retryBackoff: backoffSchema.default({}),
      stepTimeoutMs: z.number().int().nonnegative().default(600000),
      ioTimeoutMs: z.number().int().nonnegative().default(10000),
      maxSteps: z.number().int().positive().default(10),
      deleteCheckpointsOnSuccess: z.boolean().default(true),
      maxCheckpointsPerTask: z.number().int().positive().default(10),
      maxRetainedTasks: z.number().int().positive().default(100),
    })
    .default({}),
  router: z
    .object({
      keywordsFile: z.string().optional(),
      extraPhrases: z.array(z.string().min(1)).default([]),
    })
    .default({}),
})

export type YamlConfig = z.input<typeof configSchema>

function loadYamlConfig(agentDir: string): unknown {
  const configPath = path.join(agentDir, CONFIG_FILENAME)
  if (!existsSync(configPath)) {
    return null
  }
  try {
    return parse(readFileSync(configPath, 'utf-8'))
  } catch (err) {
    log.warn(
      { configPath, err: err instanceof Error ? err.message : String(err) },
      'Could not parse config file, using defaults',
    )
    return null
  }
}

/**
 * Validate a raw config object (as read from YAML) and fill in defaults.
 * Throws ConfigError listing every invalid field.
 */
export function resolveConfig(raw: unknown, agentDir: string): CofounderConfig {
  const parsed = configSchema.safeParse(raw ?? {})
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new ConfigError(`Invalid configuration: ${problems}`)
  }

  const { model, context, executor, router } = parsed.data
  const keywordsFile = router.keywordsFile
    ? path.resolve(agentDir, router.keywordsFile)
    : undefined

  return {
    agentDir,
    model: {
      ...model,
      model: process.env.COFOUNDER_MODEL || model.model,
      host: process.env.COFOUNDER_MODEL_HOST || model.host,
    },
    context,
    executor,
    router: { ...router, keywordsFile },
  }
}

/**
 * Load `config.yaml` from the agent directory. A file that cannot be
 * parsed or fails validation is reported and replaced by the defaults.
 */
export function loadConfig(agentDir?: string): CofounderConfig {
  const dir = agentDir ?? process.env.COFOUNDER_DIR ?? findAgentDir()
  try {
    return resolveConfig(loadYamlConfig(dir), dir)
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err
    log.warn({ agentDir: dir, err: err.message }, 'Invalid config file, using defaults')
    return resolveConfig({}, dir)
  }
}
