import { readFile } from 'node:fs/promises'
import { parse as parseToml } from 'smol-toml'
import { ConfigError, describeError } from './errors.js'
import type { ModelSettings, ResolvedConfig } from './types.js'

export const DEFAULT_ENDPOINT = 'http://localhost:11434/v1/chat/completions'
export const DEFAULT_MODEL = 'qwen2.5vl'

export type ModelOverrides = {
  endpoint?: string | null
  model?: string | null
  allowEmptyPages?: boolean
}

export type CliOverrides = ModelOverrides & {
  inputPath: string
  outputPath?: string | null
}

export type FileConfig = {
  endpoint?: string
  model?: string
  apiKey?: string
  allowEmptyPages?: boolean
}

export type ConfigEnv = Record<string, string | undefined>

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function firstNonBlank(...values: Array<string | null | undefined>): string | undefined {
  for (const value of values) {
    const trimmed = String(value ?? '').trim()
    if (trimmed) return trimmed
  }
  return undefined
}

function assertHttpUrl(value: string) {
  let url: URL
  try {
    url = new URL(value)
  } catch {
    throw new ConfigError('CONFIG_INVALID', `endpoint is not a valid URL: ${value}`)
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigError('CONFIG_INVALID', `endpoint must use http or https: ${value}`)
  }
}

// Keys may sit at the top level or under an [llm] table.
export function readFileConfig(data: Record<string, unknown>): FileConfig {
  const base = isRecord(data.llm) ? data.llm : data
  const config: FileConfig = {}
  if (typeof base.endpoint === 'string') config.endpoint = base.endpoint
  if (typeof base.model === 'string') config.model = base.model
  if (typeof base.api_key === 'string') config.apiKey = base.api_key
  if (typeof base.allow_empty_pages === 'boolean') config.allowEmptyPages = base.allow_empty_pages
  return config
}

export async function loadConfigFile(configPath: string | null | undefined): Promise<FileConfig> {
  if (!configPath) return {}

  let source: string
  try {
    source = await readFile(configPath, 'utf8')
  } catch (error) {
    throw new ConfigError('CONFIG_NOT_FOUND', `config file not found: ${configPath}`, { cause: error })
  }

  try {
    return readFileConfig(parseToml(source))
  } catch (error) {
    throw new ConfigError('CONFIG_INVALID', `${configPath}: ${describeError(error)}`, { cause: error })
  }
}

/**
 * Layers CLI flags over the config file, the environment and defaults. The API key never
 * comes from the command line: config file, then DOC2MD_API_KEY, then PDF2MARKDOWN_API_KEY,
 * then OPENAI_API_KEY.
 */
export function resolveModelSettings(params: { cli: ModelOverrides; file?: FileConfig; env?: ConfigEnv }): ModelSettings {
  const file = params.file ?? {}
  const env = params.env ?? {}

  const endpoint = firstNonBlank(params.cli.endpoint, file.endpoint, env.DOC2MD_ENDPOINT) ?? DEFAULT_ENDPOINT
  assertHttpUrl(endpoint)

  return Object.freeze({
    endpoint,
    model: firstNonBlank(params.cli.model, file.model, env.DOC2MD_MODEL) ?? DEFAULT_MODEL,
    apiKey: firstNonBlank(file.apiKey, env.DOC2MD_API_KEY, env.PDF2MARKDOWN_API_KEY, env.OPENAI_API_KEY) ?? null,
    allowEmptyPages: params.cli.allowEmptyPages || file.allowEmptyPages || false
  })
}

export function resolveConfig(params: { cli: CliOverrides; file?: FileConfig; env?: ConfigEnv }): ResolvedConfig {
  const settings = resolveModelSettings(params)

  const inputPath = firstNonBlank(params.cli.inputPath)
  if (!inputPath) {
    throw new ConfigError('CONFIG_INVALID', 'missing input path')
  }

  return Object.freeze({
    ...settings,
    inputPath,
    outputPath: firstNonBlank(params.cli.outputPath) ?? null
  })
}
