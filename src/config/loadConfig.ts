import { readFile } from 'fs/promises'
import { existsSync } from 'fs'
import { join } from 'path'
import { homedir } from 'os'
import YAML from 'yaml'
import dotenv from 'dotenv'
import { createLogger } from '../shared/logger.js'
import { AppError } from '../shared/error.js'
import { configSchema, type Config } from './schema.js'

const logger = createLogger('config')

const CONFIG_FILENAME = '.stack-sentinel.yaml'

let cachedConfig: Config | null = null

/**
 * 查找配置文件路径（全局 + 项目）
 * 全局配置为基底，项目配置覆盖其上
 */
function findConfigPaths(cwd?: string): { globalPath: string | null; projectPath: string | null } {
  const homePath = join(homedir(), CONFIG_FILENAME)
  const projectDir = cwd || process.cwd()
  const projectPath = join(projectDir, CONFIG_FILENAME)

  // 项目目录与 home 目录相同时，不重复加载
  const isHomeCwd = projectDir === homedir()

  return {
    globalPath: existsSync(homePath) ? homePath : null,
    projectPath: !isHomeCwd && existsSync(projectPath) ? projectPath : null,
  }
}

/**
 * 载入 cwd 下的 .env（如存在）
 * 已存在的环境变量优先，不会被 .env 覆盖
 */
function loadDotEnv(cwd: string): void {
  const envPath = join(cwd, '.env')
  if (!existsSync(envPath)) return
  logger.debug(`Loading ${envPath}`)
  const result = dotenv.config({ path: envPath })
  if (result.error) {
    logger.warn(`Failed to read ${envPath}: ${result.error.message}`)
  }
}

/**
 * 加载配置
 * 查找顺序：项目目录 → ~/.stack-sentinel.yaml → 默认配置，最后叠加环境变量
 * 结果缓存，整个进程只解析一次
 */
export async function loadConfig(options: { cwd?: string } = {}): Promise<Config> {
  if (cachedConfig) return cachedConfig

  const cwd = options.cwd ?? process.cwd()
  loadDotEnv(cwd)

  const { globalPath, projectPath } = findConfigPaths(cwd)

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

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Parse YAML file, returning empty object for empty/comment-only files
 */
async function parseYamlFile(filePath: string): Promise<Record<string, unknown>> {
  const content = await readFile(filePath, 'utf-8')
  const parsed: unknown = YAML.parse(content)
  return isPlainObject(parsed) ? parsed : {}
}

/**
 * Merge config objects: project fields override global fields.
 * Nested objects are merged, arrays are replaced.
 */
function deepMergeConfig(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...base }
  for (const key of Object.keys(override)) {
    const val = override[key]
    if (val === undefined || val === null) continue
    const existing = result[key]
    result[key] = isPlainObject(val) && isPlainObject(existing) ? deepMergeConfig(existing, val) : val
  }
  return result
}

/** 空字符串视为未设置 */
function readEnv(name: string): string | undefined {
  const value = process.env[name]?.trim()
  return value ? value : undefined
}

/**
 * Apply environment variable overrides to config.
 * OLLAMA_HOSTNAME / TRAEFIK_HOSTNAME 与 compose 的 .env 共用，
 * 其余覆盖项统一使用 SENTINEL_ 前缀。
 */
export function applyEnvOverrides(config: Config): Config {
  const adminHostname = readEnv('TRAEFIK_HOSTNAME')
  const frontendHostname = readEnv('OLLAMA_HOSTNAME')
  if (adminHostname || frontendHostname) {
    config = {
      ...config,
      hostnames: {
        admin: adminHostname ?? config.hostnames.admin,
        frontend: frontendHostname ?? config.hostnames.frontend,
      },
    }
  }

  const host = readEnv('SENTINEL_HOST')
  if (host) {
    config = { ...config, target: { ...config.target, host } }
  }

  const composeFile = readEnv('SENTINEL_COMPOSE_FILE')
  const composeProject = readEnv('SENTINEL_COMPOSE_PROJECT')
  if (composeFile || composeProject) {
    config = {
      ...config,
      compose: {
        ...config.compose,
        file: composeFile ?? config.compose.file,
        project: composeProject ?? config.compose.project,
      },
    }
  }

  const container = readEnv('SENTINEL_CONTAINER')
  const cooldown = readEnv('SENTINEL_COOLDOWN')
  if (container || cooldown) {
    const recovery = configSchema.shape.recovery.safeParse({
      ...config.recovery,
      ...(container ? { container } : {}),
      ...(cooldown ? { cooldown } : {}),
    })
    if (!recovery.success) {
      throw AppError.configInvalid(recovery.error.issues.map(i => i.message).join('; '))
    }
    config = { ...config, recovery: recovery.data }
  }

  return config
}

/**
 * 获取默认配置
 */
export function getDefaultConfig(): Config {
  return configSchema.parse({})
}

/**
 * 清除配置缓存
 */
export function clearConfigCache(): void {
  cachedConfig = null
}
