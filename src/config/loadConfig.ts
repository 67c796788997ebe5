import { readFile } from 'fs/promises'
import { existsSync } from 'fs'
import { join } from 'path'
import { homedir } from 'os'
import YAML from 'yaml'
import { createLogger } from '../shared/logger.js'
import { AppError } from '../shared/error.js'
import { getErrorMessage } from '../shared/assertError.js'
import { configSchema, type Config } from './schema.js'

const logger = createLogger('config')

export const CONFIG_FILENAME = '.perfgate.yaml'

let cachedConfig: Config | null = null
let cachedFor: string | null = null

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

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * 解析 YAML 文件，空文件 / 仅注释返回空对象
 *
 * @throws AppError 语法错误或顶层不是映射
 */
async function parseYamlFile(filePath: string): Promise<Record<string, unknown>> {
  const content = await readFile(filePath, 'utf-8')
  let parsed: unknown
  try {
    parsed = YAML.parse(content)
  } catch (error) {
    throw AppError.configInvalid(`${filePath}: ${getErrorMessage(error)}`, error)
  }
  if (parsed === null || parsed === undefined) return {}
  if (!isPlainObject(parsed)) {
    throw AppError.configInvalid(`${filePath}: top level must be a mapping`)
  }
  return parsed
}

/**
 * 浅合并：项目字段覆盖全局字段，数组整体替换
 */
function mergeConfig(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result = { ...base }
  for (const [key, val] of Object.entries(override)) {
    if (val !== undefined && val !== null) result[key] = val
  }
  return result
}

/**
 * 加载配置
 * 查找顺序：项目目录 → ~/.perfgate.yaml → 默认配置
 *
 * 文件缺失不是错误；文件存在但内容不合法时抛出配置错误。
 */
export async function loadConfig(options: { cwd?: string } = {}): Promise<Config> {
  const key = options.cwd || process.cwd()
  if (cachedConfig && cachedFor === key) return cachedConfig

  const { globalPath, projectPath } = findConfigPaths(options.cwd)

  let config: Config
  if (!globalPath && !projectPath) {
    config = getDefaultConfig()
  } else {
    const globalRaw = globalPath ? await parseYamlFile(globalPath) : {}
    const projectRaw = projectPath ? await parseYamlFile(projectPath) : {}
    const result = configSchema.safeParse(mergeConfig(globalRaw, projectRaw))
    if (!result.success) {
      const issue = result.error.issues[0]
      const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : ''
      throw AppError.configInvalid(`${projectPath ?? globalPath}: ${where}${issue?.message ?? 'schema mismatch'}`)
    }
    config = result.data
    logger.debug(`Loaded config from ${[globalPath, projectPath].filter(Boolean).join(' + ')}`)
  }

  cachedConfig = applyEnvOverrides(config)
  cachedFor = key
  return cachedConfig
}

function readNumberEnv(name: string, integer: boolean): number | undefined {
  const raw = process.env[name]
  if (raw === undefined || raw.trim() === '') return undefined
  const value = Number(raw)
  if (!Number.isFinite(value) || value <= 0 || (integer && !Number.isInteger(value))) {
    throw AppError.configInvalid(`${name} must be a ${integer ? 'positive integer' : 'positive number'}, got '${raw}'`)
  }
  return value
}

/**
 * 环境变量覆盖
 * 在 schema 校验之后执行，这里单独校验数值
 */
export function applyEnvOverrides(config: Config): Config {
  const threshold = readNumberEnv('PERFGATE_THRESHOLD', false)
  const maxHistory = readNumberEnv('PERFGATE_MAX_HISTORY', true)
  const jobs = readNumberEnv('PERFGATE_JOBS', true)

  if (threshold !== undefined) config = { ...config, threshold }
  if (maxHistory !== undefined) config = { ...config, maxHistory }
  if (jobs !== undefined) config = { ...config, jobs }

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
  cachedFor = null
}
