/**
 * 统一日志系统
 *
 * - 分级日志（debug/info/warn/error/silent）
 * - 前台（终端）只显示时间与级别；后台（CI）额外带 scope
 * - 所有日志写 stderr，stdout 留给 matrix JSON 等数据输出
 *
 * 使用：createLogger('runner').info(...)；setLogLevel('debug')
 */

import chalk from 'chalk'
import { getErrorMessage } from './assertError.js'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'
export type LogMode = 'foreground' | 'background'

type ActiveLevel = Exclude<LogLevel, 'silent'>

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 }

const BADGES: Record<ActiveLevel, string> = {
  debug: chalk.gray('DBG'),
  info: chalk.blue('INF'),
  warn: chalk.yellow('WRN'),
  error: chalk.red('ERR'),
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVELS
}

export function isLogMode(value: string): value is LogMode {
  return value === 'foreground' || value === 'background'
}

function levelFromEnv(): LogLevel {
  const { NODE_ENV, SILENT, DEBUG, LOG_LEVEL } = process.env
  if (NODE_ENV === 'test' || SILENT === '1') return 'silent'
  if (DEBUG === '1') return 'debug'
  return LOG_LEVEL && isLogLevel(LOG_LEVEL) ? LOG_LEVEL : 'info'
}

// CI 没有 TTY，需要 scope 才能在交错的日志里定位
function modeFromEnv(): LogMode {
  if (process.env.PERFGATE_BACKGROUND === '1' || process.env.CI === 'true') return 'background'
  return process.stderr.isTTY ? 'foreground' : 'background'
}

let currentLevel: LogLevel = levelFromEnv()
let currentMode: LogMode = modeFromEnv()

export function setLogLevel(level: LogLevel): void {
  currentLevel = level
}

export function setLogMode(mode: LogMode): void {
  currentMode = mode
}

function timestamp(): string {
  return chalk.dim(new Date().toTimeString().slice(0, 8))
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
}

export function createLogger(scope: string = ''): Logger {
  const write =
    (level: ActiveLevel) =>
    (message: string, ...args: unknown[]): void => {
      if (LEVELS[level] < LEVELS[currentLevel]) return
      const prefix = currentMode === 'background' && scope ? `${BADGES[level]} ${chalk.cyan(`[${scope}]`)}` : BADGES[level]
      console.error(`${timestamp()} ${prefix} ${message}`, ...args)
    }

  return { debug: write('debug'), info: write('info'), warn: write('warn'), error: write('error') }
}

// ============ 错误日志 ============

/** 错误上下文 */
export interface ErrorContext {
  caseId?: string
  benchmark?: string
  feature?: string
  /** head / base */
  side?: string
  [key: string]: unknown
}

/**
 * 记录带上下文的错误日志，堆栈只保留前 5 帧
 *
 * @example
 * logError(logger, 'Case failed', err, { caseId: 'a1b2c3d4e5', side: 'base' })
 */
export function logError(logger: Logger, message: string, error: unknown, context?: ErrorContext): void {
  const data: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(context ?? {})) {
    if (value !== undefined) data[key] = value
  }
  if (error instanceof Error && error.stack) {
    data.stack = error.stack.split('\n').slice(0, 6).join('\n')
  }

  const text = `${message}: ${getErrorMessage(error)}`
  if (Object.keys(data).length > 0) logger.error(text, data)
  else logger.error(text)
}
