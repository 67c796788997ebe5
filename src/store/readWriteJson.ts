/**
 * JSON 文件读写工具
 *
 * 统一 matrix / result / summary 等 JSON 产物的读写，写入默认原子化。
 */

import { existsSync, readFileSync, writeFileSync, renameSync, mkdirSync } from 'fs'
import { dirname } from 'path'
import type { z } from 'zod'
import { AppError } from '../shared/error.js'
import { createLogger } from '../shared/logger.js'
import { getErrorMessage } from '../shared/assertError.js'

const logger = createLogger('json-io')

export interface JsonWriteOptions {
  /** 是否使用原子写入 (先写临时文件再 rename)，默认 true */
  atomic?: boolean
  /** JSON 缩进空格数，默认 2 */
  indent?: number
}

/**
 * 解析 JSON 文本并按 schema 校验
 *
 * @param what - 出错时用于提示的数据名称
 * @throws AppError 文本不是合法 JSON 或不符合 schema
 */
export function parseJson<S extends z.ZodTypeAny>(text: string, schema: S, what: string): z.output<S> {
  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (e) {
    throw AppError.malformedInput(what, getErrorMessage(e))
  }

  const result = schema.safeParse(raw)
  if (!result.success) {
    const issue = result.error.issues[0]
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : ''
    throw AppError.malformedInput(what, `${issue?.message ?? 'schema mismatch'}${where}`)
  }
  return result.data
}

/**
 * 同步读取并校验 JSON 文件
 *
 * @returns 校验后的数据，文件不存在返回 null
 * @throws AppError 文件存在但内容不合法
 */
export function readJson<S extends z.ZodTypeAny>(filepath: string, schema: S): z.output<S> | null {
  if (!existsSync(filepath)) {
    logger.debug(`JSON file not found: ${filepath}`)
    return null
  }
  return parseJson(readFileSync(filepath, 'utf-8'), schema, filepath)
}

/**
 * 同步写入 JSON 文件
 *
 * 默认使用原子写入（先写临时文件再 rename），防止写入中断导致下一次运行读到半个文件。
 */
export function writeJson(filepath: string, data: unknown, options?: JsonWriteOptions): void {
  const indent = options?.indent ?? 2
  const atomic = options?.atomic ?? true
  const content = JSON.stringify(data, null, indent)

  ensureDir(dirname(filepath))

  if (atomic) {
    const tempPath = `${filepath}.tmp`
    writeFileSync(tempPath, content, 'utf-8')
    renameSync(tempPath, filepath)
  } else {
    writeFileSync(filepath, content, 'utf-8')
  }
}

/**
 * 写入纯文本文件（报告、错误日志）
 */
export function writeText(filepath: string, content: string): void {
  ensureDir(dirname(filepath))
  writeFileSync(filepath, content, 'utf-8')
}

/**
 * 确保目录存在
 */
export function ensureDir(dirpath: string): void {
  if (!existsSync(dirpath)) {
    mkdirSync(dirpath, { recursive: true })
  }
}
