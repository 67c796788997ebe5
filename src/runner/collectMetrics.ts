/**
 * 指标采集
 *
 * 在构建输出目录中查找 callgrind 产物，解析 summary 行并求和。
 * 文件名里带进程号等不可预测后缀，目录也可能残留旧产物，
 * 因此按 "执行开始后新增或修改" 过滤，并对文件名做归一化。
 */

import { createReadStream, existsSync, readdirSync, statSync } from 'fs'
import { join, relative, sep } from 'path'
import { createInterface } from 'readline'
import { createLogger } from '../shared/logger.js'
import type { MetricEntry, MetricSet } from './types.js'

const logger = createLogger('metrics')

export const SUMMARY_MARKER = 'summary:'
/** 每个文件最多读取的行数 */
export const MAX_SCAN_LINES = 300
/** 时间过滤无结果时回退到最近修改的文件数 */
export const FALLBACK_FILE_COUNT = 20

/**
 * 是否符合 callgrind 产物命名约定
 */
export function isProfilerFile(name: string): boolean {
  return name.includes('callgrind.out') || name.startsWith('callgrind.')
}

/**
 * 递归扫描目录中的 profiler 产物，返回绝对路径
 */
export function scanProfilerFiles(dir: string): string[] {
  if (!existsSync(dir)) return []

  const found: string[] = []
  const walk = (current: string): void => {
    for (const entry of readdirSync(current, { withFileTypes: true })) {
      const path = join(current, entry.name)
      if (entry.isDirectory()) {
        walk(path)
      } else if (entry.isFile() && isProfilerFile(entry.name)) {
        found.push(path)
      }
    }
  }
  walk(dir)
  return found
}

/**
 * 归一化 metric 名
 *
 * 去掉末尾的 ".<数字>"（进程号、线程号等，可能连续多段），使 base/head 的同类产物得到同一个 key。幂等。
 */
export function normalizeMetricName(relativePath: string): string {
  return relativePath.split(sep).join('/').replace(/(?:\.\d+)+$/, '')
}

/**
 * 从一行 summary 中解析首个数值
 *
 * 新版 callgrind 的 summary 可能有多个事件值，只比较第一个（主事件）。
 */
export function parseSummaryValue(line: string): number | null {
  if (!line.startsWith(SUMMARY_MARKER)) return null
  const token = line.slice(SUMMARY_MARKER.length).trim().split(/\s+/)[0]
  if (!token || !/^[+-]?\d+$/.test(token)) return null
  return Number.parseInt(token, 10)
}

/**
 * 读取文件前 MAX_SCAN_LINES 行，返回首个 summary 值
 *
 * 读取或解析失败返回 null，调用方直接丢弃该文件。
 */
export async function readSummary(path: string): Promise<number | null> {
  let stream: ReturnType<typeof createReadStream> | null = null
  try {
    stream = createReadStream(path, { encoding: 'utf-8' })
    const lines = createInterface({ input: stream, crlfDelay: Infinity })
    let count = 0
    for await (const line of lines) {
      if (++count > MAX_SCAN_LINES) break
      if (line.startsWith(SUMMARY_MARKER)) {
        return parseSummaryValue(line)
      }
    }
    return null
  } catch (e) {
    logger.debug(`Unreadable profiler file ${path}: ${String(e)}`)
    return null
  } finally {
    stream?.destroy()
  }
}

/**
 * 亚毫秒精度的当前时间（epoch 毫秒）
 *
 * mtimeMs 带小数部分，用 Date.now() 取整后的开始时间会把同一毫秒内更早写入的旧文件当成新文件。
 */
export function preciseNowMs(): number {
  return performance.timeOrigin + performance.now()
}

function mtimeOf(path: string): number {
  return statSync(path).mtimeMs
}

/**
 * 选择本次执行产生的文件
 *
 * 新出现的文件，或开始时间之后修改过的文件；
 * 都没有时（时钟精度问题）回退到最近修改的 FALLBACK_FILE_COUNT 个。
 */
export function selectFreshFiles(files: readonly string[], startMs: number, before: ReadonlySet<string>): string[] {
  const selected = files.filter(path => !before.has(path) || mtimeOf(path) >= startMs)
  if (selected.length > 0) return selected

  return [...files].sort((a, b) => mtimeOf(b) - mtimeOf(a)).slice(0, FALLBACK_FILE_COUNT)
}

/**
 * 采集构建目录中的指标
 *
 * @param targetDir - 构建输出目录
 * @param startMs - 执行开始时间（epoch 毫秒）
 * @param before - 执行前已存在的产物路径
 */
export async function collectMetrics(
  targetDir: string,
  startMs: number,
  before: ReadonlySet<string>
): Promise<MetricSet> {
  const files = scanProfilerFiles(targetDir)
  const selected = selectFreshFiles(files, startMs, before).sort()

  // 不同进程的产物归一化后同名，合并求和，保证每个 metric 只出现一次
  const byName = new Map<string, number>()
  for (const path of selected) {
    const value = await readSummary(path)
    if (value === null) continue
    const metric = normalizeMetricName(relative(targetDir, path))
    byName.set(metric, (byName.get(metric) ?? 0) + value)
  }

  const metrics: MetricEntry[] = [...byName.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([metric, value]) => Object.freeze({ metric, value }))
  const total = metrics.reduce((sum, m) => sum + m.value, 0)
  logger.debug(`Collected ${metrics.length}/${files.length} metric file(s) from ${targetDir}, total=${total}`)

  return Object.freeze({ total, metrics: Object.freeze(metrics) })
}
