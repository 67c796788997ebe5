/**
 * 历史 / summary 载荷的 schema
 *
 * 上一次运行写出的 summary.json 是这一次的输入，读取时必须严格校验，
 * 不合法即为配置错误，而不是静默丢弃历史。
 */

import { z } from 'zod'
import { readJson, writeJson } from '../store/readWriteJson.js'
import type { HistoryEntry, Summary } from './types.js'

export const historyEntrySchema = z.object({
  commit: z.string().min(1),
  run_at: z.string(),
  summary: z.object({
    improved: z.number().int().nonnegative(),
    regressions: z.number().int().nonnegative(),
    neutral: z.number().int().nonnegative(),
  }),
  avg_bench_delta_pct: z.number().nullable(),
  avg_metric_delta_pct: z.number().nullable(),
  has_regressions: z.boolean(),
})

export const summarySchema = z.object({
  has_regressions: z.boolean(),
  count: z.number().int().nonnegative(),
  latest: historyEntrySchema,
  history: z.array(historyEntrySchema),
})

/**
 * 读取上一次运行的历史；文件不存在时为空
 */
export function loadHistory(path: string | undefined): HistoryEntry[] {
  if (!path) return []
  const summary: Summary | null = readJson(path, summarySchema)
  return summary ? [...summary.history] : []
}

export function writeSummary(path: string, summary: Summary): void {
  writeJson(path, summary)
}
