/**
 * result.json 的序列化与校验
 *
 * JSON 没有 NaN / Infinity，不可比较的 delta_pct 写为 null，读回时还原为 NaN。
 */

import { z } from 'zod'
import { parseJson, readJson, writeJson } from '../store/readWriteJson.js'
import type { ComparisonResult } from './types.js'

export const RESULT_FILE_NAME = 'result.json'

const metricEntrySchema = z.object({
  metric: z.string(),
  value: z.number().int(),
})

const nullableString = z.string().nullable().optional().transform(v => v ?? null)
const nullableInt = z.number().int().nullable().optional().transform(v => v ?? null)

export const comparisonResultSchema = z.object({
  benchmark_name: z.string(),
  feature_name: z.string(),
  command: z.string(),
  base_total: z.number(),
  head_total: z.number(),
  delta: z.number(),
  delta_pct: z
    .number()
    .nullable()
    .transform(v => v ?? Number.NaN),
  head_metrics: z.array(metricEntrySchema).default([]),
  base_metrics: z.array(metricEntrySchema).default([]),
  head_missing: z.boolean().default(false),
  base_missing: z.boolean().default(false),
  head_missing_reason: nullableString,
  base_missing_reason: nullableString,
  head_error: z.boolean().default(false),
  base_error: z.boolean().default(false),
  head_error_code: nullableInt,
  base_error_code: nullableInt,
  head_error_reason: nullableString,
  base_error_reason: nullableString,
  head_error_output: nullableString,
  base_error_output: nullableString,
})

/**
 * 转换为可写入 JSON 的对象（非有限数写为 null）
 */
export function toArtifact(result: ComparisonResult): Record<string, unknown> {
  return {
    ...result,
    delta_pct: Number.isFinite(result.delta_pct) ? result.delta_pct : null,
  }
}

export function parseResultArtifact(text: string, source = RESULT_FILE_NAME): ComparisonResult {
  return parseJson(text, comparisonResultSchema, source)
}

export function readResultArtifact(path: string): ComparisonResult | null {
  return readJson(path, comparisonResultSchema)
}

export function writeResultArtifact(path: string, result: ComparisonResult): void {
  writeJson(path, toArtifact(result))
}
