/**
 * 输入规范化
 *
 * benchmark / feature-set 描述既可以是字符串也可以是对象，
 * 在边界处统一转换为规范结构，其它形态一律视为配置错误。
 */

import { z } from 'zod'
import { AppError } from '../shared/error.js'
import { parseJson } from '../store/readWriteJson.js'
import { DEFAULT_FEATURE_SET, type BenchmarkSpec, type FeatureSet } from './types.js'

export const benchmarkObjectSchema = z.object({
  name: z.string().optional(),
  command: z.string().optional(),
  bench: z.string().optional(),
  package: z.string().optional(),
  manifest_path: z.string().optional(),
  args: z.string().optional(),
})

export const featureSetObjectSchema = z.object({
  name: z.string().optional(),
  features: z.string().optional(),
  no_default_features: z.boolean().optional(),
})

export const benchmarkInputSchema = z.union([z.string(), benchmarkObjectSchema])
export const featureSetInputSchema = z.union([z.string(), featureSetObjectSchema])

export type BenchmarkInput = z.infer<typeof benchmarkInputSchema>
export type FeatureSetInput = z.infer<typeof featureSetInputSchema>

const benchmarkListSchema = z.array(benchmarkInputSchema, {
  invalid_type_error: 'benchmarks must be a JSON array',
})
const featureSetListSchema = z.array(featureSetInputSchema, {
  invalid_type_error: 'feature sets must be a JSON array',
})

function validate<S extends z.ZodTypeAny>(raw: unknown, schema: S, what: string): z.output<S> {
  const result = schema.safeParse(raw)
  if (!result.success) {
    const issue = result.error.issues[0]
    throw AppError.malformedInput(what, issue?.message ?? 'schema mismatch')
  }
  return result.data
}

/**
 * 规范化单个 benchmark 描述
 */
export function normalizeBenchmark(entry: BenchmarkInput): BenchmarkSpec {
  if (typeof entry === 'string') {
    return { name: entry, bench: entry }
  }
  return {
    ...entry,
    name: entry.name || entry.bench || 'benchmark',
  }
}

/**
 * 规范化单个特性集
 */
export function normalizeFeatureSet(entry: FeatureSetInput): FeatureSet {
  if (typeof entry === 'string') {
    return { name: entry, features: entry, no_default_features: false }
  }
  return {
    name: entry.name || entry.features || DEFAULT_FEATURE_SET.name,
    features: entry.features ?? '',
    no_default_features: entry.no_default_features ?? false,
  }
}

/**
 * 规范化 benchmark 列表（null / undefined 视为空列表）
 */
export function normalizeBenchmarks(raw: unknown): BenchmarkSpec[] {
  if (raw === null || raw === undefined) return []
  return validate(raw, benchmarkListSchema, 'benchmarks').map(normalizeBenchmark)
}

/**
 * 规范化特性集列表，空列表回退到隐式 default 特性集
 */
export function normalizeFeatureSets(raw: unknown): FeatureSet[] {
  if (raw === null || raw === undefined) return [DEFAULT_FEATURE_SET]
  const normalized = validate(raw, featureSetListSchema, 'feature sets').map(normalizeFeatureSet)
  return normalized.length > 0 ? normalized : [DEFAULT_FEATURE_SET]
}

/**
 * 解析命令行传入的 benchmark JSON 数组，空字符串视为未提供
 */
export function parseBenchmarksJson(text: string | undefined): BenchmarkInput[] | undefined {
  if (text === undefined || text.trim() === '') return undefined
  return parseJson(text, benchmarkListSchema, 'benchmarks')
}

/**
 * 解析命令行传入的特性集 JSON 数组，空字符串视为未提供
 */
export function parseFeatureSetsJson(text: string | undefined): FeatureSetInput[] | undefined {
  if (text === undefined || text.trim() === '') return undefined
  return parseJson(text, featureSetListSchema, 'feature sets')
}
