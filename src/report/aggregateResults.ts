/**
 * 结果聚合
 * 按特性集分组统计改进 / 退化 / 持平，并计算平均差值
 */

import type { ComparisonResult } from '../runner/types.js'
import { classifyDelta, metricDeltaPct } from './classifyDelta.js'
import type { Aggregate, ClassifiedResult, GroupSummary, HistoryEntry, RunMetadata, StatusCounts } from './types.js'

/**
 * 有限值的算术平均；没有有限值时返回 null
 */
export function mean(values: readonly number[]): number | null {
  const finite = values.filter(Number.isFinite)
  if (finite.length === 0) return null
  return finite.reduce((sum, v) => sum + v, 0) / finite.length
}

/**
 * 单个结果的逐 metric 差值（两侧 metric 名取并集，缺失的一侧按 0 计）
 */
export function metricDeltas(result: ComparisonResult): number[] {
  const base = new Map(result.base_metrics.map(m => [m.metric, m.value]))
  const head = new Map(result.head_metrics.map(m => [m.metric, m.value]))
  const names = [...new Set([...base.keys(), ...head.keys()])].sort()
  return names.map(name => metricDeltaPct(base.get(name) ?? 0, head.get(name) ?? 0))
}

export function isSkipped(result: ComparisonResult): boolean {
  return result.head_missing || result.base_missing
}

export function isFailed(result: ComparisonResult): boolean {
  return result.head_error || result.base_error
}

function tally(entries: readonly ClassifiedResult[]): StatusCounts {
  let improved = 0
  let regressions = 0
  let neutral = 0
  for (const { status } of entries) {
    if (status === 'regression') regressions++
    else if (status === 'improved') improved++
    // slight_regression / unknown 不计为退化
    else neutral++
  }
  return { improved, regressions, neutral }
}

function byBenchmarkName(a: ComparisonResult, b: ComparisonResult): number {
  return a.benchmark_name < b.benchmark_name ? -1 : a.benchmark_name > b.benchmark_name ? 1 : 0
}

function summarizeGroup(featureName: string, results: readonly ComparisonResult[], threshold: number): GroupSummary {
  const sorted = [...results].sort(byBenchmarkName)
  // error 优先于 missing：只要有一侧出错，该 Case 就算失败
  const failed = sorted.filter(isFailed)
  const skipped = sorted.filter(r => !isFailed(r) && isSkipped(r))
  const comparable = sorted.filter(r => !isFailed(r) && !isSkipped(r))

  const entries = comparable.map(result => ({ result, status: classifyDelta(result.delta_pct, threshold) }))

  return {
    feature_name: featureName,
    ...tally(entries),
    entries,
    skipped,
    failed,
    avg_bench_delta_pct: mean(comparable.map(r => r.delta_pct)),
    avg_metric_delta_pct: mean(comparable.flatMap(metricDeltas)),
  }
}

/**
 * 聚合全部结果
 *
 * missing / error 的结果不计入三类统计与均值，分别列入 skipped / failed。
 */
export function aggregateResults(results: readonly ComparisonResult[], threshold: number): Aggregate {
  const grouped = new Map<string, ComparisonResult[]>()
  for (const result of results) {
    const list = grouped.get(result.feature_name) ?? []
    list.push(result)
    grouped.set(result.feature_name, list)
  }

  const groups = [...grouped.keys()].sort().map(name => summarizeGroup(name, grouped.get(name) ?? [], threshold))

  const comparable = groups.flatMap(g => g.entries.map(e => e.result))
  const totals = groups.reduce<StatusCounts>(
    (acc, g) => ({
      improved: acc.improved + g.improved,
      regressions: acc.regressions + g.regressions,
      neutral: acc.neutral + g.neutral,
    }),
    { improved: 0, regressions: 0, neutral: 0 }
  )

  return {
    ...totals,
    groups,
    avg_bench_delta_pct: mean(comparable.map(r => r.delta_pct)),
    avg_metric_delta_pct: mean(comparable.flatMap(metricDeltas)),
    has_regressions: totals.regressions > 0,
    has_errors: results.some(isFailed),
    skipped_count: groups.reduce((n, g) => n + g.skipped.length, 0),
    failed_count: groups.reduce((n, g) => n + g.failed.length, 0),
  }
}

/**
 * 由聚合结果生成本次运行的历史记录
 */
export function buildHistoryEntry(aggregate: Aggregate, meta: RunMetadata): HistoryEntry {
  return Object.freeze({
    commit: meta.commit,
    run_at: meta.runAt ?? new Date().toISOString(),
    summary: Object.freeze({
      improved: aggregate.improved,
      regressions: aggregate.regressions,
      neutral: aggregate.neutral,
    }),
    avg_bench_delta_pct: aggregate.avg_bench_delta_pct,
    avg_metric_delta_pct: aggregate.avg_metric_delta_pct,
    has_regressions: aggregate.has_regressions,
  })
}
