/**
 * 报告与历史类型定义
 */

import type { ComparisonResult } from '../runner/types.js'

/** 单个差值的分类 */
export type DeltaStatus = 'improved' | 'neutral' | 'slight_regression' | 'regression' | 'unknown'

/** 计入统计的三类 */
export interface StatusCounts {
  readonly improved: number
  readonly regressions: number
  readonly neutral: number
}

/** 一次运行的历史记录，按 commit 去重 */
export interface HistoryEntry {
  readonly commit: string
  /** ISO 8601 */
  readonly run_at: string
  readonly summary: StatusCounts
  /** 无可用数据时为 null，而不是 0 */
  readonly avg_bench_delta_pct: number | null
  readonly avg_metric_delta_pct: number | null
  readonly has_regressions: boolean
}

/** 跨运行传递的状态载荷 */
export interface Summary {
  readonly has_regressions: boolean
  readonly count: number
  readonly latest: HistoryEntry
  /** 最新在前，长度不超过 max_history */
  readonly history: readonly HistoryEntry[]
}

export interface ClassifiedResult {
  readonly result: ComparisonResult
  readonly status: DeltaStatus
}

/** 按特性集分组的统计 */
export interface GroupSummary extends StatusCounts {
  readonly feature_name: string
  /** 参与统计的结果（两侧均 ok），按 benchmark 名排序 */
  readonly entries: readonly ClassifiedResult[]
  /** 任一侧 missing */
  readonly skipped: readonly ComparisonResult[]
  /** 任一侧 error */
  readonly failed: readonly ComparisonResult[]
  readonly avg_bench_delta_pct: number | null
  readonly avg_metric_delta_pct: number | null
}

export interface Aggregate extends StatusCounts {
  readonly groups: readonly GroupSummary[]
  readonly avg_bench_delta_pct: number | null
  readonly avg_metric_delta_pct: number | null
  readonly has_regressions: boolean
  /** 任一 Case 以 error 结束，决定整体运行是否失败 */
  readonly has_errors: boolean
  readonly skipped_count: number
  readonly failed_count: number
}

export interface RunMetadata {
  readonly commit: string
  /** ISO 8601，默认当前时间 */
  readonly runAt?: string
  readonly pr?: string
}

export interface Report {
  readonly markdown: string
  readonly summary: Summary
  readonly aggregate: Aggregate
  readonly threshold: number
}
