/**
 * Runner 类型定义
 */

/** 单个 profiler 产物的汇总值 */
export interface MetricEntry {
  /** 相对构建目录的路径，已去掉进程号后缀 */
  readonly metric: string
  readonly value: number
}

export interface MetricSet {
  readonly total: number
  /** 按 metric 名排序 */
  readonly metrics: readonly MetricEntry[]
}

export type Side = 'head' | 'base'

/**
 * 一侧的执行结果
 * - ok: 正常执行并采集到指标
 * - missing: 该 revision 上缺少 benchmark / feature（容忍，不参与统计）
 * - error: 其它原因失败（该 Case 失败，整体运行返回非零）
 */
export type RunOutcome =
  | ({ readonly status: 'ok' } & MetricSet)
  | { readonly status: 'missing'; readonly reason: string }
  | {
      readonly status: 'error'
      readonly exitCode: number | null
      readonly output: string
      /** 可识别的失败原因（如版本不匹配），无法识别时为 null */
      readonly reason: string | null
    }

/** 对比结果，同时是 result.json 的结构 */
export interface ComparisonResult {
  readonly benchmark_name: string
  readonly feature_name: string
  readonly command: string
  readonly base_total: number
  readonly head_total: number
  readonly delta: number
  /** NaN 表示不可比较（任一侧 missing / error） */
  readonly delta_pct: number
  readonly head_metrics: readonly MetricEntry[]
  readonly base_metrics: readonly MetricEntry[]
  readonly head_missing: boolean
  readonly base_missing: boolean
  readonly head_missing_reason: string | null
  readonly base_missing_reason: string | null
  readonly head_error: boolean
  readonly base_error: boolean
  readonly head_error_code: number | null
  readonly base_error_code: number | null
  readonly head_error_reason: string | null
  readonly base_error_reason: string | null
  readonly head_error_output: string | null
  readonly base_error_output: string | null
}

/** 描述一个待执行 Case 的最小信息 */
export interface CaseInfo {
  readonly id?: string
  readonly benchmark_name: string
  readonly feature_name: string
  readonly command: string
}
