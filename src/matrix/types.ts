/**
 * Matrix 类型定义
 *
 * 字段名保持 snake_case：它们同时是 matrix JSON 的对外契约。
 */

/** 规范化后的 benchmark 描述 */
export interface BenchmarkSpec {
  readonly name: string
  /** 命令模板，支持 {features} 与 {no_default_features_flag} 占位符 */
  readonly command?: string
  /** cargo bench 目标名（无模板时必填） */
  readonly bench?: string
  readonly package?: string
  readonly manifest_path?: string
  /** 原样追加的额外参数 */
  readonly args?: string
}

/** 规范化后的特性集 */
export interface FeatureSet {
  readonly name: string
  /** 原始 feature 字符串 */
  readonly features: string
  readonly no_default_features: boolean
}

/** 一个可执行单元：benchmark × feature-set */
export interface Case {
  /** benchmark_name|feature_name|features 的 10 位十六进制摘要 */
  readonly id: string
  readonly benchmark_name: string
  readonly feature_name: string
  /** 完全展开后的命令 */
  readonly command: string
}

export interface Matrix {
  readonly include: readonly Case[]
}

export const DEFAULT_FEATURE_SET: FeatureSet = Object.freeze({
  name: 'default',
  features: '',
  no_default_features: false,
})
