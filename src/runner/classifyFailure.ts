/**
 * 失败分类
 *
 * 命令非零退出时，根据输出内容判断属于 "缺失"（容忍）还是 "错误"。
 * 匹配规则集中在这里，可以单独扩展，不影响 runner 的控制流。
 */

export type FailureClassification =
  | { readonly kind: 'missing'; readonly reason: string }
  | { readonly kind: 'error'; readonly reason: string | null }

export interface FailureRule {
  readonly name: string
  /** 输入为小写后的输出 */
  matches(loweredOutput: string): boolean
  readonly classification: FailureClassification
}

export interface FailureClassifier {
  classify(output: string): FailureClassification
}

export const MISSING_BENCH_REASON = 'bench target not found'
export const MISSING_FEATURE_REASON = 'feature not available'
export const TOOL_VERSION_MISMATCH_REASON = 'iai-callgrind version mismatch'

function containsAny(text: string, needles: readonly string[]): boolean {
  return needles.some(needle => text.includes(needle))
}

export const missingBenchRule: FailureRule = {
  name: 'missing-bench',
  matches: output =>
    containsAny(output, ['no bench target named', 'could not find bench', 'no benchmark target named']),
  classification: { kind: 'missing', reason: MISSING_BENCH_REASON },
}

export const missingFeatureRule: FailureRule = {
  name: 'missing-feature',
  matches: output =>
    containsAny(output, [
      'does not have the feature',
      'does not have these features',
      'does not contain this feature',
      'does not contain these features',
      'unknown feature',
      'no such feature',
    ]) ||
    (output.includes('feature `') && output.includes(' is not defined')),
  classification: { kind: 'missing', reason: MISSING_FEATURE_REASON },
}

export const toolVersionRule: FailureRule = {
  name: 'tool-version',
  matches: output => output.includes('iai-callgrind-runner') && output.includes('is newer than iai-callgrind'),
  classification: { kind: 'error', reason: TOOL_VERSION_MISMATCH_REASON },
}

export const DEFAULT_FAILURE_RULES: readonly FailureRule[] = [missingBenchRule, missingFeatureRule, toolVersionRule]

const GENERIC_ERROR: FailureClassification = { kind: 'error', reason: null }

/**
 * 按顺序匹配规则，第一个命中的生效；都不命中时为通用错误，不抛异常
 */
export function createFailureClassifier(rules: readonly FailureRule[] = DEFAULT_FAILURE_RULES): FailureClassifier {
  return {
    classify(output: string): FailureClassification {
      const lowered = output.toLowerCase()
      const rule = rules.find(r => r.matches(lowered))
      return rule ? rule.classification : GENERIC_ERROR
    },
  }
}

export const defaultFailureClassifier = createFailureClassifier()
