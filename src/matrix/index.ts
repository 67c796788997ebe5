/**
 * @entry Matrix 展开模块
 *
 * benchmark / feature-set 描述 → 带稳定 ID 的 Case 列表
 *
 * 能力分组：
 * - 规范化: normalizeBenchmarks/normalizeFeatureSets/parseBenchmarksJson
 * - 发现: discoverBenchmarks（benches/*.rs）
 * - 命令: buildCommand/quoteArg/splitCommandLine/joinCommandLine
 * - 展开: expandMatrix/makeCases/computeCaseId
 */

export {
  type BenchmarkSpec,
  type FeatureSet,
  type Case,
  type Matrix,
  DEFAULT_FEATURE_SET,
} from './types.js'

export { computeCaseId, CASE_ID_LENGTH } from './caseId.js'

export {
  type BenchmarkInput,
  type FeatureSetInput,
  benchmarkInputSchema,
  featureSetInputSchema,
  normalizeBenchmark,
  normalizeBenchmarks,
  normalizeFeatureSet,
  normalizeFeatureSets,
  parseBenchmarksJson,
  parseFeatureSetsJson,
} from './normalizeInputs.js'

export { discoverBenchmarks, BENCHES_DIR, RESERVED_BENCH_FILE } from './discoverBenchmarks.js'

export { quoteArg, joinCommandLine, splitCommandLine, collapseWhitespace } from './commandLine.js'

export { buildCommand, NO_DEFAULT_FEATURES_FLAG } from './buildCommand.js'

export { type ExpandMatrixOptions, expandMatrix, makeCases } from './expandMatrix.js'
