/**
 * @entry Runner 差分执行模块
 *
 * 一个 Case 在 head / base 上各执行一次，采集 callgrind 指标并组装对比结果
 *
 * 能力分组：
 * - 执行: runCase/runSide/execaExecutor
 * - 指标: collectMetrics/scanProfilerFiles/normalizeMetricName/parseSummaryValue
 * - 失败分类: createFailureClassifier/defaultFailureClassifier/detectMissingBench
 * - 差值: computeDelta/percentDelta
 * - 产物: writeCaseResult/readResultArtifact/parseResultArtifact
 */

export type {
  MetricEntry,
  MetricSet,
  Side,
  RunOutcome,
  ComparisonResult,
  CaseInfo,
} from './types.js'

export {
  SUMMARY_MARKER,
  MAX_SCAN_LINES,
  FALLBACK_FILE_COUNT,
  isProfilerFile,
  scanProfilerFiles,
  normalizeMetricName,
  parseSummaryValue,
  readSummary,
  selectFreshFiles,
  collectMetrics,
} from './collectMetrics.js'

export {
  type FailureClassification,
  type FailureRule,
  type FailureClassifier,
  MISSING_BENCH_REASON,
  MISSING_FEATURE_REASON,
  TOOL_VERSION_MISMATCH_REASON,
  DEFAULT_FAILURE_RULES,
  createFailureClassifier,
  defaultFailureClassifier,
} from './classifyFailure.js'

export { detectMissingBench } from './detectMissingBench.js'

export { type CommandRequest, type CommandResult, type CommandExecutor, execaExecutor } from './executeCommand.js'

export { type DeltaFigures, computeDelta, percentDelta } from './computeDelta.js'

export { type SideOptions, runSide, DEFAULT_TARGET_DIR_ENV } from './runSide.js'

export {
  type RunCaseOptions,
  runCase,
  caseSlug,
  composeResult,
  failedResult,
  DEFAULT_TARGET_ROOT,
} from './runCase.js'

export {
  RESULT_FILE_NAME,
  comparisonResultSchema,
  toArtifact,
  parseResultArtifact,
  readResultArtifact,
  writeResultArtifact,
} from './resultArtifact.js'

export {
  type ErrorLogEntry,
  type WrittenCaseResult,
  TOOL_VERSION_HINT,
  hasErrorSide,
  writeCaseResult,
} from './writeCaseResult.js'
