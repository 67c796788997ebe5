/**
 * @entry Report 聚合模块
 *
 * 对比结果 → 分组统计 + 历史合并 + Markdown 报告
 *
 * 能力分组：
 * - 分类: classifyDelta（unknown/regression/improved/slight_regression/neutral）
 * - 聚合: aggregateResults/buildHistoryEntry/metricDeltas/mean
 * - 历史: mergeHistory/loadHistory/writeSummary/summarySchema
 * - 渲染: formatReportMarkdown/formatPct/formatInt
 * - 入口: buildReport/loadResults
 */

export type {
  DeltaStatus,
  StatusCounts,
  HistoryEntry,
  Summary,
  ClassifiedResult,
  GroupSummary,
  Aggregate,
  RunMetadata,
  Report,
} from './types.js'

export { classifyDelta, metricDeltaPct, NOISE_BAND_PCT } from './classifyDelta.js'

export {
  mean,
  metricDeltas,
  isSkipped,
  isFailed,
  aggregateResults,
  buildHistoryEntry,
} from './aggregateResults.js'

export { mergeHistory, DEFAULT_MAX_HISTORY } from './mergeHistory.js'

export { historyEntrySchema, summarySchema, loadHistory, writeSummary } from './summarySchema.js'

export {
  type FormatMarkdownOptions,
  REPORT_TITLE,
  EMPTY_REPORT,
  statusLabel,
  formatInt,
  formatPct,
  formatReportMarkdown,
} from './formatMarkdown.js'

export { loadResults } from './loadResults.js'

export { type BuildReportOptions, buildReport } from './buildReport.js'
