/**
 * 报告生成
 *
 * 所有 Case 都产出结果后才调用（单写者，不做流式聚合）。
 */

import type { ComparisonResult } from '../runner/types.js'
import { aggregateResults, buildHistoryEntry } from './aggregateResults.js'
import { formatReportMarkdown } from './formatMarkdown.js'
import { DEFAULT_MAX_HISTORY, mergeHistory } from './mergeHistory.js'
import type { HistoryEntry, Report, RunMetadata, Summary } from './types.js'

export interface BuildReportOptions {
  readonly threshold: number
  readonly meta: RunMetadata
  /** 上一次运行持久化的历史，可以为空 */
  readonly history?: readonly HistoryEntry[]
  readonly maxHistory?: number
}

export function buildReport(results: readonly ComparisonResult[], options: BuildReportOptions): Report {
  const { threshold, meta, history = [], maxHistory = DEFAULT_MAX_HISTORY } = options

  const aggregate = aggregateResults(results, threshold)
  const latest = buildHistoryEntry(aggregate, meta)
  const merged = mergeHistory(latest, history, maxHistory)

  const summary: Summary = Object.freeze({
    has_regressions: aggregate.has_regressions,
    count: results.length,
    latest,
    history: Object.freeze(merged),
  })

  const markdown = formatReportMarkdown(aggregate, { threshold, meta, history: merged })

  return Object.freeze({ markdown, summary, aggregate, threshold })
}
