/**
 * 报告格式化器
 * 将聚合结果渲染为 PR 评论用的 Markdown
 */

import type { ComparisonResult } from '../runner/types.js'
import { classifyDelta, metricDeltaPct } from './classifyDelta.js'
import type { Aggregate, DeltaStatus, GroupSummary, HistoryEntry, RunMetadata } from './types.js'

export const REPORT_TITLE = '## Callgrind Benchmark Report'
export const EMPTY_REPORT = `${REPORT_TITLE}\n\nNo benchmark results were found.`

const STATUS_LABELS: Record<DeltaStatus, string> = {
  improved: '🟢 improved',
  neutral: '⚪ neutral',
  slight_regression: '🟡 slight regression',
  regression: '🔴 regression',
  unknown: '⚪ unknown',
}

export function statusLabel(status: DeltaStatus): string {
  return STATUS_LABELS[status]
}

export function formatInt(value: number): string {
  return value.toLocaleString('en-US')
}

/** 带符号的两位小数百分比，非有限值为 n/a */
export function formatPct(value: number | null): string {
  if (value === null || !Number.isFinite(value)) return 'n/a'
  return `${value >= 0 ? '+' : ''}${value.toFixed(2)}%`
}

function shortCommit(commit: string): string {
  return commit.slice(0, 7)
}

function skipReason(result: ComparisonResult): string {
  const reasons: string[] = []
  if (result.head_missing) reasons.push(`head: ${result.head_missing_reason ?? 'missing'}`)
  if (result.base_missing) reasons.push(`base: ${result.base_missing_reason ?? 'missing'}`)
  return reasons.join('; ')
}

function failReason(result: ComparisonResult): string {
  const describe = (reason: string | null, code: number | null): string =>
    reason ?? (code === null ? 'command failed' : `exit code ${code}`)
  const reasons: string[] = []
  if (result.head_error) reasons.push(`head: ${describe(result.head_error_reason, result.head_error_code)}`)
  if (result.base_error) reasons.push(`base: ${describe(result.base_error_reason, result.base_error_code)}`)
  return reasons.join('; ')
}

function renderMetricBreakdown(result: ComparisonResult, threshold: number): string[] {
  const base = new Map(result.base_metrics.map(m => [m.metric, m.value]))
  const head = new Map(result.head_metrics.map(m => [m.metric, m.value]))
  const names = [...new Set([...base.keys(), ...head.keys()])].sort()

  const lines: string[] = []
  lines.push(`<details><summary>${result.benchmark_name} metric breakdown (${names.length} metrics)</summary>`)
  lines.push('')
  lines.push('| Metric | Base | Head | Delta | Status |')
  lines.push('| --- | ---: | ---: | ---: | --- |')
  for (const name of names) {
    const baseValue = base.get(name) ?? 0
    const headValue = head.get(name) ?? 0
    const delta = metricDeltaPct(baseValue, headValue)
    lines.push(
      `| ${name} | ${formatInt(baseValue)} | ${formatInt(headValue)} | ${formatPct(delta)} | ${statusLabel(classifyDelta(delta, threshold))} |`
    )
  }
  lines.push('')
  lines.push('</details>')
  return lines
}

function renderGroup(group: GroupSummary, threshold: number): string[] {
  const lines: string[] = []
  lines.push(`<details><summary><strong>${group.feature_name}</strong></summary>`)
  lines.push('')
  lines.push('| Benchmark | Base | Head | Delta | Status |')
  lines.push('| --- | ---: | ---: | ---: | --- |')

  for (const { result, status } of group.entries) {
    lines.push(
      `| ${result.benchmark_name} | ${formatInt(result.base_total)} | ${formatInt(result.head_total)} | ${formatPct(result.delta_pct)} | ${statusLabel(status)} |`
    )
  }
  for (const result of group.skipped) {
    lines.push(`| ${result.benchmark_name} | - | - | n/a | ⏭️ skipped (${skipReason(result)}) |`)
  }
  for (const result of group.failed) {
    lines.push(`| ${result.benchmark_name} | - | - | n/a | ❌ failed (${failReason(result)}) |`)
  }

  lines.push('')
  lines.push(
    `Average benchmark delta: ${formatPct(group.avg_bench_delta_pct)} · Average metric delta: ${formatPct(group.avg_metric_delta_pct)}`
  )

  if (group.entries.length > 0) {
    lines.push('')
    lines.push('Metric-level breakdowns:')
    lines.push('')
    for (const { result } of group.entries) {
      lines.push(...renderMetricBreakdown(result, threshold))
      lines.push('')
    }
  }

  lines.push('')
  lines.push('</details>')
  return lines
}

function renderHistory(history: readonly HistoryEntry[]): string[] {
  const lines: string[] = []
  lines.push('### Recent Runs')
  lines.push('')
  lines.push('| Commit | Run At | Improved | Regressions | Neutral | Avg Benchmark Δ | Avg Metric Δ |')
  lines.push('| --- | --- | ---: | ---: | ---: | ---: | ---: |')
  for (const entry of history) {
    const flag = entry.has_regressions ? ' 🔴' : ''
    lines.push(
      `| \`${shortCommit(entry.commit)}\`${flag} | ${entry.run_at} | ${entry.summary.improved} | ${entry.summary.regressions} | ${entry.summary.neutral} | ${formatPct(entry.avg_bench_delta_pct)} | ${formatPct(entry.avg_metric_delta_pct)} |`
    )
  }
  return lines
}

export interface FormatMarkdownOptions {
  readonly threshold: number
  readonly meta?: RunMetadata
  readonly history?: readonly HistoryEntry[]
}

/**
 * 渲染完整报告；没有任何结果时返回简短说明
 */
export function formatReportMarkdown(aggregate: Aggregate, options: FormatMarkdownOptions): string {
  const { threshold, meta, history = [] } = options
  if (aggregate.groups.length === 0) return EMPTY_REPORT

  const lines: string[] = []
  lines.push(REPORT_TITLE)
  lines.push('')
  if (meta) {
    const pr = meta.pr ? ` for PR #${meta.pr.replace(/^#/, '')}` : ''
    lines.push(`Results${pr} at commit \`${shortCommit(meta.commit)}\`.`)
    lines.push('')
  }
  lines.push(`Regression threshold: **${threshold.toFixed(2)}%**`)
  lines.push('')
  lines.push('| Feature Set | Improved | Regressions | Neutral | Skipped | Failed |')
  lines.push('| --- | ---: | ---: | ---: | ---: | ---: |')
  for (const g of aggregate.groups) {
    lines.push(
      `| ${g.feature_name} | ${g.improved} | ${g.regressions} | ${g.neutral} | ${g.skipped.length} | ${g.failed.length} |`
    )
  }
  lines.push('')

  for (const group of aggregate.groups) {
    lines.push(...renderGroup(group, threshold))
    lines.push('')
  }

  if (aggregate.has_regressions) {
    lines.push('### Regressions Above Threshold')
    lines.push('')
    const regressions = aggregate.groups
      .flatMap(g => g.entries)
      .filter(e => e.status === 'regression')
      .sort((a, b) => b.result.delta_pct - a.result.delta_pct)
    for (const { result } of regressions) {
      lines.push(`- \`${result.feature_name}\` / \`${result.benchmark_name}\`: ${formatPct(result.delta_pct)}`)
    }
    lines.push('')
  }

  const skipped = aggregate.groups.flatMap(g => g.skipped)
  if (skipped.length > 0) {
    lines.push('### Skipped')
    lines.push('')
    for (const result of skipped) {
      lines.push(`- \`${result.feature_name}\` / \`${result.benchmark_name}\`: ${skipReason(result)}`)
    }
    lines.push('')
  }

  const failed = aggregate.groups.flatMap(g => g.failed)
  if (failed.length > 0) {
    lines.push('### Failed')
    lines.push('')
    for (const result of failed) {
      lines.push(`- \`${result.feature_name}\` / \`${result.benchmark_name}\`: ${failReason(result)}`)
    }
    lines.push('')
  }

  if (history.length > 0) {
    lines.push(...renderHistory(history))
  }

  return lines.join('\n').trimEnd()
}
