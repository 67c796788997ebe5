/**
 * 终端里的特性集汇总表
 */

import chalk from 'chalk'
import { table } from 'table'
import { formatPct, type Aggregate } from '../report/index.js'

function count(value: number, color: (s: string) => string): string {
  return value > 0 ? color(String(value)) : chalk.gray('0')
}

export function formatSummaryTable(aggregate: Aggregate): string {
  const data: string[][] = [
    ['Feature Set', 'Improved', 'Regressions', 'Neutral', 'Skipped', 'Failed', 'Avg Δ'].map(h => chalk.bold(h)),
  ]

  for (const group of aggregate.groups) {
    data.push([
      group.feature_name,
      count(group.improved, chalk.green),
      count(group.regressions, chalk.red),
      String(group.neutral),
      count(group.skipped.length, chalk.yellow),
      count(group.failed.length, chalk.red),
      formatPct(group.avg_bench_delta_pct),
    ])
  }

  return table(data)
}

export function printSummaryTable(aggregate: Aggregate): void {
  if (aggregate.groups.length === 0) return
  console.log(formatSummaryTable(aggregate))
}
