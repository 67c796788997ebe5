import chalk from 'chalk'
import type { ComparisonResult } from '../runner/types.js'
import type { WrittenCaseResult } from '../runner/writeCaseResult.js'
import { error, info, warn } from './output.js'

/**
 * 输出一个 Case 的结果摘要；出错的一侧打印完整输出与日志路径
 */
export function printCaseDiagnostics(result: ComparisonResult, written: WrittenCaseResult): void {
  const label = `${result.benchmark_name} [${result.feature_name}]`

  if (result.head_missing || result.base_missing) {
    const reasons = [
      result.head_missing ? `head: ${result.head_missing_reason ?? 'missing'}` : null,
      result.base_missing ? `base: ${result.base_missing_reason ?? 'missing'}` : null,
    ].filter((r): r is string => r !== null)
    warn(`${label} skipped (${reasons.join('; ')})`)
  }

  for (const log of written.errorLogs) {
    if (log.hint) error(`[${log.side}] ${log.hint}`)
    error(`[${log.side}] ${label} command failed; full output:`)
    console.error(log.output)
    info(`[${log.side}] full output written to ${chalk.cyan(log.path)}`)
  }
}
