import { dirname, join, resolve } from 'path'
import { writeText } from '../store/readWriteJson.js'
import { TOOL_VERSION_MISMATCH_REASON } from './classifyFailure.js'
import { writeResultArtifact } from './resultArtifact.js'
import type { ComparisonResult, Side } from './types.js'

export interface ErrorLogEntry {
  readonly side: Side
  readonly path: string
  readonly output: string
  readonly reason: string | null
  readonly exitCode: number | null
  /** 版本不匹配时的修复提示 */
  readonly hint: string | null
}

export interface WrittenCaseResult {
  readonly resultPath: string
  readonly errorLogs: readonly ErrorLogEntry[]
  /** 任一侧为 error（missing 不算） */
  readonly hasErrors: boolean
}

export const TOOL_VERSION_HINT =
  "iai-callgrind-runner is newer than the crate. Update the repo's iai-callgrind dependency to match the runner version."

export function hasErrorSide(result: ComparisonResult): boolean {
  return result.head_error || result.base_error
}

/**
 * 写入 result.json；出错的一侧再写一份 <side>.error.log
 */
export function writeCaseResult(outputPath: string, result: ComparisonResult): WrittenCaseResult {
  const resultPath = resolve(outputPath)
  writeResultArtifact(resultPath, result)

  const errorLogs: ErrorLogEntry[] = []
  const sides: Array<{ side: Side; error: boolean; output: string | null; reason: string | null; code: number | null }> = [
    {
      side: 'head',
      error: result.head_error,
      output: result.head_error_output,
      reason: result.head_error_reason,
      code: result.head_error_code,
    },
    {
      side: 'base',
      error: result.base_error,
      output: result.base_error_output,
      reason: result.base_error_reason,
      code: result.base_error_code,
    },
  ]

  for (const { side, error, output, reason, code } of sides) {
    if (!error || !output) continue
    const path = join(dirname(resultPath), `${side}.error.log`)
    writeText(path, output)
    errorLogs.push({
      side,
      path,
      output,
      reason,
      exitCode: code,
      hint: reason === TOOL_VERSION_MISMATCH_REASON ? TOOL_VERSION_HINT : null,
    })
  }

  return { resultPath, errorLogs, hasErrors: hasErrorSide(result) }
}
