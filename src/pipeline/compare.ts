/**
 * 完整流程：matrix 展开 → 逐 Case 差分执行 → 汇总报告
 */

import { join } from 'path'
import type { Config } from '../config/schema.js'
import { expandMatrix } from '../matrix/expandMatrix.js'
import { normalizeBenchmarks, normalizeFeatureSets } from '../matrix/normalizeInputs.js'
import type { FailureClassifier } from '../runner/classifyFailure.js'
import type { CommandExecutor } from '../runner/executeCommand.js'
import { buildReport } from '../report/buildReport.js'
import { loadHistory, writeSummary } from '../report/summarySchema.js'
import type { Report } from '../report/types.js'
import { writeText } from '../store/readWriteJson.js'
import { createLogger } from '../shared/logger.js'
import type { Checkout } from '../git/checkout.js'
import { runMatrix, type CaseRun, type WorktreeProvider } from './runMatrix.js'

const logger = createLogger('pipeline')

export const REPORT_FILE_NAME = 'report.md'
export const SUMMARY_FILE_NAME = 'summary.json'

export interface CompareOptions {
  readonly config: Config
  readonly repoPath: string
  readonly headRef: string
  readonly baseRef: string
  readonly outputDir: string
  /** 报告中显示的 commit，默认使用 headRef */
  readonly commit?: string
  readonly pr?: string
  /** 上一次运行的 summary.json */
  readonly historyPath?: string
  readonly markdownPath?: string
  readonly summaryPath?: string
  readonly checkout?: Checkout
  readonly worktrees?: WorktreeProvider
  readonly executor?: CommandExecutor
  readonly classifier?: FailureClassifier
  readonly lockFile?: string | false
}

export interface CompareOutcome {
  readonly runs: readonly CaseRun[]
  readonly report: Report
  readonly markdownPath: string
  readonly summaryPath: string
}

/**
 * 执行完整对比并写出 report.md 与 summary.json
 *
 * @throws AppError 配置错误（在任何 checkout / 执行之前）
 */
export async function runComparison(options: CompareOptions): Promise<CompareOutcome> {
  const { config, repoPath, outputDir } = options

  // 配置与历史都在执行前校验，出错即终止
  const matrix = expandMatrix({
    benchmarks: normalizeBenchmarks(config.benchmarks),
    featureSets: normalizeFeatureSets(config.featureSets),
    extraArgs: config.cargoArgs,
    autoDiscover: config.autoDiscover,
    repoPath,
    workingDirectory: config.workingDirectory,
  })
  const history = loadHistory(options.historyPath)

  const runs = await runMatrix(matrix.include, {
    repoPath,
    outputDir,
    headRef: options.headRef,
    baseRef: options.baseRef,
    workingDirectory: config.workingDirectory,
    targetRoot: config.targetRoot,
    targetDirEnv: config.targetDirEnv,
    shell: config.shell,
    jobs: config.jobs,
    checkout: options.checkout,
    worktrees: options.worktrees,
    executor: options.executor,
    classifier: options.classifier,
    lockFile: options.lockFile,
  })

  const report = buildReport(
    runs.map(r => r.result),
    {
      threshold: config.threshold,
      meta: { commit: options.commit ?? options.headRef, pr: options.pr },
      history,
      maxHistory: config.maxHistory,
    }
  )

  const markdownPath = options.markdownPath ?? join(outputDir, REPORT_FILE_NAME)
  const summaryPath = options.summaryPath ?? join(outputDir, SUMMARY_FILE_NAME)
  writeText(markdownPath, report.markdown + '\n')
  writeSummary(summaryPath, report.summary)
  logger.info(`Report written to ${markdownPath}, summary to ${summaryPath}`)

  return { runs, report, markdownPath, summaryPath }
}
