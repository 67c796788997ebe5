import { Command } from 'commander'
import { resolve } from 'path'
import { resolveCommit } from '../../git/index.js'
import { runComparison } from '../../pipeline/index.js'
import { printCaseDiagnostics } from '../diagnostics.js'
import { parseIntegerOption, parsePositiveNumberOption, resolveConfig } from '../options.js'
import { printSummaryTable } from '../summaryTable.js'
import { error, header, list, success, warn } from '../output.js'

interface CompareCommandOptions {
  repoPath: string
  head: string
  base: string
  outputDir: string
  workingDirectory?: string
  benchmarksJson?: string
  featureSetsJson?: string
  autoDiscover?: boolean
  cargoArgs?: string
  threshold?: number
  maxHistory?: number
  jobs?: number
  shell?: boolean
  history?: string
  pr?: string
  markdownOutput?: string
  summaryOutput?: string
  failOnRegression?: boolean
}

export function registerCompareCommand(program: Command) {
  program
    .command('compare')
    .description('Expand the matrix, run every case on head and base, and write the report')
    .requiredOption('--base <ref>', 'Base revision')
    .option('--head <ref>', 'Head revision', 'HEAD')
    .option('--repo-path <path>', 'Repository root', '.')
    .option('--output-dir <dir>', 'Directory for result.json files and the report', '.perfgate-results')
    .option('--working-directory <dir>', 'Cargo project directory, relative to the repository root')
    .option('--benchmarks-json <json>', 'Benchmark list (JSON array)')
    .option('--feature-sets-json <json>', 'Feature set list (JSON array)')
    .option('--auto-discover', 'Discover benches/*.rs when no benchmarks are given')
    .option('--cargo-args <args>', 'Extra arguments appended to every command')
    .option('--threshold <pct>', 'Regression threshold in percent', parsePositiveNumberOption)
    .option('--max-history <n>', 'History entries to keep', parseIntegerOption)
    .option('-j, --jobs <n>', 'Cases run in parallel, each in its own worktree', parseIntegerOption)
    .option('--shell', 'Run commands through the system shell')
    .option('--history <file>', 'Summary JSON of a previous run to carry history from')
    .option('--pr <number>', 'Pull request number shown in the report')
    .option('--markdown-output <file>', 'Markdown report path (default: <output-dir>/report.md)')
    .option('--summary-output <file>', 'Summary JSON path (default: <output-dir>/summary.json)')
    .option('--fail-on-regression', 'Exit non-zero when a regression exceeds the threshold')
    .action(async (options: CompareCommandOptions) => {
      const repoPath = resolve(options.repoPath)
      const config = await resolveConfig(repoPath, options)

      // 先解析成 commit：运行过程中 HEAD 会指向 base
      const headRef = await resolveCommit(repoPath, options.head)
      const baseRef = await resolveCommit(repoPath, options.base)

      header(`Comparing ${headRef.slice(0, 7)} against ${baseRef.slice(0, 7)}`)

      const outcome = await runComparison({
        config,
        repoPath,
        headRef,
        baseRef,
        outputDir: resolve(options.outputDir),
        commit: headRef,
        pr: options.pr,
        historyPath: options.history,
        markdownPath: options.markdownOutput,
        summaryPath: options.summaryOutput,
      })

      for (const run of outcome.runs) {
        printCaseDiagnostics(run.result, run.written)
      }

      const { aggregate } = outcome.report
      success(`Report written to ${outcome.markdownPath}`)
      printSummaryTable(aggregate)
      list([
        { label: 'Cases', value: outcome.runs.length },
        { label: 'Summary', value: outcome.summaryPath, dim: true },
      ])

      if (aggregate.has_errors) {
        error(`${aggregate.failed_count} case(s) failed`)
        process.exitCode = 1
      }
      if (aggregate.has_regressions) {
        warn(`${aggregate.regressions} regression(s) above ${outcome.report.threshold}%`)
        if (options.failOnRegression) process.exitCode = 1
      }
    })
}
