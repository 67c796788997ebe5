import { Command } from 'commander'
import { loadConfig } from '../../config/index.js'
import { buildReport, loadResults, loadHistory, writeSummary } from '../../report/index.js'
import { writeText } from '../../store/readWriteJson.js'
import { parseIntegerOption, parsePositiveNumberOption } from '../options.js'
import { printSummaryTable } from '../summaryTable.js'
import { error, list, success, warn } from '../output.js'

interface ReportCommandOptions {
  artifactsDir: string
  threshold?: number
  markdownOutput: string
  summaryOutput: string
  history?: string
  commit?: string
  pr?: string
  maxHistory?: number
  failOnRegression?: boolean
}

export function registerReportCommand(program: Command) {
  program
    .command('report')
    .description('Aggregate result.json files into a markdown report and a summary')
    .requiredOption('--artifacts-dir <dir>', 'Directory searched recursively for result.json files')
    .option('--threshold <pct>', 'Regression threshold in percent', parsePositiveNumberOption)
    .requiredOption('--markdown-output <file>', 'Markdown report path')
    .requiredOption('--summary-output <file>', 'Summary JSON path')
    .option('--history <file>', 'Summary JSON of a previous run to carry history from')
    .option('--commit <sha>', 'Commit recorded in the history entry', process.env.GITHUB_SHA)
    .option('--pr <number>', 'Pull request number shown in the report')
    .option('--max-history <n>', 'History entries to keep', parseIntegerOption)
    .option('--fail-on-regression', 'Exit non-zero when a regression exceeds the threshold')
    .action(async (options: ReportCommandOptions) => {
      const config = await loadConfig()
      const history = loadHistory(options.history)
      const results = loadResults(options.artifactsDir)

      const report = buildReport(results, {
        threshold: options.threshold ?? config.threshold,
        meta: { commit: options.commit ?? 'unknown', pr: options.pr },
        history,
        maxHistory: options.maxHistory ?? config.maxHistory,
      })

      writeText(options.markdownOutput, report.markdown + '\n')
      writeSummary(options.summaryOutput, report.summary)

      const { aggregate } = report
      success(`Report written to ${options.markdownOutput}`)
      printSummaryTable(aggregate)
      list([
        { label: 'Results', value: results.length },
      ])

      if (aggregate.has_errors) {
        error(`${aggregate.failed_count} case(s) failed`)
        process.exitCode = 1
      }
      if (aggregate.has_regressions) {
        warn(`${aggregate.regressions} regression(s) above ${report.threshold}%`)
        if (options.failOnRegression) process.exitCode = 1
      }
    })
}
