#!/usr/bin/env node
/**
 * @entry perfgate CLI 主入口
 *
 * 核心命令：
 *   perfgate matrix   - 展开 benchmark × feature-set 为 Case matrix
 *   perfgate run      - 单个 Case 在 head / base 上各跑一次，写出 result.json
 *   perfgate report   - 汇总 result.json，生成 Markdown 报告与 summary
 *   perfgate compare  - 一次完成以上全部步骤
 */

import { Command, Option } from 'commander'
import { registerMatrixCommand } from './commands/matrix.js'
import { registerRunCommand } from './commands/run.js'
import { registerReportCommand } from './commands/report.js'
import { registerCompareCommand } from './commands/compare.js'
import { isLogMode, setLogLevel, setLogMode } from '../shared/logger.js'
import { printError } from '../shared/error.js'

const program = new Command()

program
  .name('perfgate')
  .description('Differential callgrind benchmarks between two revisions')
  .version('0.1.0')
  .option('-v, --verbose', '显示详细日志 (debug 级别)')
  .option('-q, --quiet', '只输出错误')
  .addOption(
    new Option('--log-mode <mode>', '日志格式：foreground 只带级别，background 额外带 scope').choices([
      'foreground',
      'background',
    ])
  )
  .hook('preAction', command => {
    const { verbose, quiet, logMode } = command.opts<{ verbose?: boolean; quiet?: boolean; logMode?: string }>()
    if (verbose) setLogLevel('debug')
    else if (quiet) setLogLevel('error')
    if (logMode && isLogMode(logMode)) setLogMode(logMode)
  })

registerMatrixCommand(program)
registerRunCommand(program)
registerReportCommand(program)
registerCompareCommand(program)

program.parseAsync().catch((e: unknown) => {
  printError(e)
  process.exitCode = 1
})
