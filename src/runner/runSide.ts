/**
 * 单侧执行
 *
 * 在当前已 checkout 的 revision 上执行 Case 命令，构建输出重定向到该侧独占的目录。
 */

import { splitCommandLine } from '../matrix/commandLine.js'
import { getErrorMessage } from '../shared/assertError.js'
import { createLogger } from '../shared/logger.js'
import { ensureDir } from '../store/readWriteJson.js'
import { defaultFailureClassifier, type FailureClassifier } from './classifyFailure.js'
import { collectMetrics, preciseNowMs, scanProfilerFiles } from './collectMetrics.js'
import { detectMissingBench } from './detectMissingBench.js'
import { execaExecutor, type CommandExecutor } from './executeCommand.js'
import type { RunOutcome, Side } from './types.js'

const logger = createLogger('runner')

export const DEFAULT_TARGET_DIR_ENV = 'CARGO_TARGET_DIR'

export interface SideOptions {
  readonly side: Side
  readonly command: string
  /** 命令执行目录 */
  readonly workdir: string
  /** 该侧独占的构建输出目录 */
  readonly targetDir: string
  /** 指向构建目录的环境变量名 */
  readonly targetDirEnv?: string
  /** 交给 shell 解释命令字符串（默认不经过 shell） */
  readonly shell?: boolean
  readonly executor?: CommandExecutor
  readonly classifier?: FailureClassifier
}

function parseArgv(command: string, shell: boolean): string[] | Error {
  try {
    return splitCommandLine(command)
  } catch (e) {
    // shell 模式下命令交给 shell 解析，拆不开只意味着跳过结构检查
    return shell ? [] : new Error(getErrorMessage(e))
  }
}

/**
 * 执行一侧，返回 ok / missing / error
 *
 * 不会因为命令失败而抛出；只有执行器本身的异常才会向上传播。
 */
export async function runSide(options: SideOptions): Promise<RunOutcome> {
  const {
    side,
    command,
    workdir,
    targetDir,
    targetDirEnv = DEFAULT_TARGET_DIR_ENV,
    shell = false,
    executor = execaExecutor,
    classifier = defaultFailureClassifier,
  } = options

  const argv = parseArgv(command, shell)
  if (argv instanceof Error) {
    return { status: 'error', exitCode: null, output: argv.message, reason: 'unparseable command' }
  }

  const missingReason = detectMissingBench(argv, workdir)
  if (missingReason) {
    logger.info(`[${side}] skipped: ${missingReason}`)
    return { status: 'missing', reason: missingReason }
  }

  ensureDir(targetDir)
  const before = new Set(scanProfilerFiles(targetDir))
  const startMs = preciseNowMs()

  logger.info(`[${side}] ${command}`)
  const result = await executor({
    command,
    argv,
    cwd: workdir,
    env: { [targetDirEnv]: targetDir },
    shell,
  })

  if (result.exitCode !== 0) {
    const classification = classifier.classify(result.output)
    if (classification.kind === 'missing') {
      logger.info(`[${side}] skipped: ${classification.reason}`)
      return { status: 'missing', reason: classification.reason }
    }
    logger.warn(`[${side}] command failed (exit ${result.exitCode ?? '?'})`)
    return {
      status: 'error',
      exitCode: result.exitCode,
      output: result.output.trim(),
      reason: classification.reason,
    }
  }

  const metrics = await collectMetrics(targetDir, startMs, before)
  return { status: 'ok', ...metrics }
}
