/**
 * 差分执行：一个 Case 在 head 与 base 两个 revision 上各跑一次
 *
 * 顺序固定：
 *   1. checkout head  2. 执行 head  3. checkout base  4. 执行 base  5. checkout head
 * 第 5 步放在 finally 中，无论前面哪一步失败，共享工作区都不会停留在 base。
 */

import { existsSync } from 'fs'
import { join, resolve } from 'path'
import type { CheckoutLease } from '../git/repoLock.js'
import { AppError } from '../shared/error.js'
import { getErrorMessage } from '../shared/assertError.js'
import { createLogger } from '../shared/logger.js'
import type { FailureClassifier } from './classifyFailure.js'
import { computeDelta } from './computeDelta.js'
import type { CommandExecutor } from './executeCommand.js'
import { runSide } from './runSide.js'
import type { CaseInfo, ComparisonResult, RunOutcome, Side } from './types.js'

const logger = createLogger('runner')

export const DEFAULT_TARGET_ROOT = '.perfgate-target'

export interface RunCaseOptions {
  readonly headRef: string
  readonly baseRef: string
  /** 命令执行目录，相对 lease.root */
  readonly workingDirectory?: string
  /** 构建目录根，相对 lease.root；每个 Case 在其下拥有独占的 head/base 子目录 */
  readonly targetRoot?: string
  readonly targetDirEnv?: string
  readonly shell?: boolean
  readonly executor?: CommandExecutor
  readonly classifier?: FailureClassifier
}

/**
 * Case 的构建目录名：<benchmark>-<feature>，带上 ID 保证不同 Case 不会共用
 */
export function caseSlug(info: CaseInfo): string {
  const base = `${info.benchmark_name}-${info.feature_name}`.replace(/\s+/g, '-').replace(/[\\/]/g, '_')
  return info.id ? `${base}-${info.id}` : base
}

/**
 * 组装 result.json 结构
 */
export function composeResult(info: CaseInfo, head: RunOutcome, base: RunOutcome): ComparisonResult {
  const figures = computeDelta(head, base)
  return Object.freeze({
    benchmark_name: info.benchmark_name,
    feature_name: info.feature_name,
    command: info.command,
    ...figures,
    head_metrics: head.status === 'ok' ? head.metrics : [],
    base_metrics: base.status === 'ok' ? base.metrics : [],
    head_missing: head.status === 'missing',
    base_missing: base.status === 'missing',
    head_missing_reason: head.status === 'missing' ? head.reason : null,
    base_missing_reason: base.status === 'missing' ? base.reason : null,
    head_error: head.status === 'error',
    base_error: base.status === 'error',
    head_error_code: head.status === 'error' ? head.exitCode : null,
    base_error_code: base.status === 'error' ? base.exitCode : null,
    head_error_reason: head.status === 'error' ? head.reason : null,
    base_error_reason: base.status === 'error' ? base.reason : null,
    head_error_output: head.status === 'error' ? head.output : null,
    base_error_output: base.status === 'error' ? base.output : null,
  })
}

/**
 * 整个 Case 在执行前就失败（例如在隔离 worktree 中 checkout 失败）时的结果
 */
export function failedResult(info: CaseInfo, error: unknown): ComparisonResult {
  const outcome: RunOutcome = {
    status: 'error',
    exitCode: null,
    output: getErrorMessage(error),
    reason: error instanceof AppError ? error.code.toLowerCase() : null,
  }
  return composeResult(info, outcome, outcome)
}

/**
 * 执行一个 Case
 *
 * @param lease - 共享工作区的独占租约，调用方负责获取
 * @throws AppError 工作目录不存在；或最后的 checkout head 失败（工作区状态未知）
 */
export async function runCase(lease: CheckoutLease, info: CaseInfo, options: RunCaseOptions): Promise<ComparisonResult> {
  const { headRef, baseRef, workingDirectory = '.', targetRoot = DEFAULT_TARGET_ROOT } = options

  const workdir = resolve(lease.root, workingDirectory)
  if (!existsSync(workdir)) {
    throw AppError.configInvalid(`working directory does not exist: ${workdir}`)
  }

  const caseDir = join(resolve(lease.root, targetRoot), caseSlug(info))
  const runAt = async (ref: string, side: Side): Promise<RunOutcome> => {
    try {
      await lease.checkout(ref)
    } catch (error) {
      logger.error(`[${side}] ${getErrorMessage(error)}`)
      return { status: 'error', exitCode: null, output: getErrorMessage(error), reason: 'checkout failed' }
    }
    return runSide({
      side,
      command: info.command,
      workdir,
      targetDir: join(caseDir, side),
      targetDirEnv: options.targetDirEnv,
      shell: options.shell,
      executor: options.executor,
      classifier: options.classifier,
    })
  }

  logger.info(`Running ${info.benchmark_name} [${info.feature_name}]: ${headRef} vs ${baseRef}`)

  let head: RunOutcome
  let base: RunOutcome
  try {
    head = await runAt(headRef, 'head')
    base = await runAt(baseRef, 'base')
  } finally {
    await lease.checkout(headRef)
  }

  const result = composeResult(info, head, base)
  logger.info(
    `${info.benchmark_name} [${info.feature_name}]: base=${result.base_total} head=${result.head_total} (${head.status}/${base.status})`
  )
  return result
}
