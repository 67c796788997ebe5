/**
 * 执行整个 matrix
 *
 * - jobs = 1：所有 Case 共享仓库工作区，经 withCheckoutLease 串行切换 revision
 * - jobs > 1：每个 Case 拥有独立的 detached worktree，互不干扰
 *
 * 单个 Case 抛出的异常转换为失败结果，不影响其它 Case。
 */

import { join, resolve } from 'path'
import type { Case } from '../matrix/types.js'
import { addWorktree, createGitCheckout, removeWorktree, type Checkout } from '../git/checkout.js'
import { withCheckoutLease } from '../git/repoLock.js'
import { DEFAULT_TARGET_ROOT, failedResult, runCase, type RunCaseOptions } from '../runner/runCase.js'
import { RESULT_FILE_NAME } from '../runner/resultArtifact.js'
import type { ComparisonResult } from '../runner/types.js'
import { writeCaseResult, type WrittenCaseResult } from '../runner/writeCaseResult.js'
import { fromPromise } from '../shared/result.js'
import { createLogger, logError } from '../shared/logger.js'
import { mapConcurrent } from './mapConcurrent.js'

const logger = createLogger('pipeline')

export const WORKTREES_DIR = 'worktrees'

/** worktree 的创建与清理，测试中可替换 */
export interface WorktreeProvider {
  add(repoRoot: string, path: string, ref: string): Promise<Checkout>
  remove(repoRoot: string, path: string): Promise<void>
}

export const gitWorktrees: WorktreeProvider = {
  add: addWorktree,
  remove: removeWorktree,
}

export interface RunMatrixOptions extends RunCaseOptions {
  readonly repoPath: string
  /** result.json 输出根目录，每个 Case 写到 <outputDir>/<case.id>/ */
  readonly outputDir: string
  readonly jobs?: number
  /** 共享工作区，默认 git checkout */
  readonly checkout?: Checkout
  readonly worktrees?: WorktreeProvider
  /** 共享工作区的锁文件；false 只做进程内互斥 */
  readonly lockFile?: string | false
}

export interface CaseRun {
  readonly case: Case
  readonly result: ComparisonResult
  readonly written: WrittenCaseResult
}

function caseLabel(c: Case): string {
  return `${c.benchmark_name} [${c.feature_name}]`
}

async function runShared(c: Case, options: RunMatrixOptions, checkout: Checkout): Promise<ComparisonResult> {
  return withCheckoutLease(checkout, lease => runCase(lease, c, options), { lockFile: options.lockFile })
}

async function runIsolated(c: Case, options: RunMatrixOptions, worktrees: WorktreeProvider): Promise<ComparisonResult> {
  const repoRoot = resolve(options.repoPath)
  const path = join(repoRoot, options.targetRoot ?? DEFAULT_TARGET_ROOT, WORKTREES_DIR, c.id)
  const checkout = await worktrees.add(repoRoot, path, options.headRef)
  try {
    // worktree 为该 Case 独占，不需要锁文件
    return await withCheckoutLease(checkout, lease => runCase(lease, c, options), { lockFile: false })
  } finally {
    const removed = await fromPromise(worktrees.remove(repoRoot, path))
    if (!removed.ok) logError(logger, `Failed to remove worktree ${path}`, removed.error, { caseId: c.id })
  }
}

/**
 * 执行全部 Case 并写出 result.json，返回顺序与输入一致
 */
export async function runMatrix(cases: readonly Case[], options: RunMatrixOptions): Promise<CaseRun[]> {
  const jobs = Math.max(1, options.jobs ?? 1)
  const checkout = options.checkout ?? createGitCheckout(options.repoPath)
  const worktrees = options.worktrees ?? gitWorktrees

  if (options.shell) {
    logger.warn('Shell execution is enabled: commands are interpreted by the system shell')
  }
  logger.info(`Running ${cases.length} case(s) with ${jobs} job(s)`)

  return mapConcurrent(cases, jobs, async c => {
    const run = jobs > 1 ? runIsolated(c, options, worktrees) : runShared(c, options, checkout)
    const outcome = await fromPromise(run)

    let result: ComparisonResult
    if (outcome.ok) {
      result = outcome.value
    } else {
      logError(logger, `Case ${caseLabel(c)} failed`, outcome.error, {
        caseId: c.id,
        benchmark: c.benchmark_name,
        feature: c.feature_name,
      })
      result = failedResult(c, outcome.error)
    }

    const written = writeCaseResult(join(options.outputDir, c.id, RESULT_FILE_NAME), result)
    return { case: c, result, written }
  })
}
