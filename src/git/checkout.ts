import { execa } from 'execa'
import { resolve } from 'path'
import { AppError } from '../shared/error.js'
import { createLogger } from '../shared/logger.js'

const logger = createLogger('git')

/**
 * 一个可切换 revision 的工作区
 *
 * 所有共享同一 root 的 Case 都在改同一份状态，只能通过 CheckoutLease 使用。
 */
export interface Checkout {
  readonly root: string
  checkout(ref: string): Promise<void>
}

/**
 * 基于 git 的工作区
 */
export function createGitCheckout(root: string): Checkout {
  const absRoot = resolve(root)
  return {
    root: absRoot,
    async checkout(ref: string): Promise<void> {
      try {
        await execa('git', ['checkout', '--force', ref], { cwd: absRoot })
        logger.debug(`Checked out ${ref} in ${absRoot}`)
      } catch (error) {
        throw AppError.checkoutFailed(ref, error)
      }
    },
  }
}

/**
 * 为 Case 创建独立的 worktree（detached），使其不再共享主工作区
 */
export async function addWorktree(repoRoot: string, path: string, ref: string): Promise<Checkout> {
  try {
    await execa('git', ['worktree', 'add', '--detach', '--force', path, ref], { cwd: resolve(repoRoot) })
  } catch (error) {
    throw AppError.checkoutFailed(ref, error)
  }
  logger.debug(`Added worktree ${path} at ${ref}`)
  return createGitCheckout(path)
}

/**
 * 删除 worktree
 */
export async function removeWorktree(repoRoot: string, path: string): Promise<void> {
  await execa('git', ['worktree', 'remove', '--force', path], { cwd: resolve(repoRoot) })
  logger.debug(`Removed worktree ${path}`)
}

/**
 * 解析 ref 对应的完整 commit
 */
export async function resolveCommit(repoRoot: string, ref: string): Promise<string> {
  const { stdout } = await execa('git', ['rev-parse', ref], { cwd: resolve(repoRoot) })
  return stdout.trim()
}
