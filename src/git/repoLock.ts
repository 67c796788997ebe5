/**
 * 共享工作区的独占访问
 *
 * 同一仓库根目录在任一时刻最多只有一个 Case 可以切换 revision：
 * - 进程内：按 root 串行的 Promise 链
 * - 进程间：root 下的 pid 锁文件（持有进程已退出时视为陈旧锁并清理）
 * 没有超时，长时间运行的 benchmark 会让后续 Case 一直等待。
 */

import { existsSync, linkSync, readFileSync, renameSync, statSync, unlinkSync, writeFileSync } from 'fs'
import { join } from 'path'
import { createLogger } from '../shared/logger.js'
import type { Checkout } from './checkout.js'

const logger = createLogger('repo-lock')

export const LOCK_FILE_NAME = 'perfgate.lock'
const DEFAULT_POLL_INTERVAL_MS = 500

/**
 * 持有期间可以切换 revision 的租约，release 之后再调用会抛错
 */
export class CheckoutLease {
  private released = false

  constructor(private readonly target: Checkout) {}

  get root(): string {
    return this.target.root
  }

  get isReleased(): boolean {
    return this.released
  }

  async checkout(ref: string): Promise<void> {
    if (this.released) {
      throw new Error(`Checkout lease for ${this.target.root} used after release`)
    }
    await this.target.checkout(ref)
  }

  release(): void {
    this.released = true
  }
}

export interface LeaseOptions {
  /** 锁文件路径；false 表示只做进程内互斥 */
  lockFile?: string | false
  pollIntervalMs?: number
}

// root -> 当前队尾
const chains = new Map<string, Promise<void>>()

/** 优先放在 .git 目录里，避免在工作区留下未跟踪文件 */
export function defaultLockPath(root: string): string {
  const gitDir = join(root, '.git')
  if (existsSync(gitDir) && statSync(gitDir).isDirectory()) {
    return join(gitDir, LOCK_FILE_NAME)
  }
  return join(root, `.${LOCK_FILE_NAME}`)
}

function isProcessAlive(pid: number): boolean {
  try {
    // 信号 0 只检查进程是否存在
    process.kill(pid, 0)
    return true
  } catch (e) {
    // EPERM：进程存在，只是属于其他用户
    return (e as NodeJS.ErrnoException).code === 'EPERM'
  }
}

/** 空锁文件超过这个时间仍没有 pid，视为持有者在写入前崩溃 */
const EMPTY_LOCK_GRACE_MS = 10_000

type LockHolder = { kind: 'pid'; pid: number } | { kind: 'pending' } | { kind: 'gone' }

function readHolder(path: string): LockHolder {
  let content: string
  let ageMs: number
  try {
    content = readFileSync(path, 'utf-8').trim()
    ageMs = Date.now() - statSync(path).mtimeMs
  } catch {
    return { kind: 'gone' }
  }
  const pid = /^\d+$/.test(content) ? Number.parseInt(content, 10) : Number.NaN
  if (!Number.isNaN(pid)) return { kind: 'pid', pid }
  // wx 创建与写入 pid 之间，其他进程会读到空文件
  return ageMs < EMPTY_LOCK_GRACE_MS ? { kind: 'pending' } : { kind: 'pid', pid: Number.NaN }
}

/**
 * 清理陈旧锁
 *
 * 先改名到本进程独有的路径，确认改名后的文件仍是那把陈旧锁再删除；
 * 如果改名拿到的是别人刚写入的新锁，则原样放回。
 */
function breakStaleLock(lockPath: string, stalePid: number): void {
  const aside = `${lockPath}.stale-${process.pid}-${Date.now()}`
  try {
    renameSync(lockPath, aside)
  } catch {
    logger.debug('Stale lock already removed by another process')
    return
  }

  const holder = readHolder(aside)
  if (holder.kind === 'pid' && Object.is(holder.pid, stalePid)) {
    logger.warn(`Removed stale checkout lock ${lockPath} (holder pid ${stalePid} is not running)`)
    unlinkSync(aside)
    return
  }

  try {
    linkSync(aside, lockPath)
  } catch (e) {
    logger.error(`Failed to restore checkout lock ${lockPath}:`, e)
  }
  unlinkSync(aside)
}

function tryAcquireFileLock(lockPath: string): boolean {
  try {
    writeFileSync(lockPath, process.pid.toString(), { flag: 'wx' })
    return true
  } catch (e) {
    if ((e as NodeJS.ErrnoException).code !== 'EEXIST') throw e
  }

  const holder = readHolder(lockPath)
  // gone：持有者刚好释放；pending：持有者还没写完 pid。都等下一轮
  if (holder.kind !== 'pid') return false
  if (Number.isNaN(holder.pid) || !isProcessAlive(holder.pid)) {
    breakStaleLock(lockPath, holder.pid)
  }
  return false
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

async function acquireFileLock(lockPath: string, pollIntervalMs: number): Promise<void> {
  let announced = false
  while (!tryAcquireFileLock(lockPath)) {
    if (!announced) {
      logger.info(`Waiting for checkout lock ${lockPath}`)
      announced = true
    }
    await sleep(pollIntervalMs)
  }
  logger.debug(`Acquired checkout lock ${lockPath}`)
}

function releaseFileLock(lockPath: string): void {
  const holder = readHolder(lockPath)
  // 只删除自己的锁
  if (holder.kind !== 'pid' || holder.pid !== process.pid) {
    logger.warn(`Checkout lock ${lockPath} is no longer held by this process`)
    return
  }
  try {
    unlinkSync(lockPath)
  } catch (e) {
    logger.error(`Failed to release checkout lock ${lockPath}:`, e)
  }
}

/**
 * 在独占租约内执行 fn
 *
 * fn 结束（无论成功或抛错）后租约失效、锁释放，下一个等待者才开始。
 */
export async function withCheckoutLease<T>(
  checkout: Checkout,
  fn: (lease: CheckoutLease) => Promise<T>,
  options: LeaseOptions = {}
): Promise<T> {
  const key = checkout.root
  const previous = chains.get(key) ?? Promise.resolve()

  let open: () => void = () => {}
  const gate = new Promise<void>(resolve => {
    open = resolve
  })
  const tail = previous.then(() => gate)
  chains.set(key, tail)

  await previous

  const lockPath = options.lockFile === false ? null : (options.lockFile ?? defaultLockPath(key))
  const lease = new CheckoutLease(checkout)
  try {
    if (lockPath) await acquireFileLock(lockPath, options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS)
    try {
      return await fn(lease)
    } finally {
      if (lockPath) releaseFileLock(lockPath)
    }
  } finally {
    lease.release()
    open()
    if (chains.get(key) === tail) chains.delete(key)
  }
}
