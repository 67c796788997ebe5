/**
 * @entry Git 工作区模块
 *
 * revision 切换、worktree 管理与共享工作区的独占租约
 */

export {
  type Checkout,
  createGitCheckout,
  addWorktree,
  removeWorktree,
  resolveCommit,
} from './checkout.js'

export {
  type LeaseOptions,
  CheckoutLease,
  LOCK_FILE_NAME,
  defaultLockPath,
  withCheckoutLease,
} from './repoLock.js'
