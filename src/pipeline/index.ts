/**
 * @entry Pipeline 编排模块
 *
 * 串联 matrix / runner / report，负责 Case 级错误隔离与并发
 */

export { mapConcurrent } from './mapConcurrent.js'
export {
  type WorktreeProvider,
  type RunMatrixOptions,
  type CaseRun,
  gitWorktrees,
  runMatrix,
  WORKTREES_DIR,
} from './runMatrix.js'
export {
  type CompareOptions,
  type CompareOutcome,
  runComparison,
  REPORT_FILE_NAME,
  SUMMARY_FILE_NAME,
} from './compare.js'
