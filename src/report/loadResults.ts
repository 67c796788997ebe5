import { existsSync, readdirSync } from 'fs'
import { join } from 'path'
import { readResultArtifact, RESULT_FILE_NAME } from '../runner/resultArtifact.js'
import type { ComparisonResult } from '../runner/types.js'
import { createLogger } from '../shared/logger.js'

const logger = createLogger('report')

function findResultFiles(dir: string): string[] {
  const found: string[] = []
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    const path = join(dir, entry.name)
    if (entry.isDirectory()) {
      found.push(...findResultFiles(path))
    } else if (entry.isFile() && entry.name === RESULT_FILE_NAME) {
      found.push(path)
    }
  }
  return found
}

/**
 * 递归读取产物目录下所有 result.json（按路径排序）
 *
 * @throws AppError 某个 result.json 内容不合法
 */
export function loadResults(artifactsDir: string): ComparisonResult[] {
  if (!existsSync(artifactsDir)) {
    logger.warn(`Artifacts directory not found: ${artifactsDir}`)
    return []
  }

  const results: ComparisonResult[] = []
  for (const path of findResultFiles(artifactsDir).sort()) {
    const result = readResultArtifact(path)
    if (result) results.push(result)
  }
  logger.info(`Loaded ${results.length} result(s) from ${artifactsDir}`)
  return results
}
