import { createHash } from 'crypto'

/** Case ID 长度（十六进制字符） */
export const CASE_ID_LENGTH = 10

/**
 * 由 (benchmark, feature-set, features) 计算稳定的 Case ID
 *
 * 相同输入永远得到相同 ID，CI 里 matrix job 名和产物目录都依赖它。
 */
export function computeCaseId(benchmarkName: string, featureName: string, features: string): string {
  const seed = `${benchmarkName}|${featureName}|${features}`
  return createHash('sha1').update(seed, 'utf-8').digest('hex').slice(0, CASE_ID_LENGTH)
}
