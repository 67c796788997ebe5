/**
 * Matrix 展开
 * benchmark × feature-set → Case 列表
 */

import { AppError } from '../shared/error.js'
import { createLogger } from '../shared/logger.js'
import { buildCommand } from './buildCommand.js'
import { computeCaseId } from './caseId.js'
import { discoverBenchmarks } from './discoverBenchmarks.js'
import { DEFAULT_FEATURE_SET, type BenchmarkSpec, type Case, type FeatureSet, type Matrix } from './types.js'

const logger = createLogger('matrix')

export interface ExpandMatrixOptions {
  benchmarks: readonly BenchmarkSpec[]
  featureSets?: readonly FeatureSet[]
  /** 全局附加参数（例如 cargo 的 -- --nocapture） */
  extraArgs?: string
  /** benchmarks 为空时是否扫描 benches/ 目录 */
  autoDiscover?: boolean
  /** 仓库根目录，自动发现时使用 */
  repoPath?: string
  workingDirectory?: string
}

/**
 * 生成 Case 列表
 *
 * 顺序：benchmark 为外层、feature-set 为内层，均保持输入顺序。
 */
export function makeCases(
  benchmarks: readonly BenchmarkSpec[],
  featureSets: readonly FeatureSet[],
  extraArgs = ''
): Case[] {
  const cases: Case[] = []
  for (const bench of benchmarks) {
    for (const featureSet of featureSets) {
      cases.push(
        Object.freeze({
          id: computeCaseId(bench.name, featureSet.name, featureSet.features),
          benchmark_name: bench.name,
          feature_name: featureSet.name,
          command: buildCommand(bench, featureSet, extraArgs),
        })
      )
    }
  }
  return cases
}

/**
 * 展开完整 matrix
 *
 * @throws AppError 最终 benchmark 列表为空（绝不返回空 matrix）
 */
export function expandMatrix(options: ExpandMatrixOptions): Matrix {
  const {
    featureSets = [],
    extraArgs = '',
    autoDiscover = false,
    repoPath = process.cwd(),
    workingDirectory = '.',
  } = options

  let benchmarks = options.benchmarks
  if (benchmarks.length === 0 && autoDiscover) {
    benchmarks = discoverBenchmarks(repoPath, workingDirectory)
  }

  if (benchmarks.length === 0) {
    throw AppError.noBenchmarks()
  }

  const sets = featureSets.length > 0 ? featureSets : [DEFAULT_FEATURE_SET]
  const include = makeCases(benchmarks, sets, extraArgs)

  logger.info(`Expanded ${benchmarks.length} benchmark(s) × ${sets.length} feature set(s) → ${include.length} case(s)`)

  const duplicates = findDuplicateIds(include)
  if (duplicates.length > 0) {
    logger.warn(`Duplicate case ids (identical inputs): ${duplicates.join(', ')}`)
  }

  return Object.freeze({ include: Object.freeze(include) })
}

function findDuplicateIds(cases: readonly Case[]): string[] {
  const seen = new Set<string>()
  const duplicates = new Set<string>()
  for (const c of cases) {
    if (seen.has(c.id)) duplicates.add(c.id)
    seen.add(c.id)
  }
  return [...duplicates]
}
