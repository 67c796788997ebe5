import { existsSync, readdirSync } from 'fs'
import { join, parse } from 'path'
import { createLogger } from '../shared/logger.js'
import type { BenchmarkSpec } from './types.js'

const logger = createLogger('discover')

/** 约定的 benchmark 源码目录 */
export const BENCHES_DIR = 'benches'
/** 聚合模块文件，不是独立的 bench 目标 */
export const RESERVED_BENCH_FILE = 'mod.rs'

/**
 * 从 <repo>/<workingDirectory>/benches/*.rs 发现 benchmark
 *
 * 每个文件一个 spec，name 与 bench 都取文件名（不含扩展名），按文件名排序。
 */
export function discoverBenchmarks(repoPath: string, workingDirectory = '.'): BenchmarkSpec[] {
  const benchesDir = join(repoPath, workingDirectory, BENCHES_DIR)
  if (!existsSync(benchesDir)) {
    logger.debug(`No benches directory at ${benchesDir}`)
    return []
  }

  const files = readdirSync(benchesDir, { withFileTypes: true })
    .filter(d => d.isFile() && d.name.endsWith('.rs') && d.name !== RESERVED_BENCH_FILE)
    .map(d => d.name)
    .sort()

  logger.debug(`Discovered ${files.length} benchmark(s) in ${benchesDir}`)

  return files.map(file => {
    const stem = parse(file).name
    return { name: stem, bench: stem }
  })
}
