import { existsSync } from 'fs'
import { join } from 'path'
import { BENCHES_DIR } from '../matrix/discoverBenchmarks.js'

/** 出现这些参数时 bench 目标不一定在 <workdir>/benches 下，跳过结构检查 */
const RELOCATING_FLAGS = ['--manifest-path', '--package', '-p']

/**
 * 执行前的结构检查：bench 源文件在当前 revision 中是否存在
 *
 * 只处理可预测的 `cargo ... bench ... --bench <name>` 形式，其它命令返回 null（交给实际执行判断）。
 *
 * @returns 缺失原因，或 null
 */
export function detectMissingBench(argv: readonly string[], workdir: string): string | null {
  if (argv[0] !== 'cargo') return null
  if (!argv.includes('bench') || !argv.includes('--bench')) return null
  if (RELOCATING_FLAGS.some(flag => argv.includes(flag))) return null

  const benchName = argv[argv.indexOf('--bench') + 1]
  if (!benchName) return null

  const benchPath = join(workdir, BENCHES_DIR, `${benchName}.rs`)
  if (!existsSync(benchPath)) {
    return `missing bench file ${benchPath.split('\\').join('/')}`
  }
  return null
}
