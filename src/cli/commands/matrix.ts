import { Command } from 'commander'
import { resolve } from 'path'
import { expandMatrix, normalizeBenchmarks, normalizeFeatureSets } from '../../matrix/index.js'
import { writeJson } from '../../store/readWriteJson.js'
import { resolveConfig } from '../options.js'
import { success } from '../output.js'

interface MatrixCommandOptions {
  repoPath: string
  workingDirectory?: string
  benchmarksJson?: string
  featureSetsJson?: string
  autoDiscover?: boolean
  cargoArgs?: string
  output?: string
}

export function registerMatrixCommand(program: Command) {
  program
    .command('matrix')
    .description('Expand benchmarks × feature sets into a case matrix (JSON)')
    .option('--repo-path <path>', 'Repository root', '.')
    .option('--working-directory <dir>', 'Cargo project directory, relative to the repository root')
    .option('--benchmarks-json <json>', 'Benchmark list, e.g. \'["bench_a", {"name": "b", "bench": "bench_b"}]\'')
    .option('--feature-sets-json <json>', 'Feature set list, e.g. \'["simd", {"name": "minimal", "no_default_features": true}]\'')
    .option('--auto-discover', 'Discover benches/*.rs when no benchmarks are given')
    .option('--cargo-args <args>', 'Extra arguments appended to every command')
    .option('-o, --output <file>', 'Write the matrix to a file instead of stdout')
    .action(async (options: MatrixCommandOptions) => {
      const config = await resolveConfig(options.repoPath, options)
      const matrix = expandMatrix({
        benchmarks: normalizeBenchmarks(config.benchmarks),
        featureSets: normalizeFeatureSets(config.featureSets),
        extraArgs: config.cargoArgs,
        autoDiscover: config.autoDiscover,
        repoPath: resolve(options.repoPath),
        workingDirectory: config.workingDirectory,
      })

      if (options.output) {
        writeJson(options.output, matrix, { indent: 0 })
        success(`Matrix with ${matrix.include.length} case(s) written to ${options.output}`)
      } else {
        console.log(JSON.stringify(matrix))
      }
    })
}
