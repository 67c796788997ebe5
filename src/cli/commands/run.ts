import { Command } from 'commander'
import { resolve } from 'path'
import { createGitCheckout, withCheckoutLease } from '../../git/index.js'
import { runCase, writeCaseResult } from '../../runner/index.js'
import { loadConfig } from '../../config/index.js'
import { printCaseDiagnostics } from '../diagnostics.js'
import { success } from '../output.js'

interface RunCommandOptions {
  repoPath: string
  workingDirectory?: string
  benchmarkName: string
  featureName: string
  command: string
  headSha: string
  baseSha: string
  output: string
  shell?: boolean
}

export function registerRunCommand(program: Command) {
  program
    .command('run')
    .description('Run one case on head and base and write its result.json')
    .option('--repo-path <path>', 'Repository root', '.')
    .option('--working-directory <dir>', 'Directory the command runs in, relative to the repository root')
    .requiredOption('--benchmark-name <name>', 'Benchmark name')
    .requiredOption('--feature-name <name>', 'Feature set name')
    .requiredOption('--command <command>', 'Fully expanded benchmark command')
    .requiredOption('--head-sha <sha>', 'Head revision')
    .requiredOption('--base-sha <sha>', 'Base revision')
    .requiredOption('-o, --output <file>', 'Path of the result.json to write')
    .option('--shell', 'Run the command through the system shell')
    .action(async (options: RunCommandOptions) => {
      const repoPath = resolve(options.repoPath)
      const config = await loadConfig({ cwd: repoPath })
      const checkout = createGitCheckout(repoPath)
      const info = {
        benchmark_name: options.benchmarkName,
        feature_name: options.featureName,
        command: options.command,
      }

      const result = await withCheckoutLease(checkout, lease =>
        runCase(lease, info, {
          headRef: options.headSha,
          baseRef: options.baseSha,
          workingDirectory: options.workingDirectory ?? config.workingDirectory,
          targetRoot: config.targetRoot,
          targetDirEnv: config.targetDirEnv,
          shell: options.shell ?? config.shell,
        })
      )

      const written = writeCaseResult(options.output, result)
      printCaseDiagnostics(result, written)

      if (written.hasErrors) {
        process.exitCode = 1
        return
      }
      success(`Result written to ${written.resultPath}`)
    })
}
