/**
 * 进程内替身：git 工作区与命令执行
 *
 * FakeRepo 用一个 ref → 文件集合的映射模拟 checkout，切换时重写工作区里的文件；
 * fakeExecutor 根据当前 checkout 的 ref 返回预设结果，并按需写出 callgrind 文件。
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs'
import { dirname, join } from 'path'
import { tmpdir } from 'os'
import type { Checkout } from '../../src/git/checkout.js'
import type { CommandExecutor, CommandRequest, CommandResult } from '../../src/runner/executeCommand.js'

export function makeTempDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), `perfgate-test-${prefix}-`))
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true })
}

export function writeFile(path: string, content: string): void {
  mkdirSync(dirname(path), { recursive: true })
  writeFileSync(path, content)
}

/** 每个 ref 对应的工作区文件（相对 root） */
export type RevisionFiles = Record<string, Record<string, string>>

export class FakeRepo implements Checkout {
  readonly checkouts: string[] = []
  current: string | null = null
  /** 指定 ref 的 checkout 抛错 */
  failOn = new Set<string>()

  constructor(
    readonly root: string,
    private readonly revisions: RevisionFiles = {}
  ) {}

  async checkout(ref: string): Promise<void> {
    this.checkouts.push(ref)
    if (this.failOn.has(ref)) {
      throw new Error(`pathspec '${ref}' did not match`)
    }
    const previous = this.current ? (this.revisions[this.current] ?? {}) : {}
    for (const rel of Object.keys(previous)) {
      rmSync(join(this.root, rel), { force: true })
    }
    for (const [rel, content] of Object.entries(this.revisions[ref] ?? {})) {
      writeFile(join(this.root, rel), content)
    }
    this.current = ref
  }
}

/** 一次命令执行的预设结果 */
export interface ScriptedRun {
  exitCode: number
  output?: string
  /** 执行成功时写到构建目录下的 callgrind 文件：相对路径 → 内容 */
  profiles?: Record<string, string>
}

export interface FakeExecutor {
  executor: CommandExecutor
  requests: CommandRequest[]
}

/**
 * 根据 repo.current 选择预设结果；构建目录取 request.env 中的 targetDirEnv
 */
export function fakeExecutor(
  repo: FakeRepo,
  script: Record<string, ScriptedRun>,
  targetDirEnv = 'CARGO_TARGET_DIR'
): FakeExecutor {
  const requests: CommandRequest[] = []
  const executor: CommandExecutor = async (request: CommandRequest): Promise<CommandResult> => {
    requests.push(request)
    const run = repo.current ? script[repo.current] : undefined
    if (!run) return { exitCode: 127, output: `no scripted run for ${repo.current ?? '(none)'}` }

    const targetDir = request.env[targetDirEnv]
    if (run.exitCode === 0 && targetDir) {
      for (const [rel, content] of Object.entries(run.profiles ?? {})) {
        writeFile(join(targetDir, rel), content)
      }
    }
    return { exitCode: run.exitCode, output: run.output ?? '' }
  }
  return { executor, requests }
}

/** callgrind.out 文件内容，summary 行之前带一些头部 */
export function callgrindOutput(total: number): string {
  return ['# callgrind format', 'version: 1', 'creator: callgrind-3.22.0', 'events: Ir', `summary: ${total}`, 'totals: 0'].join(
    '\n'
  )
}
