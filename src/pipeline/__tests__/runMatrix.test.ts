import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { existsSync, readFileSync } from 'fs'
import { join } from 'path'
import type { Case } from '../../matrix/types.js'
import type { CommandExecutor } from '../../runner/executeCommand.js'
import { runMatrix, type WorktreeProvider } from '../runMatrix.js'
import {
  callgrindOutput,
  FakeRepo,
  fakeExecutor,
  makeTempDir,
  removeDir,
  type RevisionFiles,
  type ScriptedRun,
} from '../../../tests/helpers/fakes.js'

const cases: Case[] = [
  { id: '3bac8e9a6e', benchmark_name: 'bench_a', feature_name: 'default', command: 'cargo bench --bench bench_a' },
  { id: 'b3d227109b', benchmark_name: 'bench_b', feature_name: 'default', command: 'cargo bench --bench bench_b' },
]

const bothBenches = { 'benches/bench_a.rs': '', 'benches/bench_b.rs': '' }
const revisions: RevisionFiles = { head: bothBenches, base: { 'benches/bench_a.rs': '' } }
const script: Record<string, ScriptedRun> = {
  head: { exitCode: 0, profiles: { 'callgrind.out.7': callgrindOutput(1050) } },
  base: { exitCode: 0, profiles: { 'callgrind.out.8': callgrindOutput(1000) } },
}

let root: string

beforeEach(() => {
  root = makeTempDir('matrix-run')
})

afterEach(() => {
  removeDir(root)
})

/** 每个 worktree 一个 FakeRepo，执行器按 cwd 分派 */
function fakeWorktrees(failFor?: string) {
  const executors = new Map<string, CommandExecutor>()
  const added: string[] = []
  const removed: string[] = []

  const provider: WorktreeProvider = {
    async add(_repoRoot, path, ref) {
      added.push(path)
      if (failFor && path.endsWith(failFor)) throw new Error(`could not create worktree ${path}`)
      const repo = new FakeRepo(path, revisions)
      await repo.checkout(ref)
      executors.set(path, fakeExecutor(repo, script).executor)
      return repo
    },
    async remove(_repoRoot, path) {
      removed.push(path)
      removeDir(path)
    },
  }

  const executor: CommandExecutor = async request => {
    const run = executors.get(request.cwd)
    if (!run) return { exitCode: 127, output: `no worktree at ${request.cwd}` }
    return run(request)
  }

  return { provider, executor, added, removed }
}

describe('runMatrix', () => {
  it('should run cases one after another in the shared checkout', async () => {
    const repo = new FakeRepo(root, revisions)
    const { executor } = fakeExecutor(repo, script)
    const outputDir = join(root, 'out')

    const runs = await runMatrix(cases, {
      repoPath: root,
      outputDir,
      headRef: 'head',
      baseRef: 'base',
      checkout: repo,
      executor,
    })

    expect(repo.checkouts).toEqual(['head', 'base', 'head', 'head', 'base', 'head'])
    expect(runs.map(r => r.case.id)).toEqual(['3bac8e9a6e', 'b3d227109b'])
    expect(runs[0]?.result).toMatchObject({ base_total: 1000, head_total: 1050, delta: 50 })
    expect(runs[1]?.result.base_missing).toBe(true)
    expect(runs[1]?.written.hasErrors).toBe(false)

    const written: unknown = JSON.parse(readFileSync(join(outputDir, '3bac8e9a6e', 'result.json'), 'utf-8'))
    expect(written).toMatchObject({ benchmark_name: 'bench_a', delta_pct: 5 })
    expect(existsSync(join(outputDir, 'b3d227109b', 'result.json'))).toBe(true)
    expect(existsSync(join(root, '.perfgate.lock'))).toBe(false)
  })

  it('should turn a thrown case into a failed result', async () => {
    const repo = new FakeRepo(root, revisions)
    repo.failOn.add('head')
    const { executor, requests } = fakeExecutor(repo, script)

    const runs = await runMatrix(cases.slice(0, 1), {
      repoPath: root,
      outputDir: join(root, 'out'),
      headRef: 'head',
      baseRef: 'base',
      checkout: repo,
      executor,
      lockFile: false,
    })

    expect(requests.map(r => r.env.CARGO_TARGET_DIR)).toEqual([
      join(root, '.perfgate-target', 'bench_a-default-3bac8e9a6e', 'base'),
    ])
    expect(runs[0]?.result).toMatchObject({ head_error: true, base_error: true, head_error_code: null })
    expect(runs[0]?.result.head_error_output).toBe("pathspec 'head' did not match")
    expect(runs[0]?.written.errorLogs.map(l => l.side)).toEqual(['head', 'base'])
  })

  it('should give each case its own worktree when running in parallel', async () => {
    const { provider, executor, added, removed } = fakeWorktrees()

    const runs = await runMatrix(cases, {
      repoPath: root,
      outputDir: join(root, 'out'),
      headRef: 'head',
      baseRef: 'base',
      jobs: 2,
      worktrees: provider,
      executor,
    })

    const expected = cases.map(c => join(root, '.perfgate-target', 'worktrees', c.id))
    expect([...added].sort()).toEqual(expected)
    expect([...removed].sort()).toEqual(expected)
    expect(runs.map(r => r.result.delta_pct)).toEqual([5, Number.NaN])
    expect(runs[1]?.result.base_missing_reason).toBe(`missing bench file ${join(expected[1] ?? '', 'benches', 'bench_b.rs')}`)
  })

  it('should keep running other cases when one worktree cannot be created', async () => {
    const { provider, executor, removed } = fakeWorktrees('3bac8e9a6e')

    const runs = await runMatrix(cases, {
      repoPath: root,
      outputDir: join(root, 'out'),
      headRef: 'head',
      baseRef: 'base',
      jobs: 2,
      worktrees: provider,
      executor,
    })

    expect(runs[0]?.result.head_error).toBe(true)
    expect(runs[0]?.result.head_error_output).toContain('could not create worktree')
    expect(runs[1]?.result).toMatchObject({ head_total: 1050, base_missing: true, head_error: false })
    expect(removed).toEqual([join(root, '.perfgate-target', 'worktrees', 'b3d227109b')])
  })
})
