import { describe, it, expect, vi, beforeEach } from 'vitest'

const execaMock = vi.hoisted(() => vi.fn())
vi.mock('execa', () => ({ execa: execaMock }))

const { execaExecutor } = await import('../executeCommand.js')

const request = {
  command: 'cargo bench --bench bench_a',
  argv: ['cargo', 'bench', '--bench', 'bench_a'],
  cwd: '/repo',
  env: { CARGO_TARGET_DIR: '/repo/.perfgate-target/abc' },
  shell: false,
}

beforeEach(() => {
  execaMock.mockReset()
})

describe('execaExecutor', () => {
  it('should run the argument vector without rejecting', async () => {
    execaMock.mockResolvedValue({ failed: false, exitCode: 0, all: 'done' })

    expect(await execaExecutor(request)).toEqual({ exitCode: 0, output: 'done' })
    expect(execaMock).toHaveBeenCalledWith('cargo', ['bench', '--bench', 'bench_a'], {
      cwd: '/repo',
      env: { CARGO_TARGET_DIR: '/repo/.perfgate-target/abc' },
      all: true,
      stdin: 'ignore',
      reject: false,
    })
  })

  it('should return a non-zero exit with the combined output', async () => {
    execaMock.mockResolvedValue({ failed: true, exitCode: 101, all: 'error: no bench target named `bench_a`' })

    expect(await execaExecutor(request)).toEqual({
      exitCode: 101,
      output: 'error: no bench target named `bench_a`',
    })
  })

  it('should describe a process that never started', async () => {
    execaMock.mockResolvedValue({
      failed: true,
      exitCode: undefined,
      all: '',
      shortMessage: 'Command failed with ENOENT: cargo bench',
    })

    expect(await execaExecutor(request)).toEqual({
      exitCode: null,
      output: 'Command failed with ENOENT: cargo bench',
    })
  })

  it('should pass the raw command string in shell mode', async () => {
    execaMock.mockResolvedValue({ failed: false, exitCode: 0, all: '' })

    await execaExecutor({ ...request, shell: true })
    expect(execaMock).toHaveBeenCalledWith('cargo bench --bench bench_a', expect.objectContaining({ shell: true }))
  })
})
