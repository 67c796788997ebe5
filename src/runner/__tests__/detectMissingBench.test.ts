import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { join } from 'path'
import { detectMissingBench } from '../detectMissingBench.js'
import { makeTempDir, removeDir, writeFile } from '../../../tests/helpers/fakes.js'

let workdir: string

beforeEach(() => {
  workdir = makeTempDir('detect')
  writeFile(join(workdir, 'benches', 'present.rs'), '')
})

afterEach(() => {
  removeDir(workdir)
})

describe('detectMissingBench', () => {
  it('should report a missing bench source file', () => {
    const reason = detectMissingBench(['cargo', 'bench', '--bench', 'absent'], workdir)
    expect(reason).toBe(`missing bench file ${join(workdir, 'benches', 'absent.rs')}`)
  })

  it('should accept a bench that exists', () => {
    expect(detectMissingBench(['cargo', 'bench', '--bench', 'present', '--features', 'x'], workdir)).toBeNull()
  })

  it('should skip the check when the target may live elsewhere', () => {
    expect(detectMissingBench(['cargo', 'bench', '--bench', 'absent', '-p', 'core'], workdir)).toBeNull()
    expect(detectMissingBench(['cargo', 'bench', '--bench', 'absent', '--manifest-path', 'x/Cargo.toml'], workdir)).toBeNull()
  })

  it('should ignore commands it cannot predict', () => {
    expect(detectMissingBench(['make', 'bench'], workdir)).toBeNull()
    expect(detectMissingBench(['cargo', 'bench'], workdir)).toBeNull()
    expect(detectMissingBench(['cargo', 'bench', '--bench'], workdir)).toBeNull()
  })
})
