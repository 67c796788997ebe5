import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { join } from 'path'
import { loadResults } from '../loadResults.js'
import { writeResultArtifact } from '../../runner/resultArtifact.js'
import { AppError } from '../../shared/error.js'
import { makeTempDir, removeDir, writeFile } from '../../../tests/helpers/fakes.js'
import { missingResult, okResult } from '../../../tests/helpers/results.js'

let dir: string

beforeEach(() => {
  dir = makeTempDir('load')
})

afterEach(() => {
  removeDir(dir)
})

describe('loadResults', () => {
  it('should load every result.json below the directory in path order', () => {
    writeResultArtifact(join(dir, 'b', 'result.json'), okResult('bench_b', 'default', 10, 11))
    writeResultArtifact(join(dir, 'a', 'nested', 'result.json'), missingResult('bench_a', 'default', 'head', 'gone'))
    writeFile(join(dir, 'a', 'notes.json'), '{}')

    const results = loadResults(dir)

    expect(results.map(r => r.benchmark_name)).toEqual(['bench_a', 'bench_b'])
    expect(results[0]?.delta_pct).toBeNaN()
    expect(results[1]?.delta_pct).toBe(10)
  })

  it('should return nothing for an absent directory', () => {
    expect(loadResults(join(dir, 'nowhere'))).toEqual([])
  })

  it('should fail on an invalid artifact', () => {
    writeFile(join(dir, 'x', 'result.json'), JSON.stringify({ benchmark_name: 'x' }))
    expect(() => loadResults(dir)).toThrow(AppError)
  })
})
