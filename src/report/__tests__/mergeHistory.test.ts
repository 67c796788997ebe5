import { describe, it, expect } from 'vitest'
import { mergeHistory } from '../mergeHistory.js'
import type { HistoryEntry } from '../types.js'

function entry(commit: string, regressions = 0): HistoryEntry {
  return {
    commit,
    run_at: '2024-05-01T00:00:00.000Z',
    summary: { improved: 0, regressions, neutral: 1 },
    avg_bench_delta_pct: null,
    avg_metric_delta_pct: null,
    has_regressions: regressions > 0,
  }
}

describe('mergeHistory', () => {
  it('should put the new entry first and truncate', () => {
    const merged = mergeHistory(entry('ddd'), [entry('aaa'), entry('bbb'), entry('ccc')], 2)
    expect(merged.map(e => e.commit)).toEqual(['ddd', 'aaa'])
  })

  it('should replace a stale entry for the same commit', () => {
    const merged = mergeHistory(entry('bbb', 2), [entry('aaa'), entry('bbb'), entry('ccc')], 20)
    expect(merged.map(e => e.commit)).toEqual(['bbb', 'aaa', 'ccc'])
    expect(merged[0]?.summary.regressions).toBe(2)
  })

  it('should never exceed maxHistory', () => {
    expect(mergeHistory(entry('x'), [entry('y')], 1).map(e => e.commit)).toEqual(['x'])
    expect(mergeHistory(entry('x'), [entry('y')], 0)).toEqual([])
  })

  it('should start a history from nothing', () => {
    expect(mergeHistory(entry('x'), [])).toEqual([entry('x')])
  })
})
