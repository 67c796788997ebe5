import { describe, it, expect } from 'vitest'
import { aggregateResults, buildHistoryEntry, mean, metricDeltas } from '../aggregateResults.js'
import { errorResult, missingResult, okResult } from '../../../tests/helpers/results.js'

describe('mean', () => {
  it('should ignore non-finite values', () => {
    expect(mean([5, -25, Number.NaN, Number.POSITIVE_INFINITY])).toBe(-10)
  })

  it('should return null without finite values', () => {
    expect(mean([])).toBeNull()
    expect(mean([Number.NaN])).toBeNull()
  })
})

describe('metricDeltas', () => {
  it('should compare the union of metric names with zero for the absent side', () => {
    const result = okResult('bench_a', 'default', 1000, 1003, {
      base: [
        { metric: 'a/callgrind.out', value: 1000 },
        { metric: 'gone/callgrind.out', value: 0 },
      ],
      head: [
        { metric: 'a/callgrind.out', value: 1003 },
        { metric: 'new/callgrind.out', value: 0 },
      ],
    })
    expect(metricDeltas(result).map(d => Number(d.toFixed(6)))).toEqual([0.3, 0, 0])
  })
})

describe('aggregateResults', () => {
  it('should flag a regression above the threshold', () => {
    const aggregate = aggregateResults([okResult('bench_a', 'default', 1000, 1050)], 3)

    expect(aggregate.regressions).toBe(1)
    expect(aggregate.has_regressions).toBe(true)
    expect(aggregate.has_errors).toBe(false)
    expect(aggregate.groups[0]?.entries[0]?.status).toBe('regression')
    expect(aggregate.avg_bench_delta_pct).toBe(5)
  })

  it('should skip cases missing a side and leave them out of averages', () => {
    const aggregate = aggregateResults(
      [okResult('bench_a', 'default', 200, 150), missingResult('bench_b', 'default', 'base', 'bench target not found')],
      3
    )

    expect(aggregate.improved).toBe(1)
    expect(aggregate.skipped_count).toBe(1)
    expect(aggregate.groups[0]?.skipped.map(r => r.benchmark_name)).toEqual(['bench_b'])
    expect(aggregate.avg_bench_delta_pct).toBe(-25)
    expect(aggregate.avg_metric_delta_pct).toBe(-25)
  })

  it('should list errored cases as failed even when the other side is missing', () => {
    const mixed = {
      ...errorResult('bench_c', 'default', 'head', 101),
      base_missing: true,
      base_missing_reason: 'feature not available',
    }
    const aggregate = aggregateResults([mixed], 3)

    expect(aggregate.failed_count).toBe(1)
    expect(aggregate.skipped_count).toBe(0)
    expect(aggregate.has_errors).toBe(true)
    expect(aggregate.improved + aggregate.regressions + aggregate.neutral).toBe(0)
  })

  it('should group by feature set and sort benchmarks', () => {
    const aggregate = aggregateResults(
      [
        okResult('zeta', 'simd', 100, 100),
        okResult('bench_b', 'default', 1000, 1010),
        okResult('alpha', 'simd', 100, 100),
        okResult('bench_a', 'default', 1000, 1003),
      ],
      3
    )

    expect(aggregate.groups.map(g => g.feature_name)).toEqual(['default', 'simd'])
    expect(aggregate.groups[1]?.entries.map(e => e.result.benchmark_name)).toEqual(['alpha', 'zeta'])
  })

  it('should count slight regressions and unknown deltas as neutral', () => {
    const aggregate = aggregateResults(
      [okResult('bench_a', 'default', 1000, 1010), okResult('bench_b', 'default', 0, 5)],
      3
    )

    expect(aggregate.groups[0]?.entries.map(e => e.status)).toEqual(['slight_regression', 'unknown'])
    expect(aggregate.neutral).toBe(2)
    expect(aggregate.has_regressions).toBe(false)
    expect(aggregate.avg_bench_delta_pct).toBe(1)
  })

  it('should average across all comparable cases', () => {
    const aggregate = aggregateResults(
      [okResult('bench_a', 'default', 1000, 1050), okResult('bench_b', 'simd', 200, 150)],
      3
    )

    expect(aggregate.avg_bench_delta_pct).toBe(-10)
    expect(aggregate.avg_metric_delta_pct).toBe(-10)
    expect(aggregate.groups.map(g => g.avg_bench_delta_pct)).toEqual([5, -25])
  })

  it('should report null averages without comparable cases', () => {
    const aggregate = aggregateResults([missingResult('bench_a', 'default', 'head', 'missing bench file')], 3)
    expect(aggregate.avg_bench_delta_pct).toBeNull()
    expect(aggregate.avg_metric_delta_pct).toBeNull()
  })
})

describe('buildHistoryEntry', () => {
  it('should copy counts and averages from the aggregate', () => {
    const aggregate = aggregateResults([okResult('bench_a', 'default', 1000, 1050)], 3)
    const entry = buildHistoryEntry(aggregate, { commit: 'abc', runAt: '2024-05-01T00:00:00.000Z' })

    expect(entry).toEqual({
      commit: 'abc',
      run_at: '2024-05-01T00:00:00.000Z',
      summary: { improved: 0, regressions: 1, neutral: 0 },
      avg_bench_delta_pct: 5,
      avg_metric_delta_pct: 5,
      has_regressions: true,
    })
  })
})
