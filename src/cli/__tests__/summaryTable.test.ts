import { describe, it, expect } from 'vitest'
import { aggregateResults } from '../../report/index.js'
import { formatSummaryTable } from '../summaryTable.js'
import { missingResult, okResult } from '../../../tests/helpers/results.js'

describe('formatSummaryTable', () => {
  it('should print one row per feature set with its average delta', () => {
    const aggregate = aggregateResults(
      [okResult('bench_a', 'default', 1000, 1050), missingResult('bench_b', 'simd', 'head', 'feature not available')],
      3
    )

    const rows = formatSummaryTable(aggregate).split('\n')

    expect(rows.find(r => r.includes('default'))).toContain('+5.00%')
    expect(rows.find(r => r.includes('simd'))).toContain('n/a')
  })
})
