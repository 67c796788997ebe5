import { describe, it, expect } from 'vitest'
import { classifyDelta, metricDeltaPct } from '../classifyDelta.js'

describe('classifyDelta', () => {
  it('should classify against the threshold and noise band', () => {
    expect(classifyDelta(5, 3)).toBe('regression')
    expect(classifyDelta(2, 3)).toBe('slight_regression')
    expect(classifyDelta(0.2, 3)).toBe('neutral')
    expect(classifyDelta(-0.7, 3)).toBe('improved')
    expect(classifyDelta(-40, 3)).toBe('improved')
  })

  it('should treat the noise band edges as neutral', () => {
    expect(classifyDelta(0.5, 3)).toBe('neutral')
    expect(classifyDelta(-0.5, 3)).toBe('neutral')
    expect(classifyDelta(0.50001, 3)).toBe('slight_regression')
    expect(classifyDelta(-0.50001, 3)).toBe('improved')
  })

  it('should not count the threshold itself as a regression', () => {
    expect(classifyDelta(3, 3)).toBe('slight_regression')
    expect(classifyDelta(3.0001, 3)).toBe('regression')
  })

  it('should check the threshold before the noise band', () => {
    expect(classifyDelta(0.4, 0.25)).toBe('regression')
  })

  it('should mark non-finite values unknown', () => {
    expect(classifyDelta(Number.NaN, 3)).toBe('unknown')
    expect(classifyDelta(Number.POSITIVE_INFINITY, 3)).toBe('unknown')
  })
})

describe('metricDeltaPct', () => {
  it('should use the zero-base rule', () => {
    expect(metricDeltaPct(0, 0)).toBe(0)
    expect(metricDeltaPct(0, 5)).toBe(Number.POSITIVE_INFINITY)
    expect(classifyDelta(metricDeltaPct(0, 5), 3)).toBe('unknown')
    expect(metricDeltaPct(1000, 1010)).toBe(1)
  })
})
