import { describe, it, expect } from 'vitest'
import {
  normalizeBenchmarks,
  normalizeFeatureSets,
  parseBenchmarksJson,
  parseFeatureSetsJson,
} from '../normalizeInputs.js'
import { DEFAULT_FEATURE_SET } from '../types.js'

describe('normalizeBenchmarks', () => {
  it('should turn a string into name = bench', () => {
    expect(normalizeBenchmarks(['bench_a'])).toEqual([{ name: 'bench_a', bench: 'bench_a' }])
  })

  it('should fall back name → bench → "benchmark"', () => {
    expect(normalizeBenchmarks([{ bench: 'b1' }, { command: 'make bench' }, { name: 'n', bench: 'b2' }])).toEqual([
      { name: 'b1', bench: 'b1' },
      { name: 'benchmark', command: 'make bench' },
      { name: 'n', bench: 'b2' },
    ])
  })

  it('should treat null as an empty list', () => {
    expect(normalizeBenchmarks(null)).toEqual([])
  })

  it('should reject non-list input as a configuration error', () => {
    expect(() => normalizeBenchmarks({ bench: 'x' })).toThrow(/Malformed benchmarks/)
  })

  it('should reject entries of the wrong shape', () => {
    expect(() => normalizeBenchmarks([42])).toThrow(/Malformed benchmarks/)
  })
})

describe('normalizeFeatureSets', () => {
  it('should turn a string into name = features', () => {
    expect(normalizeFeatureSets(['simd'])).toEqual([{ name: 'simd', features: 'simd', no_default_features: false }])
  })

  it('should fall back name → features → "default"', () => {
    expect(normalizeFeatureSets([{ features: 'a,b' }, { no_default_features: true }])).toEqual([
      { name: 'a,b', features: 'a,b', no_default_features: false },
      { name: 'default', features: '', no_default_features: true },
    ])
  })

  it('should use the implicit default set for an empty or missing list', () => {
    expect(normalizeFeatureSets([])).toEqual([DEFAULT_FEATURE_SET])
    expect(normalizeFeatureSets(undefined)).toEqual([DEFAULT_FEATURE_SET])
  })
})

describe('JSON options', () => {
  it('should treat blank text as absent', () => {
    expect(parseBenchmarksJson('')).toBeUndefined()
    expect(parseFeatureSetsJson('  ')).toBeUndefined()
    expect(parseBenchmarksJson(undefined)).toBeUndefined()
  })

  it('should parse valid arrays', () => {
    expect(parseBenchmarksJson('["a", {"bench": "b"}]')).toEqual(['a', { bench: 'b' }])
    expect(parseFeatureSetsJson('[{"name": "min", "no_default_features": true}]')).toEqual([
      { name: 'min', no_default_features: true },
    ])
  })

  it('should reject invalid JSON', () => {
    expect(() => parseBenchmarksJson('[a')).toThrow(/Malformed benchmarks/)
  })

  it('should reject a JSON object', () => {
    expect(() => parseFeatureSetsJson('{"features": "x"}')).toThrow(/feature sets must be a JSON array/)
  })
})
