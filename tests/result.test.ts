/**
 * Result 与错误工具测试
 */

import { describe, it, expect } from 'vitest'
import { err, fromPromise, ok } from '../src/shared/result.js'
import { getErrorMessage } from '../src/shared/assertError.js'
import { AppError } from '../src/shared/error.js'

describe('Result', () => {
  it('should build both variants', () => {
    expect(ok(1)).toEqual({ ok: true, value: 1 })
    expect(err('nope')).toEqual({ ok: false, error: 'nope' })
  })

  it('should wrap a resolved promise', async () => {
    expect(await fromPromise(Promise.resolve('done'))).toEqual({ ok: true, value: 'done' })
  })

  it('should keep the rejection value as is', async () => {
    const failure = AppError.noBenchmarks()
    const result = await fromPromise(Promise.reject(failure))
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error).toBe(failure)
  })
})

describe('getErrorMessage', () => {
  it('should read messages from any thrown value', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom')
    expect(getErrorMessage('plain')).toBe('plain')
    expect(getErrorMessage(42)).toBe('42')
  })
})
