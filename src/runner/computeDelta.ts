import type { RunOutcome } from './types.js'

export interface DeltaFigures {
  readonly base_total: number
  readonly head_total: number
  readonly delta: number
  /** NaN: 不可比较；+Infinity: base 为 0 而 head 不为 0 */
  readonly delta_pct: number
}

/**
 * 百分比变化
 *
 * base 为 0 时不做除法：head 也为 0 记 0，否则记 +Infinity（由分类器标为 unknown）。
 */
export function percentDelta(base: number, head: number): number {
  if (base === 0) {
    return head === 0 ? 0 : Number.POSITIVE_INFINITY
  }
  return ((head - base) / base) * 100
}

function totalOf(outcome: RunOutcome): number {
  return outcome.status === 'ok' ? outcome.total : 0
}

/**
 * 计算 head 相对 base 的差值
 *
 * 任一侧不是 ok 时 delta 为 0、delta_pct 为 NaN，下游求均值时会被排除。
 */
export function computeDelta(head: RunOutcome, base: RunOutcome): DeltaFigures {
  const base_total = totalOf(base)
  const head_total = totalOf(head)

  if (head.status !== 'ok' || base.status !== 'ok') {
    return { base_total, head_total, delta: 0, delta_pct: Number.NaN }
  }

  return {
    base_total,
    head_total,
    delta: head_total - base_total,
    delta_pct: percentDelta(base_total, head_total),
  }
}
