import { percentDelta } from '../runner/computeDelta.js'
import type { DeltaStatus } from './types.js'

/** ±0.5% 以内视为噪声 */
export const NOISE_BAND_PCT = 0.5

/**
 * 按阈值对百分比差值分类
 *
 * 优先级：非有限 → unknown；> T → regression；< -0.5 → improved；> 0.5 → slight_regression；其余 neutral。
 * 两端边界 ±0.5 属于 neutral。
 */
export function classifyDelta(deltaPct: number, threshold: number): DeltaStatus {
  if (!Number.isFinite(deltaPct)) return 'unknown'
  if (deltaPct > threshold) return 'regression'
  if (deltaPct < -NOISE_BAND_PCT) return 'improved'
  if (deltaPct > NOISE_BAND_PCT) return 'slight_regression'
  return 'neutral'
}

/** 单个 metric 的百分比差值，与 Case 级差值使用同一零基规则 */
export function metricDeltaPct(base: number, head: number): number {
  return percentDelta(base, head)
}
