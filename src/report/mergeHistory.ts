import type { HistoryEntry } from './types.js'

export const DEFAULT_MAX_HISTORY = 20

/**
 * 合并历史记录
 *
 * 新记录放在最前，按 commit 去重（保留第一次出现，即最新的一条），再截断到 maxHistory。
 */
export function mergeHistory(
  entry: HistoryEntry,
  history: readonly HistoryEntry[],
  maxHistory: number = DEFAULT_MAX_HISTORY
): HistoryEntry[] {
  const seen = new Set<string>()
  const merged: HistoryEntry[] = []

  for (const item of [entry, ...history]) {
    if (seen.has(item.commit)) continue
    seen.add(item.commit)
    merged.push(item)
  }

  return merged.slice(0, Math.max(0, maxHistory))
}
