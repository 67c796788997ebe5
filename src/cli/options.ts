/**
 * 命令行参数解析与配置合并
 */

import { InvalidArgumentError } from 'commander'
import { resolve } from 'path'
import { loadConfig } from '../config/loadConfig.js'
import type { Config } from '../config/schema.js'
import { parseBenchmarksJson, parseFeatureSetsJson } from '../matrix/normalizeInputs.js'

export function parseNumberOption(value: string): number {
  const n = Number(value)
  if (value.trim() === '' || !Number.isFinite(n) || n < 0) {
    throw new InvalidArgumentError('Expected a non-negative number.')
  }
  return n
}

export function parsePositiveNumberOption(value: string): number {
  const n = parseNumberOption(value)
  if (n === 0) {
    throw new InvalidArgumentError('Expected a positive number.')
  }
  return n
}

export function parseIntegerOption(value: string): number {
  const n = parseNumberOption(value)
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Expected a positive integer.')
  }
  return n
}

/** 可以覆盖配置文件的命令行选项 */
export interface ConfigOverrides {
  benchmarksJson?: string
  featureSetsJson?: string
  autoDiscover?: boolean
  cargoArgs?: string
  workingDirectory?: string
  threshold?: number
  maxHistory?: number
  jobs?: number
  shell?: boolean
}

/**
 * 加载 <repoPath>/.perfgate.yaml 并叠加命令行选项（命令行优先）
 */
export async function resolveConfig(repoPath: string, overrides: ConfigOverrides): Promise<Config> {
  const config = await loadConfig({ cwd: resolve(repoPath) })
  return {
    ...config,
    benchmarks: parseBenchmarksJson(overrides.benchmarksJson) ?? config.benchmarks,
    featureSets: parseFeatureSetsJson(overrides.featureSetsJson) ?? config.featureSets,
    autoDiscover: overrides.autoDiscover ?? config.autoDiscover,
    cargoArgs: overrides.cargoArgs ?? config.cargoArgs,
    workingDirectory: overrides.workingDirectory ?? config.workingDirectory,
    threshold: overrides.threshold ?? config.threshold,
    maxHistory: overrides.maxHistory ?? config.maxHistory,
    jobs: overrides.jobs ?? config.jobs,
    shell: overrides.shell ?? config.shell,
  }
}
