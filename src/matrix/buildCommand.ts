/**
 * 命令合成
 */

import { AppError } from '../shared/error.js'
import { collapseWhitespace, joinCommandLine, quoteArg } from './commandLine.js'
import type { BenchmarkSpec, FeatureSet } from './types.js'

export const FEATURES_PLACEHOLDER = '{features}'
export const NO_DEFAULT_FEATURES_PLACEHOLDER = '{no_default_features_flag}'
export const NO_DEFAULT_FEATURES_FLAG = '--no-default-features'

/**
 * 展开命令模板
 *
 * 占位符做字面替换；只有原模板里缺少对应占位符时才追加 --features / --no-default-features，
 * 避免同一个参数出现两次。
 */
function expandTemplate(template: string, features: string, noDefault: boolean): string {
  let command = template
    .replaceAll(FEATURES_PLACEHOLDER, features)
    .replaceAll(NO_DEFAULT_FEATURES_PLACEHOLDER, noDefault ? NO_DEFAULT_FEATURES_FLAG : '')

  if (!template.includes(FEATURES_PLACEHOLDER) && features) {
    command += ` --features ${quoteArg(features)}`
  }
  if (!template.includes(NO_DEFAULT_FEATURES_PLACEHOLDER) && noDefault) {
    command += ` ${NO_DEFAULT_FEATURES_FLAG}`
  }
  return command
}

/**
 * 由结构化字段合成默认的 cargo bench 调用
 *
 * 参数顺序固定：--bench、--manifest-path、--package、--features、--no-default-features、args
 */
function synthesizeCommand(spec: BenchmarkSpec, features: string, noDefault: boolean): string {
  if (!spec.bench) {
    throw AppError.configInvalid(`benchmark spec '${spec.name}' is missing 'bench'`)
  }

  const argv = ['cargo', 'bench', '--bench', spec.bench]
  if (spec.manifest_path) argv.push('--manifest-path', spec.manifest_path)
  if (spec.package) argv.push('--package', spec.package)
  if (features) argv.push('--features', features)
  if (noDefault) argv.push(NO_DEFAULT_FEATURES_FLAG)
  const command = joinCommandLine(argv)
  // args 是自由格式的参数串，原样追加
  return spec.args ? `${command} ${spec.args}` : command
}

/**
 * 为 (benchmark, feature-set) 生成完全展开的命令
 *
 * @param extraArgs - 全局附加参数，非空时总是追加在最后
 * @throws AppError 没有模板且缺少 bench 字段
 */
export function buildCommand(spec: BenchmarkSpec, featureSet: FeatureSet, extraArgs = ''): string {
  const features = featureSet.features.trim()
  const noDefault = featureSet.no_default_features

  let command = spec.command
    ? expandTemplate(spec.command, features, noDefault)
    : synthesizeCommand(spec, features, noDefault)

  const suffix = extraArgs.trim()
  if (suffix) {
    command = `${command} ${suffix}`
  }
  return collapseWhitespace(command)
}
