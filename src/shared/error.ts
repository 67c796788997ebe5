/**
 * 统一错误处理系统
 * 支持错误分类、上下文信息和修复建议
 */

import chalk from 'chalk'
import { getErrorMessage } from './assertError.js'

// ============ 错误分类定义 ============

export type ErrorCategory =
  | 'CONFIG' // 配置错误，执行前即终止
  | 'GIT' // checkout 失败
  | 'VALIDATION' // 输入 JSON 不合法
  | 'UNKNOWN'

export type ErrorCode =
  | 'CONFIG_INVALID'
  | 'NO_BENCHMARKS'
  | 'CHECKOUT_FAILED'
  | 'UNKNOWN'

// ============ 统一错误类 ============

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly category: ErrorCategory = 'UNKNOWN',
    public override readonly cause?: unknown,
    public readonly suggestion?: string
  ) {
    super(message)
    this.name = 'AppError'
  }

  /**
   * 格式化错误输出到终端
   */
  format(): string {
    const lines: string[] = []
    const colorFn = categoryColors[this.category]

    lines.push('')
    lines.push(chalk.red('✗') + ' ' + chalk.bold('Error') + ` [${colorFn(categoryLabels[this.category])}]`)
    lines.push('')
    lines.push(chalk.dim(`  code: ${this.code}`))
    lines.push(`  ${this.message}`)

    if (this.suggestion) {
      lines.push('')
      lines.push(chalk.cyan('  Suggested fix:'))
      lines.push(chalk.dim('    →') + ` ${this.suggestion}`)
    }

    lines.push('')
    return lines.join('\n')
  }

  // ============ 工厂方法 ============

  static configInvalid(reason: string, cause?: unknown): AppError {
    return new AppError(
      'CONFIG_INVALID',
      `Invalid configuration: ${reason}`,
      'CONFIG',
      cause,
      'Check .perfgate.yaml and the JSON passed on the command line'
    )
  }

  static noBenchmarks(): AppError {
    return new AppError(
      'NO_BENCHMARKS',
      'No benchmarks configured. Provide benchmarks or enable auto-discovery with benches/*.rs',
      'CONFIG',
      undefined,
      'Pass --benchmarks-json \'["my_bench"]\' or --auto-discover'
    )
  }

  static malformedInput(what: string, reason: string): AppError {
    return new AppError('CONFIG_INVALID', `Malformed ${what}: ${reason}`, 'VALIDATION')
  }

  static checkoutFailed(ref: string, cause: unknown): AppError {
    return new AppError(
      'CHECKOUT_FAILED',
      `git checkout ${ref} failed: ${getErrorMessage(cause)}`,
      'GIT',
      cause,
      'Make sure both revisions are fetched (fetch-depth: 0)'
    )
  }

  static unknown(cause: unknown): AppError {
    return new AppError('UNKNOWN', getErrorMessage(cause), 'UNKNOWN', cause)
  }

  static from(error: unknown): AppError {
    return error instanceof AppError ? error : AppError.unknown(error)
  }
}

// ============ 格式化输出 ============

const categoryLabels: Record<ErrorCategory, string> = {
  CONFIG: 'config',
  GIT: 'git',
  VALIDATION: 'validation',
  UNKNOWN: 'unknown',
}

const categoryColors: Record<ErrorCategory, (text: string) => string> = {
  CONFIG: chalk.yellow,
  GIT: chalk.magenta,
  VALIDATION: chalk.yellow,
  UNKNOWN: chalk.gray,
}

/**
 * 打印错误到终端
 */
export function printError(error: unknown): void {
  console.error(AppError.from(error).format())
}
