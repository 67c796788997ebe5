/**
 * CLI 用户输出
 *
 * 面向终端用户的结果反馈，不带时间戳与 scope；诊断日志走 shared/logger.ts。
 */

import chalk from 'chalk'

type Tone = 'success' | 'error' | 'warn' | 'info'

const MARKS: Record<Tone, string> = {
  success: chalk.green('✓'),
  error: chalk.red('✗'),
  warn: chalk.yellow('!'),
  info: chalk.blue('ℹ'),
}

// 错误与警告走 stderr，matrix 命令的 stdout 只留 JSON
function emit(tone: Tone, message: string): void {
  const line = `${MARKS[tone]} ${message}`
  if (tone === 'error' || tone === 'warn') console.error(line)
  else console.log(line)
}

export const success = (message: string): void => emit('success', message)
export const error = (message: string): void => emit('error', message)
export const warn = (message: string): void => emit('warn', message)
export const info = (message: string): void => emit('info', message)

/** 段落标题，下划线与标题等宽（最长 40） */
export function header(title: string): void {
  console.log(`\n${chalk.bold(title)}\n${chalk.dim('─'.repeat(Math.min(title.length, 40)))}`)
}

export interface ListItem {
  label: string
  value: string | number | undefined
  /** 路径之类的次要信息用暗色 */
  dim?: boolean
}

/** 对齐的键值列表，缺失值显示为 - */
export function list(items: readonly ListItem[], indent = 2): void {
  const width = items.reduce((max, item) => Math.max(max, item.label.length), 0)
  for (const { label, value, dim } of items) {
    const text = value === undefined ? '-' : String(value)
    console.log(`${' '.repeat(indent)}${chalk.gray(`${label.padEnd(width)}:`)} ${dim ? chalk.dim(text) : text}`)
  }
}
