/**
 * 命令行字符串 <-> 参数向量
 *
 * matrix JSON 里命令以字符串传递，runner 执行前再拆回 argv，不经过 shell。
 * 引号规则与 POSIX sh 一致：单引号原样、双引号内反斜杠只转义 \ " $ `、引号外反斜杠转义下一个字符。
 */

import { AppError } from '../shared/error.js'

const SAFE_ARG = /^[\w@%+=:,./-]+$/

/**
 * 为单个参数加引号，使 splitCommandLine 能还原出同一个参数
 */
export function quoteArg(value: string): string {
  if (value === '') return "''"
  if (SAFE_ARG.test(value)) return value
  return `'${value.replace(/'/g, `'"'"'`)}'`
}

/**
 * 将参数向量拼接为命令字符串
 */
export function joinCommandLine(argv: readonly string[]): string {
  return argv.map(quoteArg).join(' ')
}

/**
 * 折叠空白为单个空格，保证相同输入得到逐字节相同的命令
 */
export function collapseWhitespace(command: string): string {
  return command.split(/\s+/).filter(Boolean).join(' ')
}

const DOUBLE_QUOTE_ESCAPABLE = new Set(['\\', '"', '$', '`', '\n'])

/**
 * 将命令字符串拆分为参数向量
 *
 * @throws AppError 引号未闭合或以孤立反斜杠结尾
 */
export function splitCommandLine(command: string): string[] {
  const tokens: string[] = []
  let current = ''
  // 区分 "没有 token" 与 "空 token"（例如 ''）
  let inToken = false
  let quote: "'" | '"' | null = null

  for (let i = 0; i < command.length; i++) {
    const ch = command.charAt(i)

    if (quote === "'") {
      if (ch === "'") quote = null
      else current += ch
      continue
    }

    if (quote === '"') {
      if (ch === '"') {
        quote = null
      } else if (ch === '\\' && i + 1 < command.length && DOUBLE_QUOTE_ESCAPABLE.has(command.charAt(i + 1))) {
        current += command.charAt(i + 1)
        i++
      } else {
        current += ch
      }
      continue
    }

    if (/\s/.test(ch)) {
      if (inToken) {
        tokens.push(current)
        current = ''
        inToken = false
      }
      continue
    }

    inToken = true
    if (ch === "'" || ch === '"') {
      quote = ch
    } else if (ch === '\\') {
      if (i + 1 >= command.length) {
        throw AppError.malformedInput('command', 'trailing backslash')
      }
      current += command.charAt(i + 1)
      i++
    } else {
      current += ch
    }
  }

  if (quote) {
    throw AppError.malformedInput('command', `unterminated ${quote} quote`)
  }
  if (inToken) tokens.push(current)
  return tokens
}
