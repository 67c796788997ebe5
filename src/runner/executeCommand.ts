/**
 * 外部命令执行
 *
 * 默认以参数向量执行（不经过 shell）；shell 模式需要显式开启。
 */

import { execa } from 'execa'

export interface CommandRequest {
  /** 原始命令字符串（shell 模式与日志使用） */
  readonly command: string
  /** 拆分后的参数向量，argv[0] 为可执行文件 */
  readonly argv: readonly string[]
  readonly cwd: string
  /** 附加到当前进程环境之上的变量 */
  readonly env: Readonly<Record<string, string>>
  readonly shell: boolean
}

export interface CommandResult {
  /** 进程未能启动或被信号终止时为 null */
  readonly exitCode: number | null
  /** stdout 与 stderr 交错合并的输出 */
  readonly output: string
}

export type CommandExecutor = (request: CommandRequest) => Promise<CommandResult>

/**
 * 基于 execa 的默认执行器
 *
 * reject: false，非零退出与启动失败都作为结果返回，不抛出。
 */
export const execaExecutor: CommandExecutor = async request => {
  const { command, argv, cwd, env, shell } = request
  const options = { cwd, env: { ...env }, all: true, stdin: 'ignore', reject: false } as const

  const result = shell
    ? await execa(command, { ...options, shell: true })
    : await execa(argv[0] ?? '', argv.slice(1), options)

  const output = result.all ?? ''
  if (!result.failed) {
    return { exitCode: result.exitCode ?? 0, output }
  }
  return {
    exitCode: result.exitCode ?? null,
    // 进程没有启动时没有任何输出，只能给出 execa 的错误描述
    output: output.length > 0 ? output : (result.shortMessage ?? ''),
  }
}
