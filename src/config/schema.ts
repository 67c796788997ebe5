import { z } from 'zod'
import { benchmarkInputSchema, featureSetInputSchema } from '../matrix/normalizeInputs.js'

export const configSchema = z.object({
  /** 回归阈值（百分比），超过即判定为 regression */
  threshold: z.number().positive().default(3.0),
  /** summary 中保留的历史条数 */
  maxHistory: z.number().int().positive().default(20),
  /** cargo 工程所在的子目录（相对仓库根） */
  workingDirectory: z.string().default('.'),
  /** 未配置 benchmark 时是否扫描 benches/*.rs */
  autoDiscover: z.boolean().default(false),
  /** 追加到每条命令末尾的参数 */
  cargoArgs: z.string().default(''),
  benchmarks: z.array(benchmarkInputSchema).default([]),
  featureSets: z.array(featureSetInputSchema).default([]),
  /** 每个 Case 的构建目录根（相对仓库根） */
  targetRoot: z.string().min(1).default('.perfgate-target'),
  /** 传递构建目录的环境变量名 */
  targetDirEnv: z.string().min(1).default('CARGO_TARGET_DIR'),
  /** 通过 shell 执行命令（有注入风险，默认关闭） */
  shell: z.boolean().default(false),
  /** 并行 Case 数；大于 1 时每个 Case 使用独立 worktree */
  jobs: z.number().int().positive().default(1),
})

export type Config = z.infer<typeof configSchema>
