/**
 * Result 类型 - 统一处理成功/失败结果
 * 避免 try-catch 污染业务代码，使错误处理显式化
 */

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E }

// 构造函数
export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value }
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error }
}

// 将 Promise 包装为 Result，reject 值保留原样供调用方分类
export async function fromPromise<T>(promise: Promise<T>): Promise<Result<T, unknown>> {
  try {
    return ok(await promise)
  } catch (e) {
    return err(e)
  }
}
