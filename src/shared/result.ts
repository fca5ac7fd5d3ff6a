/**
 * Result 类型 - 统一处理成功/失败结果
 * 出站请求不抛异常，调用方显式处理失败
 */

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E }

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value }
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error }
}
