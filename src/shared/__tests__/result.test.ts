/**
 * Result 类型单元测试
 */

import { describe, it, expect } from 'vitest'
import { ok, err, type Result } from '../result.js'

describe('Result 构造函数', () => {
  it('ok 应创建成功结果', () => {
    expect(ok(42)).toEqual({ ok: true, value: 42 })
  })

  it('err 应创建失败结果', () => {
    const error = new Error('boom')
    expect(err(error)).toEqual({ ok: false, error })
  })

  it('应通过 ok 字段收窄类型', () => {
    const results: Array<Result<number, string>> = [ok(1), err('bad')]
    const values = results.map(result => (result.ok ? `value ${result.value}` : `error ${result.error}`))
    expect(values).toEqual(['value 1', 'error bad'])
  })
})
