/**
 * Vitest 全局设置
 *
 * 开发者 shell 中的 CHATPOLL_* 变量不能影响测试：
 * 配置测试显式传入 env，其余测试依赖默认值。
 */

import { beforeEach } from 'vitest'
import { setLogLevel } from '../src/shared/logger.js'

const CHATPOLL_VARS = ['CHATPOLL_API_KEY', 'CHATPOLL_BASE_URL', 'CHATPOLL_LOG_LEVEL']

for (const name of CHATPOLL_VARS) {
  delete process.env[name]
}

beforeEach(() => {
  setLogLevel('silent')
})
