/**
 * CLI: chatpoll config: print the effective configuration
 */

import type { Command } from 'commander'
import type { ResolvedConfig } from '../../config/schema.js'
import { keyValue, maskSecret, success } from '../output.js'

export function describeConfig(config: ResolvedConfig): Array<[string, string]> {
  const { polling } = config
  return [
    ['apiKey', maskSecret(config.apiKey)],
    ['baseUrl', config.baseUrl],
    ['uploadUrl', config.uploadUrl ?? '(derived from baseUrl)'],
    ['log.level', config.log.level],
    ['polling.syncTimeoutSeconds', String(polling.syncTimeoutSeconds)],
    ['polling.pollTimeoutSeconds', String(polling.pollTimeoutSeconds)],
    ['polling.connectionBackoffMs', String(polling.connectionBackoffMs)],
    ['polling.serverErrorBackoffMs', String(polling.serverErrorBackoffMs)],
    ['polling.loopErrorBackoffMs', String(polling.loopErrorBackoffMs)],
  ]
}

export function registerConfigCommand(program: Command) {
  program
    .command('config')
    .description('Show the effective configuration')
    .option('-c, --config <path>', 'config file (default: ~/.chatpoll.yaml + ./.chatpoll.yaml)')
    .action(async (options: { config?: string }) => {
      const { loadConfig } = await import('../../config/index.js')
      const config = await loadConfig({ path: options.config })
      success('Effective configuration:')
      keyValue(describeConfig(config))
    })
}
