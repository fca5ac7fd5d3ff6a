/**
 * CLI: chatpoll run: start the example bot and block until interrupted
 */

import type { Command } from 'commander'
import { error, info } from '../output.js'

export function registerRunCommand(program: Command) {
  program
    .command('run')
    .description('Run the example bot (Ctrl+C to stop)')
    .option('-c, --config <path>', 'config file (default: ~/.chatpoll.yaml + ./.chatpoll.yaml)')
    .option('-v, --verbose', 'debug logging')
    .action(async (options: { config?: string; verbose?: boolean }) => {
      const { loadConfig } = await import('../../config/index.js')
      const { setLogLevel } = await import('../../shared/logger.js')
      const { Bot } = await import('../../bot.js')
      const { registerExampleHandlers } = await import('../../example/exampleBot.js')

      const config = await loadConfig({ path: options.config })
      setLogLevel(options.verbose ? 'debug' : config.log.level)

      const bot = Bot.fromConfig(config)
      registerExampleHandlers(bot)
      info(`Endpoint: ${bot.baseUrl}`)

      const outcome = await bot.run()
      if (outcome === 'failed') {
        error('The server rejected the API key')
        process.exitCode = 1
      }
    })
}
