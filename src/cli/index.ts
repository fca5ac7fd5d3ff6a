#!/usr/bin/env node
/**
 * @entry chatpoll CLI
 *
 *   chatpoll run       - run the example bot (blocks until Ctrl+C)
 *   chatpoll config    - show the effective configuration
 */

import { Command } from 'commander'
import { registerRunCommand } from './commands/run.js'
import { registerConfigCommand } from './commands/config.js'
import { printError } from '../shared/error.js'

const program = new Command()

program
  .name('chatpoll')
  .description('Long-polling chat bot client')
  .version('0.1.0')

registerRunCommand(program)
registerConfigCommand(program)

program.parseAsync().catch((e: unknown) => {
  printError(e)
  process.exitCode = 1
})
