/**
 * Example bot: one handler of every kind
 *
 *   /ping           reply with the author's name
 *   /echo <words>   repeat the args
 *   /file           upload the demo file and reply with it
 *   /magic          send, edit a countdown, delete
 *   /crash          throw, to exercise the error event
 *   anything else   greeting / reply-chain demo
 */

import { setTimeout as delay } from 'timers/promises'
import { basename } from 'path'
import type { Bot } from '../bot.js'
import { createLogger } from '../shared/logger.js'

const logger = createLogger('example')

export interface ExampleOptions {
  /** Pause between /magic edits */
  stepDelayMs?: number
  /** The only file /file ever uploads; chat input never picks the path */
  demoFile?: string
}

export const DEFAULT_DEMO_FILE = 'test_file.jpeg'

export function registerExampleHandlers(bot: Bot, options: ExampleOptions = {}): void {
  const stepDelayMs = options.stepDelayMs ?? 1000
  const demoFile = options.demoFile ?? DEFAULT_DEMO_FILE

  bot.event('startup', () => {
    logger.info(`Example bot ready: ${bot.registry.commandTriggers().join(', ')}`)
  })

  bot.event('shutdown', () => {
    logger.info('Example bot stopped, bye')
  })

  bot.event('error', async (error, message) => {
    logger.warn(`Handler error: ${error?.message ?? 'unknown'}`)
    if (message) {
      await message.reply(`⚠️ Something went wrong: ${error?.message ?? 'unknown error'}`)
    }
  })

  bot.command('/ping', async msg => {
    const name = msg.author.displayName ?? 'stranger'
    await msg.reply(`Pong, ${name}! 🏓\nMessage id: ${msg.id ?? '?'}`)
  })

  bot.commandWithArgs('/echo', async (msg, args) => {
    if (args.length === 0) {
      await msg.reply('Say something after the command, e.g. /echo hello')
      return
    }
    await msg.reply(`📢 You said: ${args.join(' ')}`)
  })

  bot.command('/file', async msg => {
    const sent = await msg.replyWithFile(demoFile, 'Here is your file')
    if (!sent) await msg.reply(`Could not upload ${basename(demoFile)}`)
  })

  bot.command('/magic', async msg => {
    const sent = await msg.reply('⏳ Counting to 3...')
    if (!sent) return
    for (const step of ['⏳ 2...', '⏳ 1...', '💥 Poof!']) {
      await delay(stepDelayMs)
      await sent.edit(step)
    }
    await delay(stepDelayMs)
    if (await sent.delete()) logger.debug('Magic message deleted')
  })

  bot.command('/crash', () => {
    throw new Error('crash requested')
  })

  bot.onMessage(async msg => {
    const text = msg.text.toLowerCase()
    if (text.includes('hello')) {
      await msg.reply('Hi there! 👋')
    } else if (text.includes('info')) {
      const target = msg.replyTarget?.author.displayName
      await msg.reply(target ? `You replied to ${target}` : 'This message is not a reply')
    } else {
      logger.debug(`Unhandled message: ${msg.text}`)
    }
  })
}
