/**
 * Handler registry
 *
 * trigger → command handler, ordered catch-all list, one slot per lifecycle event.
 * Only the dispatch loop reads it.
 */

import { createLogger } from '../shared/logger.js'
import {
  LIFECYCLE_EVENTS,
  type CommandEntry,
  type LifecycleEvent,
  type LifecycleHandler,
  type MessageHandler,
} from './types.js'

const logger = createLogger('registry')

export function isLifecycleEvent(name: string): name is LifecycleEvent {
  return LIFECYCLE_EVENTS.some(event => event === name)
}

export class HandlerRegistry {
  private readonly commands = new Map<string, CommandEntry>()
  private readonly catchAll: MessageHandler[] = []
  private readonly events = new Map<LifecycleEvent, LifecycleHandler>()

  /** Re-registering a trigger replaces the previous entry */
  registerCommand(trigger: string, entry: CommandEntry): void {
    // message.command 总是小写且不含空白
    if (trigger !== trigger.toLowerCase() || /\s/.test(trigger)) {
      logger.warn(`Command '${trigger}' can never match: commands are lowercased single tokens`)
    }
    if (this.commands.has(trigger)) {
      logger.debug(`Command '${trigger}' handler replaced`)
    }
    this.commands.set(trigger, entry)
  }

  registerCatchAll(handler: MessageHandler): void {
    this.catchAll.push(handler)
  }

  /**
   * Fill a lifecycle slot. Unknown names are ignored with a warning.
   * @returns whether the slot was set
   */
  registerEvent(name: LifecycleEvent | (string & {}), handler: LifecycleHandler): boolean {
    if (!isLifecycleEvent(name)) {
      logger.warn(`Unknown event type: ${name} (expected one of ${LIFECYCLE_EVENTS.join(', ')})`)
      return false
    }
    this.events.set(name, handler)
    return true
  }

  findCommand(command: string): CommandEntry | undefined {
    return this.commands.get(command)
  }

  catchAllHandlers(): readonly MessageHandler[] {
    return this.catchAll
  }

  eventHandler(name: LifecycleEvent): LifecycleHandler | undefined {
    return this.events.get(name)
  }

  commandTriggers(): string[] {
    return [...this.commands.keys()]
  }
}
