import { describe, it, expect, vi } from 'vitest'
import { HandlerRegistry, isLifecycleEvent } from '../handlerRegistry.js'

describe('HandlerRegistry', () => {
  it('should store commands with their declared shape', () => {
    const registry = new HandlerRegistry()
    const handler = vi.fn()
    registry.registerCommand('/echo', { shape: 'message-and-args', handler })

    const entry = registry.findCommand('/echo')
    expect(entry?.shape).toBe('message-and-args')
    expect(entry?.handler).toBe(handler)
    expect(registry.findCommand('/missing')).toBeUndefined()
  })

  it('should overwrite a re-registered trigger', () => {
    const registry = new HandlerRegistry()
    const first = vi.fn()
    const second = vi.fn()
    registry.registerCommand('/start', { shape: 'message-only', handler: first })
    registry.registerCommand('/start', { shape: 'message-and-args', handler: second })

    expect(registry.findCommand('/start')).toEqual({ shape: 'message-and-args', handler: second })
    expect(registry.commandTriggers()).toEqual(['/start'])
  })

  it('should still register triggers that cannot match', () => {
    const registry = new HandlerRegistry()
    registry.registerCommand('/Start', { shape: 'message-only', handler: vi.fn() })
    expect(registry.commandTriggers()).toEqual(['/Start'])
  })

  it('should keep catch-alls in registration order', () => {
    const registry = new HandlerRegistry()
    const a = vi.fn()
    const b = vi.fn()
    registry.registerCatchAll(a)
    registry.registerCatchAll(b)
    expect(registry.catchAllHandlers()).toEqual([a, b])
  })

  it('should fill known lifecycle slots, one handler each', () => {
    const registry = new HandlerRegistry()
    const first = vi.fn()
    const second = vi.fn()

    expect(registry.registerEvent('startup', first)).toBe(true)
    expect(registry.registerEvent('startup', second)).toBe(true)

    expect(registry.eventHandler('startup')).toBe(second)
    expect(registry.eventHandler('shutdown')).toBeUndefined()
  })

  it('should reject unknown event names without touching existing slots', () => {
    const registry = new HandlerRegistry()
    const onError = vi.fn()
    registry.registerEvent('error', onError)

    expect(() => registry.registerEvent('reboot', vi.fn())).not.toThrow()
    expect(registry.registerEvent('Error', vi.fn())).toBe(false)

    expect(registry.eventHandler('error')).toBe(onError)
    expect(registry.eventHandler('startup')).toBeUndefined()
    expect(registry.eventHandler('shutdown')).toBeUndefined()
    expect(registry.eventHandler('connection_error')).toBeUndefined()
  })
})

describe('isLifecycleEvent', () => {
  it('should accept exactly the four lifecycle events', () => {
    expect(['startup', 'shutdown', 'connection_error', 'error'].every(isLifecycleEvent)).toBe(true)
    expect(isLifecycleEvent('connection-error')).toBe(false)
    expect(isLifecycleEvent('')).toBe(false)
  })
})
