export { HandlerRegistry, isLifecycleEvent } from './handlerRegistry.js'
export {
  LIFECYCLE_EVENTS,
  type Awaitable,
  type MessageHandler,
  type ArgsHandler,
  type HandlerShape,
  type CommandEntry,
  type LifecycleEvent,
  type LifecycleHandler,
} from './types.js'
