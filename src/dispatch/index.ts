export { DispatchLoop, type DispatchLoopOptions, type LoopState, type LoopOutcome } from './dispatchLoop.js'
export {
  createRuntimeContext,
  abortableSleep,
  FORCED_EXIT_CODE,
  type RuntimeContext,
  type RuntimeContextOptions,
  type SleepFn,
} from './runtimeContext.js'
