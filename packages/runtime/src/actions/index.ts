// Action dispatch

export {
  ActionRegistry,
  createActionRegistry,
  type Guard,
  type SyncBody,
  type AsyncBody,
  type ReplyBody,
  type BeforeHook,
  type AfterHook,
  type HandlerOptions,
  type RegisteredHandler,
} from './registry.js';
export { Dispatcher, createDispatcher, type DispatcherOptions } from './dispatcher.js';
export { captureValue } from './capture.js';
export { jaroSimilarity, suggestName, SUGGESTION_THRESHOLD } from './similarity.js';
