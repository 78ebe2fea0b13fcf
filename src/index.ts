/**
 * dispatch-ts: In-Process Events and Observable Properties
 * ========================================================
 *
 * A small publish/subscribe core for objects that announce changes:
 *
 * - Classes declare named events and equality-gated properties
 * - Listeners are held by non-owning references and never need unbinding
 * - List and dict properties report in-place mutation, at any depth
 * - Async listeners run on execution contexts; events can be awaited
 * - Completion tracking waits for the async work an emission started
 *
 * @version 1.0.0
 * @license MIT
 */

// =============================================================================
// EVENTS AND DISPATCHERS
// =============================================================================

export {
  Dispatcher,
  composeManifest,
  type BindOptions,
  type DispatcherClass,
  type DispatcherManifest,
  type EventMap,
  type EventName,
  type Listener,
  type Listeners,
  type PropertyHandle,
  type PropertyListener
} from './dispatcher'

export { Event, type Emission, type EmissionKeywords, type TaskSink } from './event'

export {
  STOP,
  halt,
  isAsyncFunction,
  method,
  type AnyListener,
  type MethodSubscriber,
  type Subscriber
} from './subscriber'

// =============================================================================
// PROPERTIES AND CONTAINERS
// =============================================================================

export {
  BoolProperty,
  DictProperty,
  FloatProperty,
  IntProperty,
  ListProperty,
  Property,
  StringProperty,
  type ContainerPropertyOptions,
  type NumericPropertyOptions,
  type PropertyChange,
  type PropertyDescription,
  type PropertyKind,
  type PropertyOptions,
  type TypedPropertyOptions
} from './properties'

export { batch, isObservable, type ObservableDict, type ObservableList } from './observable'

export { deepEqual, type EqualityFn } from './equality'

// =============================================================================
// ASYNC BRIDGE
// =============================================================================

export {
  TaskContext,
  createExecutionContext,
  runInExecutionContext,
  tryUseExecutionContext,
  useExecutionContext,
  type ExecutionContext,
  type ExecutionContextOptions
} from './context'

export { CompletionTracker } from './completion'

export { EmissionHoldLock } from './emission-lock'

// =============================================================================
// GLOBAL DISPATCHER AND INTROSPECTION
// =============================================================================

export * as globalDispatcher from './global'
export { receiver, resetGlobalDispatcher, type ReceiverOptions } from './global'

export { describeDispatcher, type DispatcherDescription } from './introspect'

// =============================================================================
// ERRORS
// =============================================================================

export {
  BindingContextError,
  DispatchError,
  DoesNotExistError,
  EventExistsError,
  ExistsError,
  InvalidTypeError,
  NoneNotAllowedError,
  OutOfRangeError,
  PropertyExistsError,
  ValidationError
} from './errors'
