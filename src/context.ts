/**
 * Execution Contexts (with unctx)
 * ===============================
 *
 * Async listeners never run inside `emit`. They are handed to an execution
 * context, a small task scheduler, and run later on it. A listener's context
 * is either given explicitly when binding or taken from the ambient context,
 * which is tracked through a namespaced `unctx` context:
 *
 * - `runInExecutionContext(ctx, fn)` makes `ctx` ambient while `fn` runs.
 * - Tasks started by a context see that context as ambient, so listeners
 *   bound from inside an async listener land on the same context.
 *
 * --- ASYNC USAGE ---
 * As with all `unctx` contexts, the ambient value is only visible
 * synchronously. Bind before the first `await`, or pass the context
 * explicitly.
 *
 * @dependency unctx
 */

import { getContext } from 'unctx'

import { BindingContextError } from './errors'

// --- TYPE DEFINITIONS ---

/**
 * A task scheduler that async listeners are bound to.
 */
export interface ExecutionContext {
  readonly name: string
  /**
   * Runs `task` later, never inline. The returned promise settles with the
   * task; callers that drop it must not see unhandled rejections.
   */
  schedule<T>(task: () => T | PromiseLike<T>): Promise<T>
}

/** Options for {@link createExecutionContext}. */
export interface ExecutionContextOptions {
  /** Used in log messages. Defaults to `"default"`. */
  name?: string
  /**
   * Receives errors thrown by scheduled tasks. Defaults to logging through
   * `console.error`.
   */
  onError?: (error: unknown, context: TaskContext) => void
}

// --- UNCTX SETUP ---

const executionContext = getContext<ExecutionContext>('dispatch-ts-execution-context')

// --- CORE API ---

/**
 * The built-in execution context. Each scheduled task starts on its own
 * macrotask; tasks interleave at their `await` points.
 */
export class TaskContext implements ExecutionContext {
  readonly name: string
  private readonly onError: (error: unknown, context: TaskContext) => void
  private readonly inFlight = new Set<Promise<unknown>>()

  constructor(options: ExecutionContextOptions = {}) {
    this.name = options.name ?? 'default'
    this.onError = options.onError ?? ((error, context) => {
      console.error(`[dispatch-ts] Error in task scheduled on execution context "${context.name}":`, error)
    })
  }

  /** Number of tasks scheduled and not yet settled. */
  get pending(): number {
    return this.inFlight.size
  }

  schedule<T>(task: () => T | PromiseLike<T>): Promise<T> {
    const run = new Promise<T>((resolve, reject) => {
      setTimeout(() => {
        try {
          resolve(executionContext.call(this, task))
        } catch (error) {
          reject(error)
        }
      }, 0)
    })

    this.inFlight.add(run)
    void run.then(
      () => {
        this.inFlight.delete(run)
      },
      (error: unknown) => {
        this.inFlight.delete(run)
        this.onError(error, this)
      }
    )

    return run
  }

  /**
   * Resolves once no task is in flight, including tasks scheduled while
   * waiting.
   */
  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight])
    }
  }
}

/**
 * Creates a standalone execution context.
 *
 * @example
 * ```ts
 * const ui = createExecutionContext({ name: 'ui' })
 * sender.bindAsync(ui, { value: async (_, value) => render(value) })
 * ```
 */
export function createExecutionContext(options: ExecutionContextOptions = {}): TaskContext {
  return new TaskContext(options)
}

/**
 * Runs `fn` with `context` as the ambient execution context.
 */
export function runInExecutionContext<R>(context: ExecutionContext, fn: () => R): R {
  const current = executionContext.tryUse()
  if (current && current !== context) {
    throw new BindingContextError(
      `Execution context "${context.name}" cannot be entered while "${current.name}" is active`
    )
  }
  // Re-entering must not clear the outer scope on the way out
  if (current === context) return fn()
  return executionContext.call(context, fn)
}

/**
 * The ambient execution context. Throws a {@link BindingContextError} when
 * called outside of one.
 */
export function useExecutionContext(): ExecutionContext {
  const context = executionContext.tryUse()
  if (!context) {
    throw new BindingContextError('No execution context is active')
  }
  return context
}

/**
 * The ambient execution context, or `null` outside of one.
 */
export function tryUseExecutionContext(): ExecutionContext | null {
  return executionContext.tryUse() ?? null
}

/**
 * Picks the context an async listener will run on: the explicit one when
 * given, otherwise the single ambient one.
 */
export function resolveExecutionContext(
  explicit: ExecutionContext | undefined,
  eventName: string
): ExecutionContext {
  if (explicit) return explicit
  const ambient = tryUseExecutionContext()
  if (!ambient) {
    throw new BindingContextError(
      `Async function given without execution context for "${eventName}"`
    )
  }
  return ambient
}
