/**
 * Listeners Registry
 *
 * Keyed storage for change listeners. Keys are anything usable as a Map key
 * and are compared with SameValueZero. Notification order follows the Map,
 * but callers must not rely on it.
 *
 * Uses factory pattern instead of classes for functional style.
 */

import type { DeepReadonly } from '../types/utils'
import type { DispatchWrapper, Listener } from './types'

export interface ListenersRegistry<T, K> {
  /** Insert or replace. Returns the listener previously stored under `key`. */
  insert(key: K, listener: Listener<T>): Listener<T> | undefined

  /** Returns the removed listener, or undefined if `key` was absent. */
  remove(key: K): Listener<T> | undefined

  /**
   * Invoke every listener once with `(oldValue, newValue)`.
   *
   * A throwing listener is not caught: the error propagates to the caller and
   * the listeners after it in this round are not invoked.
   */
  notifyAll(oldValue: DeepReadonly<T>, newValue: DeepReadonly<T>): void

  has(key: K): boolean

  get(key: K): Listener<T> | undefined

  keys(): K[]

  clear(): void

  readonly size: number
}

export interface ListenersRegistryOptions<K> {
  wrapDispatch?: DispatchWrapper<K>
}

/** Call a listener in either of its two forms. */
export const invokeListener = <T>(
  listener: Listener<T>,
  oldValue: DeepReadonly<T>,
  newValue: DeepReadonly<T>,
): void => {
  if (typeof listener === 'function') {
    listener(oldValue, newValue)
  } else {
    listener.onChanged(oldValue, newValue)
  }
}

/**
 * Creates a new listeners registry
 *
 * @example
 * ```typescript
 * const registry = createListenersRegistry<Settings, string>()
 *
 * registry.insert('theme', (oldValue, newValue) => {
 *   console.log('theme', oldValue.theme, '->', newValue.theme)
 * })
 *
 * registry.notifyAll(before, after)
 * registry.remove('theme')
 * ```
 */
export const createListenersRegistry = <T, K>(
  options: ListenersRegistryOptions<K> = {},
): ListenersRegistry<T, K> => {
  const { wrapDispatch } = options
  const listeners = new Map<K, Listener<T>>()

  return {
    insert(key: K, listener: Listener<T>): Listener<T> | undefined {
      const previous = listeners.get(key)
      listeners.set(key, listener)
      return previous
    },

    remove(key: K): Listener<T> | undefined {
      const previous = listeners.get(key)
      listeners.delete(key)
      return previous
    },

    notifyAll(oldValue: DeepReadonly<T>, newValue: DeepReadonly<T>): void {
      // Iterate a copy so the round covers exactly the listeners present when it began
      for (const [key, listener] of [...listeners]) {
        if (wrapDispatch) {
          wrapDispatch(key, () => invokeListener(listener, oldValue, newValue))
        } else {
          invokeListener(listener, oldValue, newValue)
        }
      }
    },

    has(key: K): boolean {
      return listeners.has(key)
    },

    get(key: K): Listener<T> | undefined {
      return listeners.get(key)
    },

    keys(): K[] {
      return [...listeners.keys()]
    },

    clear(): void {
      listeners.clear()
    },

    get size(): number {
      return listeners.size
    },
  }
}
