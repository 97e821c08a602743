/**
 * Data Tracker
 *
 * Owns a single value and a keyed set of listeners. Reads go straight to the
 * value; writes go through a mutation handle which notifies the listeners
 * when it is released, if and only if the value differs from the snapshot
 * the handle took.
 */

import isEqual from 'lodash/isEqual'

import { resolveTrackerConfig } from '../core/config'
import type { TrackerOptions } from '../core/types'
import { createListenersRegistry } from '../listeners/registry'
import type { Listener } from '../listeners/types'
import type { DeepReadonly } from '../types/utils'
import { is } from '../utils/is'
import { createLogger, formatKey } from '../utils/log'
import { createTiming } from '../utils/timing'
import { createMutationHandle } from './mutation-handle'
import { snapshotValue } from './snapshot'
import type { DataTracker, MutationHandle, TrackerInternals } from './types'

const runScoped = <T, R>(
  handle: MutationHandle<T>,
  fn: (handle: MutationHandle<T>) => R,
): R => {
  try {
    return fn(handle)
  } finally {
    // fn may have released the handle itself
    if (!handle.released) handle.release()
  }
}

/**
 * Create a tracker that takes ownership of `value`.
 *
 * @example
 * ```typescript
 * interface Settings { theme: string; fontSize: number }
 *
 * const settings = createDataTracker<Settings, string>({ theme: 'dark', fontSize: 12 })
 *
 * settings.addListener('persist', (oldValue, newValue) => {
 *   console.log(`theme ${oldValue.theme} -> ${newValue.theme}`)
 * })
 *
 * settings.mutate((handle) => {
 *   handle.value.theme = 'light'
 * }) // logs "theme dark -> light"
 *
 * settings.mutate((handle) => {
 *   handle.value.theme = 'light'
 * }) // value unchanged, nothing logged
 * ```
 */
export const createDataTracker = <T, K = string>(
  value: T,
  options: TrackerOptions<T> = {},
): DataTracker<T, K> => {
  const config = resolveTrackerConfig(options)
  const { name, debug } = config

  const logger = createLogger(debug)
  const timing = createTiming({
    timing: debug.timing,
    timingThreshold: debug.timingThreshold,
    onSlowListener: options.onSlowListener,
    onSummary: options.onTimingSummary,
  })

  const inner: TrackerInternals<T, K> = {
    name,
    value,
    state: 'idle',
    registry: createListenersRegistry<T, K>({
      wrapDispatch: (key, run) => {
        logger.logDispatch(name, key)
        timing.run(run, { tracker: name, key: formatKey(key) })
      },
    }),
    isEqual: options.isEqual ?? isEqual,
    clone: options.clone ?? snapshotValue,
    logger,
    timing,
  }

  const assertIdle = (operation: string): void => {
    if (inner.state === 'mutating') {
      throw new Error(
        `[tracked-value] Cannot ${operation} "${name}" while a mutation handle is active`,
      )
    }
  }

  const beginMutation = (): MutationHandle<T> => {
    assertIdle('begin a mutation on')
    return createMutationHandle(inner)
  }

  return {
    read(): DeepReadonly<T> {
      assertIdle('read')
      return inner.value
    },

    addListener(key: K, listener: Listener<T>): Listener<T> | undefined {
      assertIdle('add a listener to')
      const previous = inner.registry.insert(key, listener)
      logger.logRegistration('add', name, key, is.not.undefined(previous))
      return previous
    },

    removeListener(key: K): Listener<T> | undefined {
      assertIdle('remove a listener from')
      const previous = inner.registry.remove(key)
      logger.logRegistration('remove', name, key, is.not.undefined(previous))
      return previous
    },

    hasListener(key: K): boolean {
      return inner.registry.has(key)
    },

    get listenerCount(): number {
      return inner.registry.size
    },

    beginMutation,

    mutate<R>(fn: (handle: MutationHandle<T>) => R): R {
      const result = runScoped(beginMutation(), fn)
      if (is.promiseLike(result)) {
        const error = new Error(
          `[tracked-value] mutate() on "${name}" received an async callback. The handle was released before it settled; edits must be synchronous`,
        )
        // A later rejection belongs to this misuse error, not to the process
        void result.then(undefined, (reason: unknown) => {
          error.cause = reason
        })
        throw error
      }
      return result
    },

    get isMutating(): boolean {
      return inner.state === 'mutating'
    },
  }
}
