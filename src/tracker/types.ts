/**
 * Tracker Types
 */

import type { ListenersRegistry } from '../listeners/registry'
import type { Listener } from '../listeners/types'
import type { DeepReadonly } from '../types/utils'
import type { TrackerLogger } from '../utils/log'
import type { Timing } from '../utils/timing'

export type TrackerState = 'idle' | 'mutating'

/**
 * Scoped write access to a tracked value.
 *
 * Created by `beginMutation()`. Until `release()` is called the tracker is
 * locked: `read()`, `beginMutation()` and listener changes throw. Release
 * compares the value against the snapshot taken at creation and notifies the
 * listeners once if they differ, however many writes happened in between.
 */
export interface MutationHandle<T> {
  /** The live value. Mutate it in place, or replace it with `set` / `update`. */
  readonly value: T
  set(next: T): void
  update(fn: (current: T) => T): void
  /** Diff against the snapshot and notify. Throws if called twice. */
  release(): void
  readonly released: boolean
}

export interface DataTracker<T, K> {
  /**
   * The current value, as a read-only view of the live object. Changes go
   * through `beginMutation` / `mutate`. Throws while a mutation handle is active.
   */
  read(): DeepReadonly<T>

  /** Returns the listener previously stored under `key`, if any. */
  addListener(key: K, listener: Listener<T>): Listener<T> | undefined

  /** Returns the removed listener, or undefined if none was stored under `key`. */
  removeListener(key: K): Listener<T> | undefined

  hasListener(key: K): boolean

  readonly listenerCount: number

  /**
   * Take a snapshot and return a handle for writing the value.
   * The caller must call `release()` on it exactly once; prefer `mutate`,
   * which does that even when the edit throws.
   */
  beginMutation(): MutationHandle<T>

  /**
   * Run a synchronous edit inside a mutation handle, releasing it on the way
   * out whether `fn` returns or throws. Returns whatever `fn` returns.
   */
  mutate<R>(fn: (handle: MutationHandle<T>) => R): R

  readonly isMutating: boolean
}

/**
 * Mutable state shared between a tracker and the handle it hands out.
 *
 * @internal
 */
export interface TrackerInternals<T, K> {
  readonly name: string
  value: T
  state: TrackerState
  readonly registry: ListenersRegistry<T, K>
  readonly isEqual: (a: T, b: T) => boolean
  readonly clone: (value: T) => T
  readonly logger: TrackerLogger
  readonly timing: Timing
}
