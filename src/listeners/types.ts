/**
 * Listener types for change notifications
 *
 * A listener receives the value as it was when the mutation handle was
 * created and the value as it is when the handle is released. Both arrive
 * as `DeepReadonly` views, so every listener in a round sees the same pair.
 */

import type { DeepReadonly } from '../types/utils'

/**
 * Object form of a listener, for callers that keep state alongside the callback.
 *
 * @example
 * ```typescript
 * const audit: OnChanged<Settings> = {
 *   entries: [] as string[],
 *   onChanged(oldValue, newValue) {
 *     this.entries.push(`${oldValue.theme} -> ${newValue.theme}`)
 *   },
 * }
 * ```
 */
export interface OnChanged<T> {
  onChanged(oldValue: DeepReadonly<T>, newValue: DeepReadonly<T>): void
}

export type OnChangedFunction<T> = (
  oldValue: DeepReadonly<T>,
  newValue: DeepReadonly<T>,
) => void

export type Listener<T> = OnChanged<T> | OnChangedFunction<T>

/**
 * Wraps each listener call in a notification round.
 * `run` must be called exactly once, and whatever it throws must propagate.
 */
export type DispatchWrapper<K> = (key: K, run: () => void) => void
