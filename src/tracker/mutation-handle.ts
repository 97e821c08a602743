/**
 * Mutation Handle
 *
 * Lifecycle: active -> released. The snapshot is taken before the tracker is
 * locked, so a failing clone leaves the tracker idle. Release unlocks the
 * tracker in a `finally`, so a throwing listener still leaves it usable; the
 * listener's error is what the caller sees.
 */

import type { MutationHandle, TrackerInternals } from './types'

export const createMutationHandle = <T, K>(
  inner: TrackerInternals<T, K>,
): MutationHandle<T> => {
  const snapshot = inner.clone(inner.value)
  inner.state = 'mutating'
  let released = false

  const assertActive = (operation: string): void => {
    if (released) {
      throw new Error(
        `[tracked-value] Cannot ${operation} "${inner.name}" through a released mutation handle`,
      )
    }
  }

  return {
    get value(): T {
      assertActive('access')
      return inner.value
    },

    set(next: T): void {
      assertActive('set')
      inner.value = next
    },

    update(fn: (current: T) => T): void {
      assertActive('update')
      inner.value = fn(inner.value)
    },

    get released(): boolean {
      return released
    },

    release(): void {
      if (released) {
        throw new Error(
          `[tracked-value] Mutation handle for "${inner.name}" was already released`,
        )
      }
      released = true

      try {
        const current = inner.value
        const changed = !inner.isEqual(snapshot, current)
        inner.logger.logMutation(inner.name, changed, snapshot, current)
        if (!changed) return

        try {
          inner.registry.notifyAll(snapshot, current)
        } finally {
          inner.timing.reportRound(inner.name)
        }
      } finally {
        inner.state = 'idle'
      }
    },
  }
}
