/**
 * Default `clone` hook: the copy a mutation handle diffs against on release.
 *
 * The copy is exact (@jsbits/deep-clone in exact mode), so accessors,
 * property attributes and prototypes survive and `isEqual` compares like with
 * like. A shared subtree is copied once per place it appears. A value that
 * contains itself has no finite copy and is rejected before anything is
 * copied, which leaves the tracker idle.
 */

import exactClone from '@jsbits/deep-clone'

/** Returns the key path to the first back-reference, or undefined for a tree. */
const findCycle = (
  node: object,
  path: string[],
  ancestors: Set<object>,
): string[] | undefined => {
  if (ancestors.has(node)) return path
  ancestors.add(node)

  for (const [key, descriptor] of Object.entries(
    Object.getOwnPropertyDescriptors(node),
  )) {
    // accessors are copied as accessors, never called
    const child: unknown = descriptor.value
    if (typeof child !== 'object' || child === null) continue
    const cycle = findCycle(child, [...path, key], ancestors)
    if (cycle) return cycle
  }

  ancestors.delete(node)
  return undefined
}

/**
 * @example
 * ```typescript
 * const before = snapshotValue(cart)
 * cart.items.push(item)
 * isEqual(before, cart) // false
 * ```
 */
export const snapshotValue = <T>(value: T): T => {
  if (typeof value === 'object' && value !== null) {
    const cycle = findCycle(value, [], new Set())
    if (cycle) {
      throw new Error(
        `[tracked-value] Cannot snapshot a value that refers back to itself at "${cycle.join('.')}"`,
      )
    }
  }
  return exactClone(value, true) as T
}
