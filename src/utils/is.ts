/**
 * Type checking utilities, similar to lodash type guards
 */

/** Check if value is a thenable (a Promise or anything shaped like one) */
const isPromiseLike = (value: unknown): value is PromiseLike<unknown> =>
  value !== null &&
  (typeof value === 'object' || typeof value === 'function') &&
  'then' in value &&
  typeof value.then === 'function'

/** Check if value is not undefined */
const isNotUndefined = <T>(value: T | undefined): value is T =>
  value !== undefined

/**
 * Unified namespace for type checking
 *
 * @example
 * ```typescript
 * import { is } from './utils/is'
 *
 * if (is.promiseLike(result)) { ... }
 *
 * // Negated versions
 * if (is.not.undefined(previous)) { ... }
 * ```
 */
export const is = {
  promiseLike: isPromiseLike,
  not: {
    undefined: isNotUndefined,
  },
}
