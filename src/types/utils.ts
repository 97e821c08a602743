/** Recursively makes all properties required, stripping undefined */
export type DeepRequired<T> = {
  [K in keyof T]-?: NonNullable<T[K]> extends object
    ? DeepRequired<NonNullable<T[K]>>
    : NonNullable<T[K]>
}

/**
 * Read-only view of a tracked value, all the way down.
 *
 * Kept a plain mapped type (no conditional) so a generic `T` is assignable to
 * it. Primitives map to themselves, arrays and tuples to their readonly forms.
 * Functions nested in the value lose their call signatures.
 */
export type DeepReadonly<T> = {
  readonly [K in keyof T]: DeepReadonly<T[K]>
}
