/**
 * Tracker Logger
 *
 * Console output for mutation releases and listener bookkeeping:
 * 1. logMutation: once per released handle, changed or not
 * 2. logDispatch: once per listener call in a notification round
 * 3. logRegistration: once per addListener / removeListener
 *
 * Zero runtime cost when both flags are false (returns no-op logger).
 */

export interface TrackerLogger {
  logMutation: (
    tracker: string,
    changed: boolean,
    oldValue: unknown,
    newValue: unknown,
  ) => void
  logDispatch: (tracker: string, key: unknown) => void
  logRegistration: (
    type: 'add' | 'remove',
    tracker: string,
    key: unknown,
    /** Whether a listener was stored under the key before this call. */
    existed: boolean,
  ) => void
}

interface LoggerConfig {
  logMutations: boolean
  logListeners: boolean
}

const noop = () => {
  // no-op
}

const NOOP_LOGGER: TrackerLogger = {
  logMutation: noop,
  logDispatch: noop,
  logRegistration: noop,
}

const PREFIX = 'tracked-value'

/** Listener keys can be anything usable as a Map key. */
export const formatKey = (key: unknown): string =>
  typeof key === 'symbol' ? key.toString() : String(key)

const registrationNote = (type: 'add' | 'remove', existed: boolean): string => {
  if (type === 'add') return existed ? ' (replaced)' : ''
  return existed ? '' : ' (absent)'
}

/**
 * Create a logger for a tracker.
 * Returns a no-op logger when both flags are off.
 */
export const createLogger = (config: LoggerConfig): TrackerLogger => {
  const { logMutations, logListeners } = config
  if (!logMutations && !logListeners) return NOOP_LOGGER

  return {
    ...NOOP_LOGGER,

    ...(logMutations
      ? {
          logMutation: (
            tracker: string,
            changed: boolean,
            oldValue: unknown,
            newValue: unknown,
          ) => {
            if (!changed) {
              console.log(`${PREFIX}:mutation | ${tracker} unchanged`)
              return
            }
            console.groupCollapsed(`${PREFIX}:mutation | ${tracker} changed`)
            console.log({ oldValue, newValue })
            console.groupEnd()
          },
        }
      : {}),

    ...(logListeners
      ? {
          logDispatch: (tracker: string, key: unknown) => {
            console.log(
              `${PREFIX}:listener | ${tracker} dispatch key=${formatKey(key)}`,
            )
          },
          logRegistration: (
            type: 'add' | 'remove',
            tracker: string,
            key: unknown,
            existed: boolean,
          ) => {
            console.log(
              `${PREFIX}:registration | ${tracker} ${type} key=${formatKey(key)}${registrationNote(type, existed)}`,
            )
          },
        }
      : {}),
  }
}
