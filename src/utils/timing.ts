/**
 * Listener Timing
 *
 * Measures each listener call during a notification round so slow listeners
 * show up during development.
 */

interface TimingMeta {
  tracker: string
  key: string
}

export interface SlowListenerEvent extends TimingMeta {
  duration: number
  threshold: number
}

export interface TimingSummary {
  tracker: string
  totalDuration: number
  listenerCount: number
  slowListeners: SlowListenerEvent[]
}

export type OnSlowListener = (event: SlowListenerEvent) => void
export type OnTimingSummary = (summary: TimingSummary) => void

const defaultOnSlowListener: OnSlowListener = (event) => {
  console.warn(
    `[tracked-value] Slow listener: ${event.tracker}/${event.key} took ${event.duration.toFixed(2)}ms (threshold: ${event.threshold}ms)`,
  )
}

const defaultOnTimingSummary: OnTimingSummary = (summary) => {
  if (summary.slowListeners.length > 0) {
    console.warn(
      `[tracked-value] ${summary.tracker}: ${summary.listenerCount} listeners in ${summary.totalDuration.toFixed(2)}ms (${summary.slowListeners.length} slow)`,
    )
  }
}

export interface Timing {
  run: <T>(fn: () => T, meta: TimingMeta) => T
  /** Flush the counters collected since the last report. Called once per notification round. */
  reportRound: (tracker: string) => void
}

export interface TimingConfig {
  timing: boolean
  timingThreshold: number
  onSlowListener?: OnSlowListener
  onSummary?: OnTimingSummary
}

/**
 * Create a timing instance for a tracker.
 * If timing is disabled, all methods are no-ops.
 */
export const createTiming = (options: TimingConfig): Timing => {
  const {
    timing,
    timingThreshold,
    onSlowListener = defaultOnSlowListener,
    onSummary = defaultOnTimingSummary,
  } = options

  if (!timing) {
    return {
      run: (fn) => fn(),
      reportRound: () => {
        // Do nothing
      },
    }
  }

  let totalDuration = 0
  let listenerCount = 0
  let slowListeners: SlowListenerEvent[] = []
  const warned = new Set<string>()

  return {
    run: <T>(fn: () => T, meta: TimingMeta): T => {
      const start = performance.now()
      try {
        return fn()
      } finally {
        const duration = performance.now() - start
        totalDuration += duration
        listenerCount++

        if (duration > timingThreshold) {
          const event: SlowListenerEvent = {
            ...meta,
            duration,
            threshold: timingThreshold,
          }
          slowListeners.push(event)

          const warnKey = `${meta.tracker}:${meta.key}`
          if (!warned.has(warnKey)) {
            warned.add(warnKey)
            onSlowListener(event)
          }
        }
      }
    },

    reportRound: (tracker: string) => {
      onSummary({ tracker, totalDuration, listenerCount, slowListeners })

      // Reset round counters but keep warned set to avoid spam
      totalDuration = 0
      listenerCount = 0
      slowListeners = []
    },
  }
}
