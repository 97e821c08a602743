/**
 * Core Tracker Types
 *
 * Configuration shapes shared by the tracker, the logger and the timing layer.
 */

import type { OnSlowListener, OnTimingSummary } from '../utils/timing'

/**
 * Debug configuration for development tooling
 */
export interface DebugConfig {
  /** Log every released mutation handle, changed or not */
  logMutations?: boolean
  /** Log listener dispatch and listener add/remove */
  logListeners?: boolean
  /** Enable timing measurement for listeners */
  timing?: boolean
  /** Threshold in milliseconds for slow listener warnings (default: 5ms) */
  timingThreshold?: number
}

export interface TrackerConfig {
  /** Label used in log output (default: "tracker") */
  name?: string
  /** Debug configuration for development tooling */
  debug?: DebugConfig
}

/**
 * Behavioural hooks. Functions, so they sit outside the validated config.
 */
export interface TrackerHooks<T> {
  /** Equality used on release to decide whether to notify (default: lodash `isEqual`) */
  isEqual?: (a: T, b: T) => boolean
  /** Produces the snapshot taken when a handle is created (default: `snapshotValue`) */
  clone?: (value: T) => T
  /** Called the first time a listener key exceeds `debug.timingThreshold` */
  onSlowListener?: OnSlowListener
  /** Called after every notification round while `debug.timing` is on */
  onTimingSummary?: OnTimingSummary
}

export type TrackerOptions<T> = TrackerConfig & TrackerHooks<T>
