/**
 * tracked-value
 *
 * Change-tracked ownership of a single value:
 * - Free reads of the current value
 * - Writes through a scoped mutation handle
 * - Listeners notified once per handle, only when the value actually changed
 */

// Tracker
export { createDataTracker } from './tracker/create-tracker'
export type {
  DataTracker,
  MutationHandle,
  TrackerState,
} from './tracker/types'

// Listeners
export {
  createListenersRegistry,
  invokeListener,
  type ListenersRegistry,
  type ListenersRegistryOptions,
} from './listeners/registry'
export type {
  DispatchWrapper,
  Listener,
  OnChanged,
  OnChangedFunction,
} from './listeners/types'

// Configuration
export { DEFAULT_TRACKER_CONFIG } from './core/defaults'
export {
  resolveTrackerConfig,
  trackerConfigSchema,
  type ResolvedTrackerConfig,
} from './core/config'
export type {
  DebugConfig,
  TrackerConfig,
  TrackerHooks,
  TrackerOptions,
} from './core/types'

// Snapshots
export { snapshotValue } from './tracker/snapshot'

// Timing
export type {
  OnSlowListener,
  OnTimingSummary,
  SlowListenerEvent,
  TimingSummary,
} from './utils/timing'
export type { DeepReadonly } from './types/utils'
