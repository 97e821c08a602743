import type { DeepRequired } from '../types/utils'
import type { TrackerConfig } from './types'

export const DEFAULT_TRACKER_CONFIG: DeepRequired<TrackerConfig> = {
  name: 'tracker',
  debug: {
    logMutations: false,
    logListeners: false,
    timing: false,
    timingThreshold: 5,
  },
}
