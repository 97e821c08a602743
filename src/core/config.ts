import { z } from 'zod'

import { DEFAULT_TRACKER_CONFIG } from './defaults'
import type { TrackerConfig } from './types'

const { debug: debugDefaults } = DEFAULT_TRACKER_CONFIG

const debugConfigSchema = z.object({
  logMutations: z.boolean().default(debugDefaults.logMutations),
  logListeners: z.boolean().default(debugDefaults.logListeners),
  timing: z.boolean().default(debugDefaults.timing),
  timingThreshold: z
    .number()
    .nonnegative()
    .finite()
    .default(debugDefaults.timingThreshold),
})

/**
 * Tracker config schema. Every field is optional on input and filled from
 * `DEFAULT_TRACKER_CONFIG` on output; unknown keys (the function hooks) are
 * stripped.
 */
export const trackerConfigSchema = z.object({
  name: z.string().min(1).default(DEFAULT_TRACKER_CONFIG.name),
  debug: debugConfigSchema.default({}),
})

export type ResolvedTrackerConfig = z.output<typeof trackerConfigSchema>

/** Validate a tracker config and fill in defaults. */
export const resolveTrackerConfig = (
  config: TrackerConfig = {},
): ResolvedTrackerConfig => {
  const result = trackerConfigSchema.safeParse(config)
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new Error(`[tracked-value] Invalid tracker config: ${issues}`)
  }
  return result.data
}
