import { describe, expect, it } from 'vitest'

import * as api from '~/index'

describe('public surface', () => {
  it('should export the tracker, registry, config and snapshot entry points', () => {
    expect(api.createDataTracker).toBeTypeOf('function')
    expect(api.createListenersRegistry).toBeTypeOf('function')
    expect(api.invokeListener).toBeTypeOf('function')
    expect(api.resolveTrackerConfig).toBeTypeOf('function')
    expect(api.snapshotValue).toBeTypeOf('function')
    expect(api.DEFAULT_TRACKER_CONFIG.name).toBe('tracker')
  })

  it('should keep internal helpers out of the exports', () => {
    expect(api).not.toHaveProperty('is')
    expect(api).not.toHaveProperty('deepMerge')
    expect(api).not.toHaveProperty('deepClone')
  })
})
