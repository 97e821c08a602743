/**
 * Basic tracker usage: read freely, edit through a handle, get told about
 * real changes only.
 */

import { createDataTracker, type OnChanged } from '../src'

interface Settings {
  theme: 'dark' | 'light'
  fontSize: number
}

const settings = createDataTracker<Settings, number>(
  { theme: 'dark', fontSize: 12 },
  { name: 'settings', debug: { logMutations: true } },
)

// Keep the key to remove the listener later
const key = 0
settings.addListener(key, (oldValue, newValue) => {
  console.log('changed', oldValue, '->', newValue)
})

// Object listeners carry their own state
const history: OnChanged<Settings> & { entries: string[] } = {
  entries: [],
  onChanged(oldValue, newValue) {
    this.entries.push(`${oldValue.fontSize} -> ${newValue.fontSize}`)
  },
}
settings.addListener(1, history)

console.log('fontSize:', settings.read().fontSize)

// Notifies once, with the values from before and after the whole edit
settings.mutate((handle) => {
  handle.value.theme = 'light'
  handle.value.fontSize = 14
})

// Same value written back: nothing is notified
settings.mutate((handle) => {
  handle.value.theme = 'light'
})

// Manual scope: release() must be called exactly once
const handle = settings.beginMutation()
try {
  handle.update((current) => ({ ...current, fontSize: current.fontSize + 2 }))
} finally {
  handle.release()
}

console.log('history:', history.entries)

settings.removeListener(key)
