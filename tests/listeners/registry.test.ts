/**
 * Tests for the listeners registry
 *
 * Covers keyed insert/replace/remove, single-pass notification, both listener
 * forms, and error propagation out of a notification round.
 */

import { describe, expect, it, vi } from 'vitest'

import {
  createListenersRegistry,
  invokeListener,
} from '~/listeners/registry'
import type { OnChanged } from '~/listeners/types'

describe('createListenersRegistry', () => {
  describe('insert', () => {
    it('should return undefined when the key is new', () => {
      const registry = createListenersRegistry<number, string>()

      expect(registry.insert('a', vi.fn())).toBeUndefined()
      expect(registry.size).toBe(1)
    })

    it('should return the previous listener and replace it', () => {
      const registry = createListenersRegistry<number, string>()
      const first = vi.fn()
      const second = vi.fn()

      registry.insert('a', first)
      const previous = registry.insert('a', second)

      expect(previous).toBe(first)
      expect(registry.get('a')).toBe(second)
      expect(registry.size).toBe(1)
    })

    it('should only notify the replacement', () => {
      const registry = createListenersRegistry<number, string>()
      const first = vi.fn()
      const second = vi.fn()

      registry.insert('a', first)
      registry.insert('a', second)
      registry.notifyAll(1, 2)

      expect(first).not.toHaveBeenCalled()
      expect(second).toHaveBeenCalledTimes(1)
      expect(second).toHaveBeenCalledWith(1, 2)
    })
  })

  describe('remove', () => {
    it('should return the removed listener', () => {
      const registry = createListenersRegistry<number, string>()
      const listener = vi.fn()
      registry.insert('a', listener)

      expect(registry.remove('a')).toBe(listener)
      expect(registry.has('a')).toBe(false)
      expect(registry.size).toBe(0)
    })

    it('should return undefined for an absent key', () => {
      const registry = createListenersRegistry<number, string>()
      registry.insert('a', vi.fn())

      expect(registry.remove('missing')).toBeUndefined()
      expect(registry.size).toBe(1)
    })

    it('should never notify a removed listener', () => {
      const registry = createListenersRegistry<number, string>()
      const listener = vi.fn()
      registry.insert('a', listener)
      registry.remove('a')

      registry.notifyAll(1, 2)

      expect(listener).not.toHaveBeenCalled()
    })
  })

  describe('notifyAll', () => {
    it('should call every listener exactly once with (old, new)', () => {
      const registry = createListenersRegistry<string, number>()
      const listeners = [vi.fn(), vi.fn(), vi.fn()]
      listeners.forEach((fn, i) => registry.insert(i, fn))

      registry.notifyAll('before', 'after')

      for (const fn of listeners) {
        expect(fn).toHaveBeenCalledTimes(1)
        expect(fn).toHaveBeenCalledWith('before', 'after')
      }
    })

    it('should do nothing when empty', () => {
      const registry = createListenersRegistry<number, string>()
      expect(() => registry.notifyAll(1, 2)).not.toThrow()
    })

    it('should call object listeners through onChanged with this bound', () => {
      const registry = createListenersRegistry<number, string>()
      const seen: string[] = []
      const listener: OnChanged<number> & { prefix: string } = {
        prefix: 'count',
        onChanged(oldValue, newValue) {
          seen.push(`${this.prefix}: ${oldValue} -> ${newValue}`)
        },
      }
      registry.insert('obj', listener)

      registry.notifyAll(3, 4)

      expect(seen).toEqual(['count: 3 -> 4'])
    })

    it('should propagate a listener error and stop the round there', () => {
      const registry = createListenersRegistry<number, string>()
      const failure = new Error('listener failed')
      const before = vi.fn()
      const after = vi.fn()

      registry.insert('before', before)
      registry.insert('failing', () => {
        throw failure
      })
      registry.insert('after', after)

      expect(() => registry.notifyAll(1, 2)).toThrow(failure)
      expect(before).toHaveBeenCalledTimes(1)
      expect(after).not.toHaveBeenCalled()
    })

    it('should not call listeners inserted during the round', () => {
      const registry = createListenersRegistry<number, string>()
      const late = vi.fn()
      registry.insert('inserter', () => {
        registry.insert('late', late)
      })

      registry.notifyAll(1, 2)
      expect(late).not.toHaveBeenCalled()

      registry.notifyAll(2, 3)
      expect(late).toHaveBeenCalledWith(2, 3)
    })

    it('should route each call through wrapDispatch with its key', () => {
      const keys: string[] = []
      const registry = createListenersRegistry<number, string>({
        wrapDispatch: (key, run) => {
          keys.push(key)
          run()
        },
      })
      const a = vi.fn()
      const b = vi.fn()
      registry.insert('a', a)
      registry.insert('b', b)

      registry.notifyAll(0, 1)

      expect(keys.sort()).toEqual(['a', 'b'])
      expect(a).toHaveBeenCalledWith(0, 1)
      expect(b).toHaveBeenCalledWith(0, 1)
    })
  })

  describe('lookup helpers', () => {
    it('should expose keys, has, get and clear', () => {
      const registry = createListenersRegistry<number, number>()
      const listener = vi.fn()
      registry.insert(0, listener)
      registry.insert(1, vi.fn())

      expect(registry.keys().sort()).toEqual([0, 1])
      expect(registry.has(0)).toBe(true)
      expect(registry.get(0)).toBe(listener)
      expect(registry.get(2)).toBeUndefined()

      registry.clear()

      expect(registry.size).toBe(0)
      expect(registry.keys()).toEqual([])
    })

    it('should accept symbols and objects as keys', () => {
      const registry = createListenersRegistry<number, symbol | object>()
      const sym = Symbol('owner')
      const owner = {}
      registry.insert(sym, vi.fn())
      registry.insert(owner, vi.fn())

      expect(registry.has(sym)).toBe(true)
      expect(registry.has(owner)).toBe(true)
      expect(registry.has({})).toBe(false)
    })
  })
})

describe('invokeListener', () => {
  it('should call function listeners directly', () => {
    const fn = vi.fn()
    invokeListener(fn, 'a', 'b')
    expect(fn).toHaveBeenCalledWith('a', 'b')
  })

  it('should call onChanged on object listeners', () => {
    const onChanged = vi.fn()
    invokeListener<string>({ onChanged }, 'a', 'b')
    expect(onChanged).toHaveBeenCalledWith('a', 'b')
  })
})
