import { describe, it, expect } from 'vitest'
import { silentLogger } from '@lib/logger'
import { createAudioFocusStore, type AudioFocusOptions } from './audio-focus'

const setup = (options: AudioFocusOptions = {}) => {
  const store = createAudioFocusStore({ logger: silentLogger, ...options })
  for (const id of ['a', 'b', 'c']) store.getState().register(id)
  return store
}

const audible = (store: ReturnType<typeof setup>): string[] =>
  store.getState().registered.filter((id) => !store.getState().isMuted(id))

describe('createAudioFocusStore', () => {
  describe('focusedOnly', () => {
    it('keeps every slot muted until focus is set', () => {
      const store = setup()
      expect(audible(store)).toEqual([])
    })

    it('leaves exactly one slot audible after any sequence of setActive calls', () => {
      const store = setup()
      for (const id of ['a', 'c', 'b', 'b', 'missing', 'a']) {
        store.getState().setActive(id)
        expect(audible(store)).toHaveLength(1)
      }
      expect(audible(store)).toEqual(['a'])
    })

    it('ignores unregistered ids', () => {
      const store = setup()
      store.getState().setActive('b')
      store.getState().setActive('zzz')
      expect(store.getState().activeSlotId).toBe('b')
    })

    it('clears focus when the active slot is unregistered', () => {
      const store = setup()
      store.getState().setActive('b')
      store.getState().unregister('b')
      expect(store.getState().activeSlotId).toBeNull()
      expect(audible(store)).toEqual([])
    })

    it('toggles focus on and off a slot', () => {
      const store = setup()
      store.getState().toggleMute('b')
      expect(audible(store)).toEqual(['b'])
      store.getState().toggleMute('b')
      expect(audible(store)).toEqual([])
    })
  })

  describe('all and manual', () => {
    it('makes every slot audible in all mode', () => {
      const store = setup({ mode: 'all' })
      expect(audible(store)).toEqual(['a', 'b', 'c'])
    })

    it('switches to manual when muting one slot in all mode', () => {
      const store = setup({ mode: 'all' })
      store.getState().toggleMute('b')
      expect(store.getState().mode).toBe('manual')
      expect(audible(store)).toEqual(['a', 'c'])
    })

    it('defaults manual slots to muted and flips them independently', () => {
      const store = setup({ mode: 'manual' })
      expect(audible(store)).toEqual([])
      store.getState().toggleMute('a')
      store.getState().toggleMute('c')
      expect(audible(store)).toEqual(['a', 'c'])
      store.getState().toggleMute('a')
      expect(audible(store)).toEqual(['c'])
    })

    it('unmutes the focused slot in manual mode', () => {
      const store = setup({ mode: 'manual' })
      store.getState().setActive('b')
      expect(audible(store)).toEqual(['b'])
    })

    it('keeps current audibility when switching to manual', () => {
      const store = setup()
      store.getState().setActive('c')
      store.getState().setMode('manual')
      expect(audible(store)).toEqual(['c'])
    })
  })

  describe('solo and muteAll', () => {
    it('solos a slot in any mode', () => {
      const store = setup({ mode: 'all' })
      store.getState().solo('b')
      expect(store.getState().mode).toBe('focusedOnly')
      expect(audible(store)).toEqual(['b'])

      store.getState().setMode('manual')
      store.getState().toggleMute('a')
      store.getState().solo('c')
      expect(audible(store)).toEqual(['c'])
    })

    it('mutes everything', () => {
      const store = setup({ mode: 'all' })
      store.getState().muteAll()
      expect(audible(store)).toEqual([])
    })
  })

  describe('master controls', () => {
    it('overrides every slot with the master mute', () => {
      const store = setup({ mode: 'all' })
      store.getState().toggleMasterMute()
      expect(audible(store)).toEqual([])
      expect(store.getState().effectiveVolume('a')).toBe(0)
    })

    it('clamps the master volume and reports it for audible slots', () => {
      const store = setup({ mode: 'all' })
      store.getState().setMasterVolume(1.7)
      expect(store.getState().masterVolume).toBe(1)
      store.getState().setMasterVolume(-2)
      expect(store.getState().masterVolume).toBe(0)
      store.getState().setMasterVolume(0.4)
      expect(store.getState().effectiveVolume('b')).toBe(0.4)
      store.getState().setMasterVolume(Number.NaN)
      expect(store.getState().masterVolume).toBe(0.4)
    })
  })

  describe('focus cycling', () => {
    it('cycles forward and backward with wrapping', () => {
      const store = setup()
      store.getState().focusNext()
      expect(store.getState().activeSlotId).toBe('a')
      store.getState().focusPrevious()
      expect(store.getState().activeSlotId).toBe('c')
      store.getState().focusNext()
      expect(store.getState().activeSlotId).toBe('a')
    })

    it('starts from the last slot when moving backward without focus', () => {
      const store = setup()
      store.getState().focusPrevious()
      expect(store.getState().activeSlotId).toBe('c')
    })

    it('only visits the given slots when a subset is passed', () => {
      const store = setup()
      store.getState().focusNext(['c', 'a'])
      expect(store.getState().activeSlotId).toBe('a')
      store.getState().focusNext(['c', 'a'])
      expect(store.getState().activeSlotId).toBe('c')
      store.getState().focusNext(['c', 'a'])
      expect(store.getState().activeSlotId).toBe('a')
    })

    it('does nothing when the subset is empty', () => {
      const store = setup()
      store.getState().setActive('b')
      store.getState().focusPrevious([])
      expect(store.getState().activeSlotId).toBe('b')
    })
  })
})
