import { createStore } from 'zustand/vanilla'
import type { StoreApi } from 'zustand/vanilla'
import type { AudioMode } from '@components/types'
import { createLogger, type Logger } from '@lib/logger'

export interface AudioFocusState {
  mode: AudioMode
  activeSlotId: string | null
  registered: string[]
  manualMuted: Record<string, boolean>
  masterMuted: boolean
  masterVolume: number

  register: (slotId: string) => void
  unregister: (slotId: string) => void
  setActive: (slotId: string | null) => void
  isMuted: (slotId: string) => boolean
  effectiveVolume: (slotId: string) => number
  toggleMute: (slotId: string) => void
  solo: (slotId: string) => void
  muteAll: () => void
  setMode: (mode: AudioMode) => void
  toggleMasterMute: () => void
  setMasterVolume: (volume: number) => void
  // `among` narrows the cycle to those slots, in registration order
  focusNext: (among?: string[]) => void
  focusPrevious: (among?: string[]) => void
}

export type AudioFocusStore = StoreApi<AudioFocusState>

export interface AudioFocusOptions {
  mode?: AudioMode
  masterVolume?: number
  logger?: Logger
}

const clampVolume = (volume: number, fallback: number): number =>
  Number.isFinite(volume) ? Math.min(1, Math.max(0, volume)) : fallback

/**
 * Tracks which slots may play sound.
 *
 * In `focusedOnly` mode the active slot is the only audible one; `manual` keeps an
 * independent flag per slot (muted unless set otherwise); `all` leaves everything audible.
 * The master mute overrides every mode.
 */
export const createAudioFocusStore = ({
  mode = 'focusedOnly',
  masterVolume = 1,
  logger = createLogger('audio')
}: AudioFocusOptions = {}): AudioFocusStore =>
  createStore<AudioFocusState>()((set, get) => {
    const audibleIn = (state: AudioFocusState, slotId: string): boolean => {
      switch (state.mode) {
        case 'focusedOnly':
          return state.activeSlotId === slotId
        case 'all':
          return true
        case 'manual':
          return state.manualMuted[slotId] === false
      }
    }

    const cycle = (step: 1 | -1, among?: string[]): void => {
      const { registered, activeSlotId } = get()
      const candidates = among ? registered.filter((id) => among.includes(id)) : registered
      if (candidates.length === 0) return
      const current = activeSlotId === null ? -1 : candidates.indexOf(activeSlotId)
      const next =
        current === -1
          ? step === 1
            ? 0
            : candidates.length - 1
          : (current + step + candidates.length) % candidates.length
      get().setActive(candidates[next] ?? null)
    }

    return {
      mode,
      activeSlotId: null,
      registered: [],
      manualMuted: {},
      masterMuted: false,
      masterVolume: clampVolume(masterVolume, 1),

      register: (slotId) =>
        set((state) =>
          state.registered.includes(slotId) ? state : { registered: [...state.registered, slotId] }
        ),

      unregister: (slotId) =>
        set((state) => {
          if (!state.registered.includes(slotId)) return state
          const { [slotId]: _removed, ...manualMuted } = state.manualMuted
          return {
            registered: state.registered.filter((id) => id !== slotId),
            manualMuted,
            activeSlotId: state.activeSlotId === slotId ? null : state.activeSlotId
          }
        }),

      setActive: (slotId) => {
        if (slotId === null) {
          set({ activeSlotId: null })
          return
        }
        if (!get().registered.includes(slotId)) {
          logger.debug(`ignoring focus for unregistered slot ${slotId}`)
          return
        }
        set((state) => ({
          activeSlotId: slotId,
          manualMuted:
            state.mode === 'manual' ? { ...state.manualMuted, [slotId]: false } : state.manualMuted
        }))
      },

      isMuted: (slotId) => {
        const state = get()
        return state.masterMuted || !audibleIn(state, slotId)
      },

      effectiveVolume: (slotId) => (get().isMuted(slotId) ? 0 : get().masterVolume),

      toggleMute: (slotId) => {
        const state = get()
        if (!state.registered.includes(slotId)) return

        switch (state.mode) {
          case 'focusedOnly':
            set({ activeSlotId: state.activeSlotId === slotId ? null : slotId })
            return
          case 'manual':
            set({
              manualMuted: { ...state.manualMuted, [slotId]: !(state.manualMuted[slotId] ?? true) }
            })
            return
          case 'all':
            set({
              mode: 'manual',
              manualMuted: Object.fromEntries(state.registered.map((id) => [id, id === slotId]))
            })
        }
      },

      solo: (slotId) => {
        const state = get()
        if (!state.registered.includes(slotId)) return
        set({
          mode: state.mode === 'all' ? 'focusedOnly' : state.mode,
          activeSlotId: slotId,
          manualMuted: Object.fromEntries(state.registered.map((id) => [id, id !== slotId]))
        })
      },

      muteAll: () =>
        set((state) => ({
          mode: state.mode === 'all' ? 'manual' : state.mode,
          activeSlotId: null,
          manualMuted: Object.fromEntries(state.registered.map((id) => [id, true]))
        })),

      setMode: (nextMode) => {
        const state = get()
        if (state.mode === nextMode) return
        // Entering manual keeps whatever was audible a moment ago.
        const manualMuted =
          nextMode === 'manual'
            ? Object.fromEntries(state.registered.map((id) => [id, !audibleIn(state, id)]))
            : state.manualMuted
        set({ mode: nextMode, manualMuted })
        logger.info(`audio mode ${state.mode} -> ${nextMode}`)
      },

      toggleMasterMute: () => set((state) => ({ masterMuted: !state.masterMuted })),

      setMasterVolume: (volume) =>
        set((state) => ({ masterVolume: clampVolume(volume, state.masterVolume) })),

      focusNext: (among) => cycle(1, among),

      focusPrevious: (among) => cycle(-1, among)
    }
  })
