import { z } from 'zod'
import { createStore } from 'zustand/vanilla'
import type { StoreApi } from 'zustand/vanilla'
import type { StreamReference } from '@components/types'
import type { AppConfig } from '@lib/config'
import { SlotError } from '@lib/errors'
import {
  MAX_LAYOUT_SLOTS,
  computeLayout,
  defaultSlotCount,
  describeVariant,
  variantFromKey,
  type ContainerSize,
  type LayoutVariant,
  type SlotFrame
} from '@lib/layout/layout-engine'
import { createLogger, type Logger } from '@lib/logger'
import type { Preferences } from '@lib/settings/preferences'
import { requireStreamUrl, toStreamReference } from '@lib/streams/platform'
import { createAudioFocusStore, type AudioFocusStore } from './audio-focus'
import { createSlotStore, type SlotStore } from './slot-store'

export interface LayoutState {
  variant: LayoutVariant
  previousVariant: LayoutVariant | null
  container: ContainerSize
}

export type LayoutStore = StoreApi<LayoutState>

export interface AddedStream {
  slotIndex: number
  stream: StreamReference
}

export interface MultiStreamSession {
  slots: SlotStore
  audio: AudioFocusStore
  layout: LayoutStore
  applyLayout: (variant: LayoutVariant) => void
  setContainerSize: (size: ContainerSize) => void
  addStreamFromUrl: (text: string, slotIndex?: number) => AddedStream
  removeStream: (slotIndex: number) => void
  swapSlots: (a: number, b: number) => void
  focusSlot: (slotIndex: number) => void
  exitFocus: () => void
  focusNext: () => void
  focusPrevious: () => void
  frames: () => SlotFrame[]
  saveSnapshot: () => void
  restoreSnapshot: () => boolean
  dispose: () => void
}

export interface MultiStreamSessionOptions {
  config: AppConfig
  preferences?: Preferences
  logger?: Logger
  streamLimit?: number | null
  createSlotId?: () => string
  // Save a snapshot whenever slots, layout or audio mode change.
  autoSave?: boolean
}

export const SNAPSHOT_KEY = 'session_v1'
const FALLBACK_VARIANT: LayoutVariant = { kind: 'grid', columns: 2 }

const describeVariantOrNull = (variant: LayoutVariant | null): string | null =>
  variant ? describeVariant(variant) : null

const snapshotSchema = z.object({
  layout: z.string(),
  previousLayout: z.string().nullable().optional(),
  slotCount: z.number().int().min(0).optional(),
  audioMode: z.enum(['focusedOnly', 'all', 'manual']),
  streams: z.array(
    z.object({
      position: z.number().int().min(0),
      url: z.string(),
      title: z.string()
    })
  )
})

export type SessionSnapshot = z.infer<typeof snapshotSchema>

export const createMultiStreamSession = ({
  config,
  preferences,
  logger = createLogger('session'),
  streamLimit = null,
  createSlotId,
  autoSave = false
}: MultiStreamSessionOptions): MultiStreamSession => {
  const initialVariant =
    variantFromKey(preferences?.get('defaultLayout') ?? '') ?? FALLBACK_VARIANT

  const slots = createSlotStore({
    initialCount: defaultSlotCount(initialVariant, 0),
    maxRetries: config.maxSlotRetries,
    streamLimit,
    createSlotId,
    logger: createLogger('slots', config.logLevel)
  })
  const audio = createAudioFocusStore({
    mode: preferences?.get('audioMode') ?? 'focusedOnly',
    logger: createLogger('audio', config.logLevel)
  })
  const layout = createStore<LayoutState>()(() => ({
    variant: initialVariant,
    previousVariant: null,
    container: { width: 1, height: 1 }
  }))

  for (const slot of slots.getState().slots) audio.getState().register(slot.id)

  let restoring = false

  // Keeps audio registration in step with the slot list after a resize.
  const syncAudioRegistration = (before: string[]): void => {
    const after = slots.getState().slots.map((slot) => slot.id)
    for (const id of before) {
      if (!after.includes(id)) audio.getState().unregister(id)
    }
    for (const id of after) audio.getState().register(id)
  }

  // Focus layouts take their strip setting from preferences wherever they come from.
  const withFocusPreferences = (variant: LayoutVariant): LayoutVariant =>
    variant.kind === 'focus'
      ? { ...variant, showSecondary: preferences?.get('showSecondaryStreams') ?? true }
      : variant

  const setVariant = (
    variant: LayoutVariant,
    previousVariant: LayoutVariant | null,
    slotCount?: number
  ): void => {
    const before = slots.getState().slots.map((slot) => slot.id)
    slots.getState().resize(slotCount ?? defaultSlotCount(variant, before.length))
    syncAudioRegistration(before)
    layout.setState({ variant, previousVariant })
    logger.info(`layout ${describeVariant(variant)}`)
  }

  // The layout to go back to when leaving focus.
  const nonFocusVariant = (): LayoutVariant | null => {
    const { variant, previousVariant } = layout.getState()
    return variant.kind === 'focus' ? previousVariant : variant
  }

  const filledSlotIds = (): string[] =>
    slots.getState().slots.flatMap((slot) => (slot.stream ? [slot.id] : []))

  const slotIdAt = (slotIndex: number): string => {
    const slot = slots.getState().slots[slotIndex]
    if (!slot) {
      throw new SlotError('out-of-range', `There is no slot ${slotIndex + 1} in this layout.`)
    }
    return slot.id
  }

  const snapshot = (): SessionSnapshot => ({
    layout: describeVariant(layout.getState().variant),
    previousLayout: describeVariantOrNull(layout.getState().previousVariant),
    slotCount: slots.getState().slots.length,
    audioMode: audio.getState().mode,
    streams: slots
      .getState()
      .slots.flatMap((slot) =>
        slot.stream ? [{ position: slot.position, url: slot.stream.url, title: slot.stream.title }] : []
      )
  })

  const saveSnapshot = (): void => {
    if (!preferences) return
    preferences.writeJson(SNAPSHOT_KEY, snapshot())
  }

  const restoreSnapshot = (): boolean => {
    if (!preferences) return false
    const stored = preferences.readJson(SNAPSHOT_KEY, snapshotSchema)
    if (!stored) return false

    const storedVariant = variantFromKey(stored.layout)
    if (!storedVariant) {
      logger.warn(`ignoring snapshot with unknown layout ${stored.layout}`)
      return false
    }
    const variant = withFocusPreferences(storedVariant)
    const previousVariant = stored.previousLayout ? variantFromKey(stored.previousLayout) : null

    // Every stored position and the focused slot must exist after the resize.
    const highestPosition = Math.max(
      -1,
      variant.kind === 'focus' ? (variant.focusedIndex ?? 0) : -1,
      ...stored.streams.map((entry) => entry.position)
    )
    const slotCount = Math.min(
      MAX_LAYOUT_SLOTS,
      Math.max(stored.slotCount ?? defaultSlotCount(variant, 0), highestPosition + 1, 1)
    )

    restoring = true
    try {
      setVariant(variant, variant.kind === 'focus' ? previousVariant : null, slotCount)
      slots.getState().clearAll()
      audio.getState().setActive(null)
      audio.getState().setMode(stored.audioMode)

      for (const entry of stored.streams) {
        try {
          const stream = toStreamReference(requireStreamUrl(entry.url), { title: entry.title })
          slots.getState().assign(stream, entry.position)
        } catch (error) {
          logger.warn(`skipping stored stream ${entry.url}`, error)
        }
      }
    } finally {
      restoring = false
    }
    return true
  }

  const unsubscribers = autoSave
    ? [
        slots.subscribe((state, previous) => {
          if (!restoring && state.slots !== previous.slots) saveSnapshot()
        }),
        layout.subscribe((state, previous) => {
          if (!restoring && state.variant !== previous.variant) saveSnapshot()
        }),
        audio.subscribe((state, previous) => {
          if (!restoring && state.mode !== previous.mode) saveSnapshot()
        })
      ]
    : []

  return {
    slots,
    audio,
    layout,

    applyLayout: (variant) => setVariant(withFocusPreferences(variant), nonFocusVariant()),

    setContainerSize: ({ width, height }) => {
      const current = layout.getState().container
      if (current.width === width && current.height === height) return
      layout.setState({ container: { width, height } })
    },

    addStreamFromUrl: (text, slotIndex) => {
      const stream = toStreamReference(requireStreamUrl(text))
      let index: number
      if (slotIndex === undefined) {
        index = slots.getState().assignNext(stream)
      } else {
        slots.getState().assign(stream, slotIndex)
        index = slotIndex
      }

      const focus = audio.getState()
      if (focus.mode === 'focusedOnly' && focus.activeSlotId === null) {
        focus.setActive(slotIdAt(index))
      }
      return { slotIndex: index, stream }
    },

    removeStream: (slotIndex) => {
      const id = slotIdAt(slotIndex)
      slots.getState().clear(slotIndex)
      if (audio.getState().activeSlotId === id) audio.getState().setActive(null)
    },

    swapSlots: (a, b) => {
      const firstId = slotIdAt(a)
      const secondId = slotIdAt(b)
      slots.getState().swap(a, b)

      // Audio follows the stream, not the position.
      const { activeSlotId, manualMuted } = audio.getState()
      const swapped = (id: string | null): string | null =>
        id === firstId ? secondId : id === secondId ? firstId : id
      const nextMuted = { ...manualMuted }
      delete nextMuted[firstId]
      delete nextMuted[secondId]
      if (manualMuted[firstId] !== undefined) nextMuted[secondId] = manualMuted[firstId]
      if (manualMuted[secondId] !== undefined) nextMuted[firstId] = manualMuted[secondId]
      audio.setState({ activeSlotId: swapped(activeSlotId), manualMuted: nextMuted })
    },

    focusSlot: (slotIndex) => {
      const id = slotIdAt(slotIndex)
      setVariant(withFocusPreferences({ kind: 'focus', focusedIndex: slotIndex }), nonFocusVariant())
      audio.getState().setActive(id)
    },

    exitFocus: () => {
      const { variant, previousVariant } = layout.getState()
      if (variant.kind !== 'focus') return
      setVariant(previousVariant ?? FALLBACK_VARIANT, null)
    },

    focusNext: () => audio.getState().focusNext(filledSlotIds()),

    focusPrevious: () => audio.getState().focusPrevious(filledSlotIds()),

    frames: () => {
      const { variant, container } = layout.getState()
      return computeLayout(
        variant,
        slots.getState().slots.map((slot) => slot.id),
        container
      )
    },

    saveSnapshot,
    restoreSnapshot,

    dispose: () => {
      for (const unsubscribe of unsubscribers) unsubscribe()
      unsubscribers.length = 0
    }
  }
}
