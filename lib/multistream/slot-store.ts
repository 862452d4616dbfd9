import { createStore } from 'zustand/vanilla'
import type { StoreApi } from 'zustand/vanilla'
import type { StreamReference } from '@components/types'
import { SlotError } from '@lib/errors'
import { createLogger, type Logger } from '@lib/logger'

export type SlotStatus = 'empty' | 'loading' | 'ready' | 'error'

export interface StreamSlot {
  id: string
  position: number
  stream: StreamReference | null
  status: SlotStatus
  retryCount: number
  error: string | null
  terminal: boolean
}

export interface SlotState {
  slots: StreamSlot[]
  maxRetries: number
  streamLimit: number | null

  filledCount: () => number
  indexOfStream: (streamId: string) => number

  resize: (count: number) => void
  assign: (stream: StreamReference, slotIndex: number) => void
  assignNext: (stream: StreamReference) => number
  clear: (slotIndex: number) => void
  clearAll: () => void
  markReady: (slotIndex: number) => void
  markError: (slotIndex: number, message: string) => void
  retry: (slotIndex: number) => boolean
  swap: (a: number, b: number) => void
  setStreamLimit: (limit: number | null) => void
}

export type SlotStore = StoreApi<SlotState>

export interface SlotStoreOptions {
  initialCount?: number
  maxRetries?: number
  streamLimit?: number | null
  createSlotId?: () => string
  logger?: Logger
}

export const RETRY_LIMIT_MESSAGE = 'Retry limit reached'

export const createId = (): string =>
  typeof crypto !== 'undefined' && 'randomUUID' in crypto
    ? crypto.randomUUID()
    : `${Date.now()}-${Math.random().toString(36).slice(2, 8)}`

const emptySlot = (id: string, position: number): StreamSlot => ({
  id,
  position,
  stream: null,
  status: 'empty',
  retryCount: 0,
  error: null,
  terminal: false
})

export const createSlotStore = ({
  initialCount = 0,
  maxRetries = 3,
  streamLimit = null,
  createSlotId = createId,
  logger = createLogger('slots')
}: SlotStoreOptions = {}): SlotStore =>
  createStore<SlotState>()((set, get) => {
    const slotAt = (slotIndex: number): StreamSlot => {
      const slot = get().slots[slotIndex]
      if (!Number.isInteger(slotIndex) || !slot) {
        throw new SlotError('out-of-range', `There is no slot ${slotIndex + 1} in this layout.`)
      }
      return slot
    }

    const update = (slotIndex: number, patch: Partial<Omit<StreamSlot, 'id' | 'position'>>): void =>
      set((state) => ({
        slots: state.slots.map((slot, index) => (index === slotIndex ? { ...slot, ...patch } : slot))
      }))

    return {
      slots: Array.from({ length: Math.max(0, Math.floor(initialCount)) }, (_, position) =>
        emptySlot(createSlotId(), position)
      ),
      maxRetries: Math.max(0, Math.floor(maxRetries)),
      streamLimit,

      filledCount: () => get().slots.filter((slot) => slot.stream !== null).length,

      indexOfStream: (streamId) => get().slots.findIndex((slot) => slot.stream?.id === streamId),

      resize: (count) => {
        const target = Math.max(0, Math.floor(count))
        set((state) => ({
          slots: Array.from(
            { length: target },
            (_, position) => state.slots[position] ?? emptySlot(createSlotId(), position)
          )
        }))
        logger.debug(`resized to ${target} slots`)
      },

      assign: (stream, slotIndex) => {
        const slot = slotAt(slotIndex)
        const state = get()

        const existing = state.indexOfStream(stream.id)
        if (existing !== -1 && existing !== slotIndex) {
          throw new SlotError('duplicate', `${stream.title} is already playing in slot ${existing + 1}.`)
        }

        if (slot.stream === null && state.streamLimit !== null && state.filledCount() >= state.streamLimit) {
          throw new SlotError(
            'limit',
            `Your plan allows ${state.streamLimit} simultaneous streams. Upgrade to add more.`
          )
        }

        update(slotIndex, { stream, status: 'loading', retryCount: 0, error: null, terminal: false })
        logger.info(`assigned ${stream.id} to slot ${slotIndex}`)
      },

      assignNext: (stream) => {
        const index = get().slots.findIndex((slot) => slot.stream === null)
        if (index === -1) {
          throw new SlotError('no-free-slot', 'Every slot is in use. Pick a bigger layout or remove a stream.')
        }
        get().assign(stream, index)
        return index
      },

      clear: (slotIndex) => {
        const slot = slotAt(slotIndex)
        update(slotIndex, { stream: null, status: 'empty', retryCount: 0, error: null, terminal: false })
        if (slot.stream) logger.info(`cleared ${slot.stream.id} from slot ${slotIndex}`)
      },

      clearAll: () =>
        set((state) => ({ slots: state.slots.map((slot) => emptySlot(slot.id, slot.position)) })),

      markReady: (slotIndex) => {
        if (slotAt(slotIndex).status !== 'loading') return
        update(slotIndex, { status: 'ready', error: null })
      },

      markError: (slotIndex, message) => {
        const slot = slotAt(slotIndex)
        if (slot.status !== 'loading' && slot.status !== 'ready') return
        const terminal = slot.retryCount >= get().maxRetries
        update(slotIndex, { status: 'error', error: message, terminal })
        logger.warn(`slot ${slotIndex} failed: ${message}`, { retryCount: slot.retryCount, terminal })
      },

      retry: (slotIndex) => {
        const slot = slotAt(slotIndex)
        if (!slot.stream || slot.terminal) return false

        if (slot.retryCount >= get().maxRetries) {
          update(slotIndex, { status: 'error', error: RETRY_LIMIT_MESSAGE, terminal: true })
          logger.warn(`slot ${slotIndex} reached the retry limit`)
          return false
        }

        update(slotIndex, { status: 'loading', retryCount: slot.retryCount + 1, error: null })
        logger.debug(`retrying slot ${slotIndex} (${slot.retryCount + 1}/${get().maxRetries})`)
        return true
      },

      swap: (a, b) => {
        const first = slotAt(a)
        const second = slotAt(b)
        if (a === b) return
        set((state) => ({
          slots: state.slots.map((slot, index) => {
            if (index === a) return { ...second, id: first.id, position: first.position }
            if (index === b) return { ...first, id: second.id, position: second.position }
            return slot
          })
        }))
      },

      setStreamLimit: (limit) =>
        set({ streamLimit: limit === null ? null : Math.max(0, Math.floor(limit)) })
    }
  })
