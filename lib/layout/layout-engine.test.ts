import { describe, it, expect } from 'vitest'
import {
  BENTO_PRESETS,
  LAYOUT_PRESETS,
  computeLayout,
  defaultSlotCount,
  describeVariant,
  framesOverlap,
  hasOverlap,
  layoutCapacity,
  variantFromKey
} from './layout-engine'

const ids = (count: number): string[] => Array.from({ length: count }, (_, index) => `slot-${index}`)

describe('computeLayout', () => {
  describe('grid', () => {
    it('splits the container into equal cells with spacing between them', () => {
      const frames = computeLayout({ kind: 'grid', columns: 2 }, ids(4), { width: 800, height: 450 })

      expect(frames.map((item) => item.frame)).toEqual([
        { x: 0, y: 0, width: 396, height: 221 },
        { x: 404, y: 0, width: 396, height: 221 },
        { x: 0, y: 229, width: 396, height: 221 },
        { x: 404, y: 229, width: 396, height: 221 }
      ])
      expect(frames.every((item) => item.zIndex === 0 && item.visible)).toBe(true)
    })

    it('produces non-overlapping frames inside the container with the configured gaps', () => {
      const container = { width: 1280, height: 720 }
      const frames = computeLayout({ kind: 'grid', columns: 3, spacing: 12 }, ids(7), container)

      expect(frames).toHaveLength(7)
      expect(hasOverlap(frames.map((item) => item.frame))).toBe(false)
      for (const { frame } of frames) {
        expect(frame.x).toBeGreaterThanOrEqual(0)
        expect(frame.y).toBeGreaterThanOrEqual(0)
        expect(frame.x + frame.width).toBeLessThanOrEqual(container.width + 1e-9)
        expect(frame.y + frame.height).toBeLessThanOrEqual(container.height + 1e-9)
      }

      const [first, second, , fourth] = frames.map((item) => item.frame)
      expect(second.x - (first.x + first.width)).toBeCloseTo(12)
      expect(fourth.y - (first.y + first.height)).toBeCloseTo(12)
    })

    it('is idempotent', () => {
      const variant = { kind: 'grid', columns: 3 } as const
      const container = { width: 1000, height: 700 }
      expect(computeLayout(variant, ids(5), container)).toEqual(
        computeLayout(variant, ids(5), container)
      )
    })

    it('clamps non-positive container sizes', () => {
      const [only] = computeLayout({ kind: 'grid', columns: 1 }, ids(1), { width: 0, height: -5 })
      expect(only.frame).toEqual({ x: 0, y: 0, width: 1, height: 1 })
    })

    it('returns nothing for no slots and drops slots past capacity', () => {
      expect(computeLayout({ kind: 'grid', columns: 2 }, [], { width: 100, height: 100 })).toEqual([])
      expect(
        computeLayout({ kind: 'grid', columns: 4 }, ids(20), { width: 100, height: 100 })
      ).toHaveLength(16)
    })
  })

  describe('pip', () => {
    const container = { width: 1000, height: 600 }

    it('fills the container with the main slot and stacks insets from the corner', () => {
      const frames = computeLayout({ kind: 'pip' }, ids(3), container)

      expect(frames[0]).toMatchObject({ frame: { x: 0, y: 0, width: 1000, height: 600 }, zIndex: 0 })
      expect(frames[1]).toMatchObject({
        frame: { x: 684, y: 415.25, width: 300, height: 168.75 },
        zIndex: 11
      })
      expect(frames[2]).toMatchObject({
        frame: { x: 684, y: 238.5, width: 300, height: 168.75 },
        zIndex: 12
      })
    })

    it('anchors insets at the requested position and size', () => {
      const frames = computeLayout(
        { kind: 'pip', position: 'topLeading', size: 'small', mainIndex: 1 },
        ids(3),
        container
      )

      expect(frames[1].frame).toEqual({ x: 0, y: 0, width: 1000, height: 600 })
      expect(frames[0].frame).toEqual({ x: 16, y: 16, width: 200, height: 112.5 })
      expect(frames[2].frame).toEqual({ x: 16, y: 136.5, width: 200, height: 112.5 })
    })

    it('falls back to the first slot when mainIndex is out of range and caps at four slots', () => {
      const frames = computeLayout({ kind: 'pip', mainIndex: 7 }, ids(6), container)
      expect(frames).toHaveLength(4)
      expect(frames[0].frame.width).toBe(1000)
    })
  })

  describe('mosaic', () => {
    it('fills the container with a single slot', () => {
      for (const pattern of ['balanced', 'asymmetric', 'pyramid'] as const) {
        const [only] = computeLayout({ kind: 'mosaic', pattern }, ids(1), { width: 640, height: 360 })
        expect(only.frame).toEqual({ x: 0, y: 0, width: 640, height: 360 })
      }
    })

    it('lays out the balanced pattern as a two column grid', () => {
      const frames = computeLayout({ kind: 'mosaic', pattern: 'balanced' }, ids(3), {
        width: 804,
        height: 404
      })
      expect(frames.map((item) => item.frame)).toEqual([
        { x: 0, y: 0, width: 400, height: 200 },
        { x: 404, y: 0, width: 400, height: 200 },
        { x: 0, y: 204, width: 400, height: 200 }
      ])
    })

    it('puts the main slot on the left for the asymmetric pattern', () => {
      const frames = computeLayout({ kind: 'mosaic', pattern: 'asymmetric' }, ids(4), {
        width: 900,
        height: 600
      })
      expect(frames.map((item) => item.frame)).toEqual([
        { x: 0, y: 0, width: 600, height: 600 },
        { x: 600, y: 0, width: 300, height: 200 },
        { x: 600, y: 200, width: 300, height: 200 },
        { x: 600, y: 400, width: 300, height: 200 }
      ])
    })

    it('splits the bottom half for the pyramid pattern', () => {
      const frames = computeLayout({ kind: 'mosaic', pattern: 'pyramid' }, ids(3), {
        width: 800,
        height: 600
      })
      expect(frames.map((item) => item.frame)).toEqual([
        { x: 0, y: 0, width: 800, height: 300 },
        { x: 0, y: 300, width: 400, height: 300 },
        { x: 400, y: 300, width: 400, height: 300 }
      ])
    })
  })

  describe('bento', () => {
    it('scales template cells to the container and uses priority as zIndex', () => {
      const frames = computeLayout({ kind: 'bento', template: 'featured' }, ids(7), {
        width: 600,
        height: 400
      })
      expect(frames[0]).toMatchObject({ frame: { x: 0, y: 0, width: 400, height: 300 }, zIndex: 2 })
      expect(frames[6]).toMatchObject({ frame: { x: 400, y: 300, width: 200, height: 100 }, zIndex: 0 })
      expect(hasOverlap(frames.map((item) => item.frame))).toBe(false)
    })

    it('never produces more frames than the template has cells', () => {
      const frames = computeLayout({ kind: 'bento', template: 'sidebar' }, ids(10), {
        width: 500,
        height: 400
      })
      expect(frames).toHaveLength(5)
    })
  })

  describe('focus', () => {
    it('gives the focused slot most of the space and a strip to the rest', () => {
      const frames = computeLayout({ kind: 'focus', focusedIndex: 2 }, ids(4), {
        width: 900,
        height: 500
      })

      expect(frames[2]).toMatchObject({
        frame: { x: 0, y: 0, width: 900, height: 384 },
        zIndex: 1,
        opacity: 1
      })
      expect(frames[0]).toMatchObject({ frame: { x: 0, y: 400, width: 300, height: 100 }, opacity: 0.8 })
      expect(frames[1].frame.x).toBe(300)
      expect(frames[3].frame.x).toBe(600)
    })

    it('hides the other slots when secondary streams are off', () => {
      const frames = computeLayout({ kind: 'focus', focusedIndex: 1, showSecondary: false }, ids(3), {
        width: 900,
        height: 500
      })

      expect(frames[1].frame).toEqual({ x: 0, y: 0, width: 900, height: 500 })
      expect(frames[0]).toEqual({
        slotId: 'slot-0',
        frame: { x: 0, y: 0, width: 0, height: 0 },
        zIndex: 0,
        opacity: 0,
        scale: 1,
        visible: false
      })
    })

    it('falls back to the first slot for an out of range focus index', () => {
      const frames = computeLayout({ kind: 'focus', focusedIndex: 9 }, ids(2), {
        width: 900,
        height: 500
      })
      expect(frames[0].zIndex).toBe(1)
    })
  })
})

describe('layoutCapacity and defaultSlotCount', () => {
  it('reports the capacity of every variant', () => {
    expect(layoutCapacity({ kind: 'grid', columns: 2 })).toBe(16)
    expect(layoutCapacity({ kind: 'pip' })).toBe(4)
    expect(layoutCapacity({ kind: 'mosaic', pattern: 'balanced' })).toBe(16)
    expect(layoutCapacity({ kind: 'mosaic', pattern: 'pyramid' })).toBe(5)
    expect(layoutCapacity({ kind: 'bento', template: 'dashboard' })).toBe(9)
    expect(layoutCapacity({ kind: 'focus' })).toBe(16)
  })

  it('creates the expected number of slots per layout', () => {
    expect(defaultSlotCount({ kind: 'grid', columns: 3 }, 2)).toBe(9)
    expect(defaultSlotCount({ kind: 'pip' }, 9)).toBe(4)
    expect(defaultSlotCount({ kind: 'mosaic', pattern: 'asymmetric' }, 9)).toBe(4)
    expect(defaultSlotCount({ kind: 'bento', template: 'magazine' }, 1)).toBe(8)
    expect(defaultSlotCount({ kind: 'focus' }, 6)).toBe(6)
    expect(defaultSlotCount({ kind: 'focus' }, 0)).toBe(1)
  })
})

describe('framesOverlap', () => {
  it('does not treat touching edges as overlap', () => {
    const a = { x: 0, y: 0, width: 10, height: 10 }
    expect(framesOverlap(a, { x: 10, y: 0, width: 10, height: 10 })).toBe(false)
    expect(framesOverlap(a, { x: 9, y: 9, width: 10, height: 10 })).toBe(true)
  })
})

describe('describeVariant and variantFromKey', () => {
  it('round-trips every preset', () => {
    for (const preset of [...LAYOUT_PRESETS, ...BENTO_PRESETS]) {
      expect(variantFromKey(preset.key)).toEqual(preset.variant)
    }
  })

  it('describes variants with defaults filled in', () => {
    expect(describeVariant({ kind: 'pip' })).toBe('pip-bottomTrailing-medium')
    expect(describeVariant({ kind: 'focus' })).toBe('focus-0')
  })

  it('rejects unknown keys', () => {
    expect(variantFromKey('grid-9')).toBeNull()
    expect(variantFromKey('bento-unknown')).toBeNull()
    expect(variantFromKey('spiral')).toBeNull()
  })
})
