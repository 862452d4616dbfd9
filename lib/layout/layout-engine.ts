import { z } from 'zod'
import bentoTemplateData from '@data/bento-templates.json'

export interface Frame {
  x: number
  y: number
  width: number
  height: number
}

export interface ContainerSize {
  width: number
  height: number
}

export interface SlotFrame {
  slotId: string
  frame: Frame
  zIndex: number
  opacity: number
  scale: number
  visible: boolean
}

export type PipPosition = 'topLeading' | 'topTrailing' | 'bottomLeading' | 'bottomTrailing' | 'center'
export type InsetSize = 'small' | 'medium' | 'large'
export type MosaicPattern = 'balanced' | 'asymmetric' | 'pyramid'

const BENTO_TEMPLATE_NAMES = ['twoByTwo', 'featured', 'sidebar', 'magazine', 'dashboard'] as const
export type BentoTemplateName = (typeof BENTO_TEMPLATE_NAMES)[number]

export type LayoutVariant =
  | { kind: 'grid'; columns: number; spacing?: number }
  | { kind: 'pip'; position?: PipPosition; size?: InsetSize; mainIndex?: number }
  | { kind: 'mosaic'; pattern: MosaicPattern }
  | { kind: 'bento'; template: BentoTemplateName }
  | { kind: 'focus'; focusedIndex?: number; showSecondary?: boolean; secondarySize?: InsetSize }

export type LayoutKind = LayoutVariant['kind']

const bentoCellSchema = z.object({
  x: z.number().int().min(0),
  y: z.number().int().min(0),
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  priority: z.number().int().min(0)
})

const bentoTemplateSchema = z.object({
  name: z.enum(BENTO_TEMPLATE_NAMES),
  label: z.string(),
  columns: z.number().int().positive(),
  rows: z.number().int().positive(),
  cells: z.array(bentoCellSchema).min(1)
})

export type BentoCell = z.infer<typeof bentoCellSchema>
export type BentoTemplate = z.infer<typeof bentoTemplateSchema>

export const bentoTemplates: BentoTemplate[] = z.array(bentoTemplateSchema).parse(bentoTemplateData)

export const MAX_LAYOUT_SLOTS = 16
const DEFAULT_GRID_SPACING = 8
const MOSAIC_SPACING = 4
const PIP_MARGIN = 16
const PIP_STACK_GAP = 8
const FOCUS_GAP = 16
const SECONDARY_OPACITY = 0.8

const INSET_FRACTION: Record<InsetSize, number> = {
  small: 0.2,
  medium: 0.3,
  large: 0.4
}

const findBentoTemplate = (name: BentoTemplateName): BentoTemplate => {
  const template = bentoTemplates.find((candidate) => candidate.name === name)
  if (!template) {
    throw new Error(`Unknown bento template: ${name}`)
  }
  return template
}

export const layoutCapacity = (variant: LayoutVariant): number => {
  switch (variant.kind) {
    case 'grid':
    case 'focus':
      return MAX_LAYOUT_SLOTS
    case 'pip':
      return 4
    case 'mosaic':
      return variant.pattern === 'balanced' ? MAX_LAYOUT_SLOTS : 5
    case 'bento':
      return findBentoTemplate(variant.template).cells.length
  }
}

export const defaultSlotCount = (variant: LayoutVariant, currentCount: number): number => {
  switch (variant.kind) {
    case 'grid': {
      const columns = Math.max(1, Math.floor(variant.columns))
      return Math.min(columns * columns, layoutCapacity(variant))
    }
    case 'pip':
    case 'mosaic':
      return 4
    case 'bento':
      return layoutCapacity(variant)
    case 'focus':
      return Math.min(Math.max(1, currentCount), MAX_LAYOUT_SLOTS)
  }
}

const visibleFrame = (slotId: string, frame: Frame, zIndex = 0, opacity = 1): SlotFrame => ({
  slotId,
  frame,
  zIndex,
  opacity,
  scale: 1,
  visible: true
})

const hiddenFrame = (slotId: string): SlotFrame => ({
  slotId,
  frame: { x: 0, y: 0, width: 0, height: 0 },
  zIndex: 0,
  opacity: 0,
  scale: 1,
  visible: false
})

const fullFrame = (container: ContainerSize): Frame => ({
  x: 0,
  y: 0,
  width: container.width,
  height: container.height
})

const indexOrZero = (index: number | undefined, length: number): number =>
  index !== undefined && Number.isInteger(index) && index >= 0 && index < length ? index : 0

const layoutGrid = (
  slotIds: string[],
  container: ContainerSize,
  columnsInput: number,
  spacingInput: number
): SlotFrame[] => {
  const columns = Math.max(1, Math.floor(columnsInput))
  const spacing = Math.max(0, spacingInput)
  const rows = Math.max(1, Math.ceil(slotIds.length / columns))
  const cellWidth = (container.width - (columns - 1) * spacing) / columns
  const cellHeight = (container.height - (rows - 1) * spacing) / rows

  return slotIds.map((slotId, index) => {
    const column = index % columns
    const row = Math.floor(index / columns)
    return visibleFrame(slotId, {
      x: column * (cellWidth + spacing),
      y: row * (cellHeight + spacing),
      width: cellWidth,
      height: cellHeight
    })
  })
}

const insetOrigin = (
  position: PipPosition,
  container: ContainerSize,
  inset: { width: number; height: number },
  offset: number
): { x: number; y: number } => {
  const right = container.width - inset.width - PIP_MARGIN
  const bottom = container.height - inset.height - PIP_MARGIN
  switch (position) {
    case 'topLeading':
      return { x: PIP_MARGIN, y: PIP_MARGIN + offset }
    case 'topTrailing':
      return { x: right, y: PIP_MARGIN + offset }
    case 'bottomLeading':
      return { x: PIP_MARGIN, y: bottom - offset }
    case 'bottomTrailing':
      return { x: right, y: bottom - offset }
    case 'center':
      return {
        x: (container.width - inset.width) / 2,
        y: (container.height - inset.height) / 2 + offset
      }
  }
}

const layoutPip = (
  slotIds: string[],
  container: ContainerSize,
  variant: Extract<LayoutVariant, { kind: 'pip' }>
): SlotFrame[] => {
  const mainIndex = indexOrZero(variant.mainIndex, slotIds.length)
  const fraction = INSET_FRACTION[variant.size ?? 'medium']
  const inset = {
    width: container.width * fraction,
    height: (container.width * fraction * 9) / 16
  }
  let insetCount = 0

  return slotIds.map((slotId, index) => {
    if (index === mainIndex) return visibleFrame(slotId, fullFrame(container))

    const offset = insetCount * (inset.height + PIP_STACK_GAP)
    insetCount += 1
    const origin = insetOrigin(variant.position ?? 'bottomTrailing', container, inset, offset)
    return visibleFrame(slotId, { ...origin, ...inset }, 10 + index)
  })
}

const layoutMosaic = (
  slotIds: string[],
  container: ContainerSize,
  pattern: MosaicPattern
): SlotFrame[] => {
  if (slotIds.length === 1) return [visibleFrame(slotIds[0], fullFrame(container))]

  if (pattern === 'balanced') return layoutGrid(slotIds, container, 2, MOSAIC_SPACING)

  const others = slotIds.length - 1
  if (pattern === 'asymmetric') {
    const mainWidth = (container.width * 2) / 3
    const sideHeight = container.height / others
    return slotIds.map((slotId, index) =>
      index === 0
        ? visibleFrame(slotId, { x: 0, y: 0, width: mainWidth, height: container.height })
        : visibleFrame(slotId, {
            x: mainWidth,
            y: (index - 1) * sideHeight,
            width: container.width - mainWidth,
            height: sideHeight
          })
    )
  }

  const half = container.height / 2
  const bottomWidth = container.width / others
  return slotIds.map((slotId, index) =>
    index === 0
      ? visibleFrame(slotId, { x: 0, y: 0, width: container.width, height: half })
      : visibleFrame(slotId, {
          x: (index - 1) * bottomWidth,
          y: half,
          width: bottomWidth,
          height: container.height - half
        })
  )
}

const layoutBento = (
  slotIds: string[],
  container: ContainerSize,
  template: BentoTemplate
): SlotFrame[] => {
  const unitWidth = container.width / template.columns
  const unitHeight = container.height / template.rows

  return slotIds.map((slotId, index) => {
    const cell = template.cells[index]
    return visibleFrame(
      slotId,
      {
        x: cell.x * unitWidth,
        y: cell.y * unitHeight,
        width: cell.width * unitWidth,
        height: cell.height * unitHeight
      },
      cell.priority
    )
  })
}

const layoutFocus = (
  slotIds: string[],
  container: ContainerSize,
  variant: Extract<LayoutVariant, { kind: 'focus' }>
): SlotFrame[] => {
  const focusedIndex = indexOrZero(variant.focusedIndex, slotIds.length)
  const showSecondary = variant.showSecondary ?? true

  if (!showSecondary || slotIds.length === 1) {
    return slotIds.map((slotId, index) =>
      index === focusedIndex ? visibleFrame(slotId, fullFrame(container), 1) : hiddenFrame(slotId)
    )
  }

  const stripHeight = container.height * INSET_FRACTION[variant.secondarySize ?? 'small']
  const stripWidth = container.width / (slotIds.length - 1)
  let secondaryCount = 0

  return slotIds.map((slotId, index) => {
    if (index === focusedIndex) {
      return visibleFrame(
        slotId,
        {
          x: 0,
          y: 0,
          width: container.width,
          height: Math.max(0, container.height - stripHeight - FOCUS_GAP)
        },
        1
      )
    }

    const x = secondaryCount * stripWidth
    secondaryCount += 1
    return visibleFrame(
      slotId,
      { x, y: container.height - stripHeight, width: stripWidth, height: stripHeight },
      0,
      SECONDARY_OPACITY
    )
  })
}

/**
 * Places the given slots inside `container` according to `variant`.
 *
 * Output order follows `slotIds`; ids past the variant's capacity get no frame.
 * Non-positive container dimensions are treated as 1.
 */
export const computeLayout = (
  variant: LayoutVariant,
  slotIds: string[],
  container: ContainerSize
): SlotFrame[] => {
  const ids = slotIds.slice(0, layoutCapacity(variant))
  if (ids.length === 0) return []

  const safeContainer: ContainerSize = {
    width: Math.max(1, container.width),
    height: Math.max(1, container.height)
  }

  switch (variant.kind) {
    case 'grid':
      return layoutGrid(ids, safeContainer, variant.columns, variant.spacing ?? DEFAULT_GRID_SPACING)
    case 'pip':
      return layoutPip(ids, safeContainer, variant)
    case 'mosaic':
      return layoutMosaic(ids, safeContainer, variant.pattern)
    case 'bento':
      return layoutBento(ids, safeContainer, findBentoTemplate(variant.template))
    case 'focus':
      return layoutFocus(ids, safeContainer, variant)
  }
}

// Touching edges do not count as overlap.
export const framesOverlap = (a: Frame, b: Frame): boolean =>
  a.x < b.x + b.width && a.x + a.width > b.x && a.y < b.y + b.height && a.y + a.height > b.y

export const hasOverlap = (frames: Frame[]): boolean => {
  for (let i = 0; i < frames.length; i += 1) {
    for (let j = i + 1; j < frames.length; j += 1) {
      if (framesOverlap(frames[i], frames[j])) {
        return true
      }
    }
  }
  return false
}

export const describeVariant = (variant: LayoutVariant): string => {
  switch (variant.kind) {
    case 'grid':
      return `grid-${Math.max(1, Math.floor(variant.columns))}`
    case 'pip':
      return `pip-${variant.position ?? 'bottomTrailing'}-${variant.size ?? 'medium'}`
    case 'mosaic':
      return `mosaic-${variant.pattern}`
    case 'bento':
      return `bento-${variant.template}`
    case 'focus':
      return `focus-${variant.focusedIndex ?? 0}`
  }
}

const PIP_POSITIONS: readonly PipPosition[] = [
  'topLeading',
  'topTrailing',
  'bottomLeading',
  'bottomTrailing',
  'center'
]
const INSET_SIZES: readonly InsetSize[] = ['small', 'medium', 'large']
const MOSAIC_PATTERNS: readonly MosaicPattern[] = ['balanced', 'asymmetric', 'pyramid']

const pick = <T extends string>(options: readonly T[], value: string | undefined): T | undefined =>
  options.find((option) => option === value)

/** Inverse of `describeVariant`; `null` for keys it never produces. */
export const variantFromKey = (key: string): LayoutVariant | null => {
  const [kind, first, second] = key.split('-')

  if (kind === 'grid') {
    const columns = Number(first)
    return Number.isInteger(columns) && columns >= 1 && columns <= 4 && !second
      ? { kind: 'grid', columns }
      : null
  }
  if (kind === 'pip') {
    const position = pick(PIP_POSITIONS, first)
    const size = pick(INSET_SIZES, second)
    return position && size ? { kind: 'pip', position, size } : null
  }
  if (kind === 'mosaic') {
    const pattern = pick(MOSAIC_PATTERNS, first)
    return pattern && !second ? { kind: 'mosaic', pattern } : null
  }
  if (kind === 'bento') {
    const template = pick(BENTO_TEMPLATE_NAMES, first)
    return template && !second ? { kind: 'bento', template } : null
  }
  if (kind === 'focus') {
    const focusedIndex = Number(first)
    return Number.isInteger(focusedIndex) && focusedIndex >= 0 && !second
      ? { kind: 'focus', focusedIndex }
      : null
  }
  return null
}

export interface LayoutPreset {
  key: string
  kind: LayoutKind
  label: string
  variant: LayoutVariant
}

const preset = (label: string, variant: LayoutVariant): LayoutPreset => ({
  key: describeVariant(variant),
  kind: variant.kind,
  label,
  variant
})

export const LAYOUT_PRESETS: LayoutPreset[] = [
  preset('1×1', { kind: 'grid', columns: 1 }),
  preset('2×2', { kind: 'grid', columns: 2 }),
  preset('3×3', { kind: 'grid', columns: 3 }),
  preset('4×4', { kind: 'grid', columns: 4 }),
  preset('PiP ↘', { kind: 'pip', position: 'bottomTrailing', size: 'medium' }),
  preset('PiP ↗', { kind: 'pip', position: 'topTrailing', size: 'medium' }),
  preset('Balanced', { kind: 'mosaic', pattern: 'balanced' }),
  preset('Asymmetric', { kind: 'mosaic', pattern: 'asymmetric' }),
  preset('Pyramid', { kind: 'mosaic', pattern: 'pyramid' }),
  preset('Focus', { kind: 'focus', focusedIndex: 0 })
]

export const BENTO_PRESETS: LayoutPreset[] = bentoTemplates.map((template) =>
  preset(template.label, { kind: 'bento', template: template.name })
)
