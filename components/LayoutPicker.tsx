'use client'

import type { FC } from 'react'
import { useI18n } from '@components/i18n'
import {
  BENTO_PRESETS,
  LAYOUT_PRESETS,
  type LayoutPreset,
  type LayoutVariant
} from '@lib/layout/layout-engine'

interface LayoutPickerProps {
  currentKey: string
  onSelect: (variant: LayoutVariant) => void
}

const PresetList: FC<{
  title: string
  presets: LayoutPreset[]
  currentKey: string
  onSelect: (variant: LayoutVariant) => void
}> = ({ title, presets, currentKey, onSelect }) => (
  <section>
    <h3 className="text-xs font-semibold uppercase text-gray-400 mb-2">{title}</h3>
    <div className="grid grid-cols-2 sm:grid-cols-3 gap-2">
      {presets.map((preset) => {
        const isCurrent = preset.key === currentKey
        return (
          <button
            key={preset.key}
            type="button"
            aria-pressed={isCurrent}
            onClick={() => onSelect(preset.variant)}
            className={`px-3 py-2 rounded text-sm border transition text-left ${
              isCurrent
                ? 'bg-gray-800 border-blue-500 text-white'
                : 'bg-gray-950/50 border-gray-800 text-gray-300 hover:bg-gray-800/60'
            }`}
          >
            {preset.label}
          </button>
        )
      })}
    </div>
  </section>
)

export const LayoutPicker: FC<LayoutPickerProps> = ({ currentKey, onSelect }) => {
  const { t } = useI18n()

  return (
    <div className="space-y-4">
      <PresetList
        title={t('layout.presets')}
        presets={LAYOUT_PRESETS}
        currentKey={currentKey}
        onSelect={onSelect}
      />
      <PresetList
        title={t('layout.bento')}
        presets={BENTO_PRESETS}
        currentKey={currentKey}
        onSelect={onSelect}
      />
    </div>
  )
}
