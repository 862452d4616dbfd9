'use client'

import type { FC, FormEvent } from 'react'
import { useId, useState } from 'react'
import { Plus } from 'lucide-react'
import { useI18n } from '@components/i18n'
import { toUserMessage } from '@lib/errors'
import { createLogger } from '@lib/logger'
import { Button } from '@ui/button'

interface URLInputProps {
  // Throws when the link is rejected; the message is shown under the field.
  onAdd: (url: string) => void
}

const logger = createLogger('url-input')

export const URLInput: FC<URLInputProps> = ({ onAdd }) => {
  const { t } = useI18n()
  const inputId = useId()
  const [value, setValue] = useState('')
  const [error, setError] = useState('')

  const handleSubmit = (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault()
    setError('')

    try {
      onAdd(value)
      setValue('')
    } catch (err) {
      logger.debug('rejected stream link', err)
      setError(toUserMessage(err))
    }
  }

  return (
    <form onSubmit={handleSubmit} className="relative flex items-center gap-2 min-w-0 flex-1 max-w-xl">
      <label htmlFor={inputId} className="sr-only">
        {t('input.label')}
      </label>
      <input
        id={inputId}
        type="text"
        value={value}
        onChange={(event) => {
          setValue(event.target.value)
          if (error) setError('')
        }}
        placeholder={t('input.placeholder')}
        aria-invalid={error ? true : undefined}
        className="w-full min-w-0 bg-gray-900 border border-gray-700 rounded px-3 py-1.5 text-sm text-white placeholder:text-gray-500 focus:outline-none focus:border-blue-500"
      />
      <Button
        type="submit"
        size="icon"
        variant="ghost"
        aria-label={t('input.add')}
        title={t('input.add')}
        className="shrink-0 bg-gray-900 border border-gray-700 text-gray-100 hover:bg-gray-800 hover:text-gray-100"
      >
        <Plus className="size-4" />
      </Button>
      {error && (
        <p
          role="alert"
          className="absolute left-0 top-full mt-1 z-20 text-xs text-red-300 bg-red-950/90 border border-red-800 rounded px-2 py-1"
        >
          {error}
        </p>
      )}
    </form>
  )
}
