'use client'

import { useState } from 'react'
import type { FC } from 'react'
import { Plus, Trash2 } from 'lucide-react'
import { useI18n } from '@components/i18n'
import { useLibrary, useServices } from '@components/SessionProvider'
import { toUserMessage } from '@lib/errors'
import type { LibraryEntry } from '@lib/library/stream-library'
import { platformLabel } from '@lib/streams/platform'
import { Button } from '@ui/button'
import { Dialog, DialogContent, DialogHeader, DialogTitle } from '@ui/dialog'

interface LibraryDialogProps {
  open: boolean
  onOpenChange: (open: boolean) => void
  onAdd: (url: string) => void
}

const EntryRow: FC<{
  entry: LibraryEntry
  addLabel: string
  onAdd: () => void
  removeLabel?: string
  onRemove?: () => void
}> = ({ entry, addLabel, onAdd, removeLabel, onRemove }) => (
  <li className="flex items-center gap-2 rounded border border-gray-800 bg-gray-950 px-2 py-1.5">
    <span className="text-[10px] font-semibold uppercase text-gray-500 w-14 shrink-0">
      {platformLabel(entry.platform)}
    </span>
    <span className="text-sm text-gray-100 truncate flex-1" title={entry.url}>
      {entry.title}
    </span>
    <Button variant="ghost" size="icon" className="size-7" aria-label={addLabel} onClick={onAdd}>
      <Plus className="size-4" />
    </Button>
    {onRemove && (
      <Button variant="ghost" size="icon" className="size-7" aria-label={removeLabel} onClick={onRemove}>
        <Trash2 className="size-4" />
      </Button>
    )}
  </li>
)

export const LibraryDialog: FC<LibraryDialogProps> = ({ open, onOpenChange, onAdd }) => {
  const { t } = useI18n()
  const { library } = useServices()
  const favorites = useLibrary((state) => state.favorites)
  const recent = useLibrary((state) => state.recent)
  const [error, setError] = useState<string | null>(null)

  const add = (entry: LibraryEntry): void => {
    try {
      onAdd(entry.url)
      setError(null)
      onOpenChange(false)
    } catch (err) {
      setError(toUserMessage(err))
    }
  }

  return (
    <Dialog
      open={open}
      onOpenChange={(next) => {
        if (!next) setError(null)
        onOpenChange(next)
      }}
    >
      <DialogContent closeLabel={t('common.close')} className="max-w-md">
        <DialogHeader>
          <DialogTitle>{t('library.title')}</DialogTitle>
        </DialogHeader>

        {error && (
          <p role="alert" className="text-sm text-red-400">
            {error}
          </p>
        )}

        <section className="space-y-2">
          <h3 className="text-xs font-semibold uppercase text-gray-400">{t('library.favorites')}</h3>
          {favorites.length === 0 ? (
            <p className="text-sm text-gray-500">{t('library.noFavorites')}</p>
          ) : (
            <ul className="space-y-1">
              {favorites.map((entry) => (
                <EntryRow
                  key={entry.streamId}
                  entry={entry}
                  addLabel={t('library.add', { title: entry.title })}
                  onAdd={() => add(entry)}
                  removeLabel={t('library.removeFavorite', { title: entry.title })}
                  onRemove={() => library.getState().removeFavorite(entry.streamId)}
                />
              ))}
            </ul>
          )}
        </section>

        <section className="space-y-2">
          <div className="flex items-center justify-between">
            <h3 className="text-xs font-semibold uppercase text-gray-400">{t('library.recent')}</h3>
            {recent.length > 0 && (
              <Button variant="link" size="sm" onClick={() => library.getState().clearRecent()}>
                {t('library.clearRecent')}
              </Button>
            )}
          </div>
          {recent.length === 0 ? (
            <p className="text-sm text-gray-500">{t('library.noRecent')}</p>
          ) : (
            <ul className="space-y-1">
              {recent.map((entry) => (
                <EntryRow
                  key={entry.streamId}
                  entry={entry}
                  addLabel={t('library.add', { title: entry.title })}
                  onAdd={() => add(entry)}
                />
              ))}
            </ul>
          )}
        </section>
      </DialogContent>
    </Dialog>
  )
}
