import { describe, expect, it } from 'vitest'
import { render, screen } from '@testing-library/react'
import { describeVariant } from '@lib/layout/layout-engine'
import { SNAPSHOT_KEY } from '@lib/multistream/session'
import { SessionProvider, useLayout, useSlots } from './SessionProvider'

const SessionSummary = () => {
  const layout = useLayout((state) => describeVariant(state.variant))
  const slots = useSlots((state) => state.slots)
  const streams = slots.flatMap((slot, index) => (slot.stream ? [`${index}:${slot.stream.id}`] : []))
  return (
    <p>
      {layout} {streams.join(',')}
    </p>
  )
}

describe('SessionProvider', () => {
  it('restores the saved session from local storage on mount', () => {
    window.localStorage.setItem(
      `streamyyy_${SNAPSHOT_KEY}`,
      JSON.stringify({
        layout: 'grid-3',
        slotCount: 9,
        audioMode: 'all',
        streams: [{ position: 4, url: 'https://kick.com/xqc', title: 'xqc' }]
      })
    )

    render(
      <SessionProvider fallback={<p>Loading</p>}>
        <SessionSummary />
      </SessionProvider>
    )

    expect(screen.getByText('grid-3 4:kick:xqc')).toBeInTheDocument()
  })

  it('starts from the default layout without a saved session', () => {
    render(
      <SessionProvider>
        <SessionSummary />
      </SessionProvider>
    )

    expect(screen.getByText('grid-2')).toBeInTheDocument()
  })
})
