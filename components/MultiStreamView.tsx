'use client'

import { useEffect, useMemo, useRef } from 'react'
import type { FC } from 'react'
import { SlotView } from '@components/SlotView'
import { useLayout, useSession, useSlots } from '@components/SessionProvider'

export const MultiStreamView: FC = () => {
  const session = useSession()
  const containerRef = useRef<HTMLDivElement | null>(null)
  const slots = useSlots((state) => state.slots)
  const variant = useLayout((state) => state.variant)
  const container = useLayout((state) => state.container)

  useEffect(() => {
    const node = containerRef.current
    if (!node) return

    const updateSize = () => {
      session.setContainerSize({
        width: Math.max(1, node.clientWidth),
        height: Math.max(1, node.clientHeight)
      })
    }

    updateSize()
    const observer = new ResizeObserver(updateSize)
    observer.observe(node)
    return () => observer.disconnect()
  }, [session])

  // The store values are read again inside frames(); they are listed to recompute on change.
  const frames = useMemo(() => session.frames(), [session, variant, slots, container])

  return (
    <div ref={containerRef} className="relative w-full h-full overflow-hidden">
      {frames.map(({ slotId, frame, zIndex, opacity, scale, visible }) => {
        const index = slots.findIndex((slot) => slot.id === slotId)
        const slot = slots[index]
        if (!slot) return null
        return (
          <div
            key={slotId}
            className="absolute p-1 transition-all duration-300 ease-out"
            style={{
              left: frame.x,
              top: frame.y,
              width: frame.width,
              height: frame.height,
              zIndex,
              opacity,
              transform: scale === 1 ? undefined : `scale(${scale})`,
              visibility: visible ? 'visible' : 'hidden'
            }}
          >
            <SlotView slot={slot} index={index} />
          </div>
        )
      })}
    </div>
  )
}
