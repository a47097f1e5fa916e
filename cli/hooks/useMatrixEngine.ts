/**
 * React hook managing the AnimationEngine lifecycle.
 *
 * Creates one engine per mount with a driver that feeds React state, then
 * either loops a single slot or hands a playlist to a PlaylistTrigger.
 * The consumer re-renders on every frame the engine pushes.
 */

import { useCallback, useEffect, useRef, useState } from 'react'

import { AnimationEngine } from '../../lib/animation/engine.js'
import { PlaylistTrigger } from '../../lib/animation/triggers.js'
import type { AnimationSlot } from '../../lib/animation/types.js'
import { assertDisplayFrame } from '../../lib/display/driver.js'
import { createEmptyFlat } from '../../lib/matrix/mapper.js'

export interface UseMatrixEngineOptions {
  /** Slots to play. One slot loops forever; several run as a playlist. */
  slots: AnimationSlot[]
  fps: number
}

export interface UseMatrixEngineResult {
  frame: readonly number[]
  label: string | undefined
  fps: number
  paused: boolean
  togglePause: () => void
  changeFps: (delta: number) => void
}

export function useMatrixEngine({ slots, fps }: UseMatrixEngineOptions): UseMatrixEngineResult {
  const engineRef = useRef<AnimationEngine | null>(null)
  const [frame, setFrame] = useState<readonly number[]>(createEmptyFlat)
  const [label, setLabel] = useState<string | undefined>(undefined)
  const [currentFps, setCurrentFps] = useState(fps)
  const [paused, setPaused] = useState(false)

  // Lazy engine creation (persists across re-renders, torn down on unmount).
  if (engineRef.current === null) {
    engineRef.current = new AnimationEngine({ fps })
  }
  const engine = engineRef.current

  useEffect(() => {
    engine.attachDriver({
      setMatrixFrame: (next) => {
        assertDisplayFrame(next)
        setFrame([...next])
        setLabel(engine.currentLabel)
      },
    })

    let trigger: PlaylistTrigger | null = null
    if (slots.length === 1) {
      engine.play(slots[0])
      engine.setLooping(true)
    } else if (slots.length > 1) {
      trigger = new PlaylistTrigger(slots)
      trigger.start(engine)
    }
    engine.start()

    return () => {
      trigger?.stop()
      engine.destroy()
      engineRef.current = null
    }
  }, [engine, slots])

  const togglePause = useCallback(() => {
    if (engine.isRunning) engine.stop()
    else engine.start()
    setPaused(!engine.isRunning)
  }, [engine])

  const changeFps = useCallback(
    (delta: number) => {
      engine.setFPS(engine.fps + delta)
      setCurrentFps(engine.fps)
    },
    [engine],
  )

  return { frame, label, fps: currentFps, paused, togglePause, changeFps }
}
