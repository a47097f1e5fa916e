/**
 * Frame sequence construction.
 *
 * Each frame is built by its own renderer call, never derived from the
 * previous one, so sequences are restartable and frames can be computed in
 * any order or in parallel.
 */

import type { FlatBuffer } from '../matrix/types.js'
import type { FrameRenderer } from './types.js'

/** Render frames [0, frameCount). A count below 1 yields an empty sequence. */
export function buildFrames(frameCount: number, render: FrameRenderer): FlatBuffer[] {
  const frames: FlatBuffer[] = []
  for (let i = 0; i < frameCount; i++) {
    frames.push(render(i, frameCount))
  }
  return frames
}

/** Angular phase of a periodic animation; 0 for single-frame sequences. */
export function phaseOffset(frameIndex: number, frameCount: number): number {
  return frameCount > 1 ? (frameIndex * 2 * Math.PI) / frameCount : 0
}
