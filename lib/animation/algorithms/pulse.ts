/**
 * Ring that swells from the centre and contracts again over one cycle.
 *
 * The radius follows half a sine period, so the first frame has no ring and
 * shows only the centre dot.
 */

import { createEmptyFlat } from '../../matrix/mapper.js'
import { CENTER_X, CENTER_Y } from '../../matrix/shape.js'
import type { FlatBuffer } from '../../matrix/types.js'
import { buildFrames } from '../frames.js'
import { drawCircle, drawDot } from '../raster.js'

export function pulseRadius(frameIndex: number, frameCount: number, maxRadius: number): number {
  const progress = frameIndex / frameCount
  return Math.round(Math.sin(progress * Math.PI) * maxRadius)
}

export function pulseFrame(
  frameIndex: number,
  frameCount: number,
  maxRadius: number = 10,
  brightness: number = 255,
): FlatBuffer {
  const grid = createEmptyFlat()
  const radius = pulseRadius(frameIndex, frameCount, maxRadius)
  if (radius > 0) {
    drawCircle(grid, CENTER_X, CENTER_Y, radius, brightness)
  }
  drawDot(grid, CENTER_X, CENTER_Y, 1, brightness)
  return grid
}

export function pulseFrames(
  frameCount: number,
  maxRadius: number = 10,
  brightness: number = 255,
): FlatBuffer[] {
  return buildFrames(frameCount, (i, n) => pulseFrame(i, n, maxRadius, brightness))
}
