/**
 * A line spinning around the centre like a clock hand.
 *
 * Frame f points at f * 360 / frameCount degrees, measured from the +x axis
 * with y growing downward, so a quarter turn points straight down. A
 * radius-1 dot is drawn over the hub after the line.
 */

import { createEmptyFlat } from '../../matrix/mapper.js'
import { CENTER_X, CENTER_Y } from '../../matrix/shape.js'
import type { FlatBuffer } from '../../matrix/types.js'
import { buildFrames } from '../frames.js'
import { drawDot, drawLine, toRadians } from '../raster.js'

/** Endpoint of the hand for a given frame. */
export function rotatingLineEndpoint(
  frameIndex: number,
  frameCount: number,
  lineLength: number,
): [number, number] {
  const rad = toRadians((frameIndex * 360) / frameCount)
  return [
    CENTER_X + Math.round(Math.cos(rad) * lineLength),
    CENTER_Y + Math.round(Math.sin(rad) * lineLength),
  ]
}

export function rotatingLineFrame(
  frameIndex: number,
  frameCount: number,
  lineLength: number = 8,
  brightness: number = 255,
): FlatBuffer {
  const grid = createEmptyFlat()
  const [endX, endY] = rotatingLineEndpoint(frameIndex, frameCount, lineLength)
  drawLine(grid, CENTER_X, CENTER_Y, endX, endY, brightness)
  drawDot(grid, CENTER_X, CENTER_Y, 1, brightness)
  return grid
}

export function rotatingLineFrames(
  frameCount: number,
  lineLength: number = 8,
  brightness: number = 255,
): FlatBuffer[] {
  return buildFrames(frameCount, (i, n) => rotatingLineFrame(i, n, lineLength, brightness))
}
