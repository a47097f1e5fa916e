/**
 * Single-pixel sine wave scrolling across the columns.
 */

import { clampBrightness, createEmptyFlat } from '../../matrix/mapper.js'
import { CENTER_Y, MATRIX_COLUMNS, MATRIX_ROWS } from '../../matrix/shape.js'
import type { FlatBuffer } from '../../matrix/types.js'
import { buildFrames } from '../frames.js'

export function waveFrame(
  frameIndex: number,
  frameCount: number,
  amplitude: number = 5,
  brightness: number = 255,
): FlatBuffer {
  const grid = createEmptyFlat()
  const value = clampBrightness(brightness)
  const phase = (frameIndex * 2 * Math.PI) / frameCount

  for (let x = 0; x < MATRIX_COLUMNS; x++) {
    const y = CENTER_Y + Math.round(Math.sin(x * 0.5 + phase) * amplitude)
    if (y >= 0 && y < MATRIX_ROWS) {
      grid[y * MATRIX_COLUMNS + x] = value
    }
  }
  return grid
}

export function waveFrames(
  frameCount: number,
  amplitude: number = 5,
  brightness: number = 255,
): FlatBuffer[] {
  return buildFrames(frameCount, (i, n) => waveFrame(i, n, amplitude, brightness))
}
