/**
 * Horizontal sine wave with optional thickness, tuned for audio themes.
 *
 * Thicker waves fade toward their edges: the centre line keeps full
 * brightness and the outermost offset drops to 60%.
 */

import { clampBrightness, createEmptyFlat } from '../../matrix/mapper.js'
import { CENTER_Y, MATRIX_COLUMNS, MATRIX_ROWS } from '../../matrix/shape.js'
import type { FlatBuffer } from '../../matrix/types.js'
import { buildFrames, phaseOffset } from '../frames.js'

function clampInt(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value))
}

/**
 * Draw one frame of the wave into `buf`.
 *
 * Amplitude is clamped to [1, 8] and thickness to [1, 3]. `wavelength` is
 * the number of half sine cycles across the 25 columns.
 */
export function drawHorizontalWave(
  buf: number[],
  frameIndex: number = 0,
  frameCount: number = 1,
  amplitude: number = 5,
  brightness: number = 255,
  wavelength: number = 2.0,
  thickness: number = 1,
): void {
  const value = clampBrightness(brightness)
  const amp = clampInt(amplitude, 1, 8)
  const half = Math.trunc(clampInt(thickness, 1, 3) / 2)
  const phase = phaseOffset(frameIndex, frameCount)

  for (let x = 0; x < MATRIX_COLUMNS; x++) {
    const waveY =
      CENTER_Y +
      Math.round(Math.sin((x * wavelength * Math.PI) / MATRIX_COLUMNS + phase) * amp)

    // Ascending offsets: where two offsets share a cell the later one wins.
    for (let offset = -half; offset <= half; offset++) {
      const y = waveY + offset
      if (y < 0 || y >= MATRIX_ROWS) continue
      const falloff = (Math.abs(offset) / Math.max(half, 1)) * 0.4
      buf[y * MATRIX_COLUMNS + x] = Math.trunc(value * (1 - falloff))
    }
  }
}

export function horizontalWaveFrame(
  frameIndex: number,
  frameCount: number,
  amplitude: number = 5,
  brightness: number = 255,
  wavelength: number = 2.0,
  thickness: number = 1,
): FlatBuffer {
  const grid = createEmptyFlat()
  drawHorizontalWave(grid, frameIndex, frameCount, amplitude, brightness, wavelength, thickness)
  return grid
}

export function horizontalWaveFrames(
  frameCount: number,
  amplitude: number = 5,
  brightness: number = 255,
  wavelength: number = 2.0,
): FlatBuffer[] {
  return buildFrames(frameCount, (i, n) =>
    horizontalWaveFrame(i, n, amplitude, brightness, wavelength),
  )
}
