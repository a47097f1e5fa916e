/**
 * Three stacked sine bands driven by bass, mid and treble levels.
 *
 * Treble rides high (row 6) with a fast, shallow wave; bass sits low
 * (row 18) with a slow, deep one. Bands below the 0.05 noise floor are not
 * drawn. Bass is drawn first and treble last, so higher bands cover lower
 * ones where they cross.
 */

import { clampBrightness, createEmptyFlat } from '../../matrix/mapper.js'
import { MATRIX_COLUMNS, MATRIX_ROWS } from '../../matrix/shape.js'
import type { FlatBuffer } from '../../matrix/types.js'
import { buildFrames, phaseOffset } from '../frames.js'
import type { LevelSource } from '../types.js'

const NOISE_FLOOR = 0.05

interface Band {
  baseline: number
  /** Level-to-amplitude gain; also the amplitude cap. */
  gain: number
  brightnessScale: number
  /** Half sine cycles across the 25 columns. */
  frequency: number
}

const BASS: Band = { baseline: 18, gain: 6, brightnessScale: 0.9, frequency: 0.8 }
const MID: Band = { baseline: 12, gain: 4, brightnessScale: 0.8, frequency: 1.5 }
const TREBLE: Band = { baseline: 6, gain: 3, brightnessScale: 0.7, frequency: 2.5 }

function drawBand(
  buf: number[],
  band: Band,
  level: number,
  phase: number,
  maxBrightness: number,
): void {
  if (level <= NOISE_FLOOR) return

  const amplitude = Math.min(band.gain, Math.max(1, Math.round(level * band.gain)))
  const value = clampBrightness(maxBrightness * level * band.brightnessScale)

  for (let x = 0; x < MATRIX_COLUMNS; x++) {
    const y =
      band.baseline +
      Math.round(Math.sin((x * band.frequency * Math.PI) / MATRIX_COLUMNS + phase) * amplitude)
    if (y >= 0 && y < MATRIX_ROWS) {
      buf[y * MATRIX_COLUMNS + x] = value
    }
  }
}

export function drawAudioSpectrumWaves(
  buf: number[],
  bassLevel: number,
  midLevel: number,
  trebleLevel: number,
  frameIndex: number = 0,
  frameCount: number = 1,
  maxBrightness: number = 255,
): void {
  const phase = phaseOffset(frameIndex, frameCount)
  drawBand(buf, BASS, bassLevel, phase, maxBrightness)
  drawBand(buf, MID, midLevel, phase, maxBrightness)
  drawBand(buf, TREBLE, trebleLevel, phase, maxBrightness)
}

export function audioSpectrumFrame(
  frameIndex: number,
  frameCount: number,
  levels: LevelSource,
  maxBrightness: number = 255,
): FlatBuffer {
  const grid = createEmptyFlat()
  const { bass, mid, treble } = levels(frameIndex)
  drawAudioSpectrumWaves(grid, bass, mid, treble, frameIndex, frameCount, maxBrightness)
  return grid
}

export function audioSpectrumFrames(
  frameCount: number,
  levels: LevelSource,
  maxBrightness: number = 255,
): FlatBuffer[] {
  return buildFrames(frameCount, (i, n) => audioSpectrumFrame(i, n, levels, maxBrightness))
}
