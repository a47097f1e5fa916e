/**
 * Brightness model shared by the display output and the terminal preview.
 *
 * Theme brightness (0-255, 255 = 100%) scales every lit pixel before it
 * reaches the driver. The preview maps the same final value to an opacity
 * with a visible floor, since the hardware never shows a lit pixel dimmer
 * than about half intensity.
 */

import { clampBrightness } from './mapper.js'
import { MATRIX_COLUMNS, isInShape } from './shape.js'
import type { FlatBuffer } from './types.js'

const MIN_VISIBLE_ALPHA = 0.5

function clampUnit(value: number): number {
  return Math.min(1, Math.max(0, value))
}

/** Final pixel value sent to the hardware for a given theme brightness. */
export function calculateFinalBrightness(pixelValue: number, themeBrightness: number): number {
  if (pixelValue === 0) return 0
  return clampBrightness(pixelValue * (themeBrightness / 255))
}

/** Preview opacity in [0, 1] matching the hardware's response curve. */
export function calculatePreviewAlpha(pixelValue: number, themeBrightness: number): number {
  if (pixelValue === 0) return 0
  const normalized = calculateFinalBrightness(pixelValue, themeBrightness) / 255
  return clampUnit(MIN_VISIBLE_ALPHA + Math.sqrt(normalized) * (1 - MIN_VISIBLE_ALPHA))
}

/** 0.1x-1.0x settings multiplier to a 0-255 brightness. */
export function multiplierToBrightness(multiplier: number): number {
  return clampBrightness(multiplier * 255)
}

export function brightnessToMultiplier(brightness: number): number {
  return clampUnit(brightness / 255)
}

/**
 * Display-ready copy of a frame: theme brightness applied to every real
 * pixel, corner cells outside the lens forced to 0.
 *
 * Generators draw over the whole 25x25 rectangle, so this is where frames
 * are cut to the physical shape before the driver or an export sees them.
 */
export function applyThemeBrightness(
  frame: readonly number[],
  themeBrightness: number,
): FlatBuffer {
  return frame.map((value, i) =>
    isInShape(i % MATRIX_COLUMNS, Math.floor(i / MATRIX_COLUMNS))
      ? calculateFinalBrightness(value, themeBrightness)
      : 0,
  )
}
