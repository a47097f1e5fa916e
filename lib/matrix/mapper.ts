/**
 * Conversions between the shaped and flat pixel representations.
 *
 * A shaped grid only stores the real pixels of each row. The display driver
 * takes a flat 25x25 buffer instead, with every row centred and the corner
 * cells left at 0. Also covers the comma-separated text interchange format.
 *
 * No side effects on import.
 */

import { ParseError, ShapeMismatchError, SizeMismatchError } from './errors.js'
import {
  FLAT_BUFFER_SIZE,
  MATRIX_COLUMNS,
  MATRIX_ROWS,
  ROW_OFFSETS,
  ROW_WIDTHS,
} from './shape.js'
import type { FlatBuffer, ShapedGrid } from './types.js'

export { getRowOffset, getRowWidth } from './shape.js'

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

export function createEmptyShaped(): ShapedGrid {
  return ROW_WIDTHS.map((width) => new Array<number>(width).fill(0))
}

export function createEmptyFlat(): FlatBuffer {
  return new Array<number>(FLAT_BUFFER_SIZE).fill(0)
}

// ---------------------------------------------------------------------------
// Brightness
// ---------------------------------------------------------------------------

/**
 * Clamp a brightness into [0, 255].
 *
 * Fractions are truncated toward zero and NaN maps to 0, so the result is
 * always a writable cell value.
 */
export function clampBrightness(value: number): number {
  if (Number.isNaN(value)) return 0
  return Math.min(255, Math.max(0, Math.trunc(value)))
}

// ---------------------------------------------------------------------------
// Shaped <-> flat
// ---------------------------------------------------------------------------

export function shapedToFlat(shapedGrid: readonly (readonly number[])[]): FlatBuffer {
  if (shapedGrid.length !== MATRIX_ROWS) {
    throw new ShapeMismatchError(
      `Shaped grid must have exactly ${MATRIX_ROWS} rows, got ${shapedGrid.length}`,
    )
  }
  // Validate every row before allocating so a bad grid writes nothing.
  for (let row = 0; row < MATRIX_ROWS; row++) {
    const expected = ROW_WIDTHS[row]
    const actual = shapedGrid[row].length
    if (actual !== expected) {
      throw new ShapeMismatchError(
        `Row ${row} should have ${expected} pixels, got ${actual}`,
      )
    }
  }

  const flat = createEmptyFlat()
  for (let row = 0; row < MATRIX_ROWS; row++) {
    const base = row * MATRIX_COLUMNS + ROW_OFFSETS[row]
    const rowData = shapedGrid[row]
    for (let col = 0; col < rowData.length; col++) {
      flat[base + col] = rowData[col]
    }
  }
  return flat
}

export function flatToShaped(flat: readonly number[]): ShapedGrid {
  assertFlatSize(flat)
  return ROW_WIDTHS.map((width, row) => {
    const start = row * MATRIX_COLUMNS + ROW_OFFSETS[row]
    return flat.slice(start, start + width)
  })
}

/** Throws SizeMismatchError unless `flat` has exactly 625 cells. */
export function assertFlatSize(flat: readonly number[]): void {
  if (flat.length !== FLAT_BUFFER_SIZE) {
    throw new SizeMismatchError(FLAT_BUFFER_SIZE, flat.length)
  }
}

// ---------------------------------------------------------------------------
// Text interchange
// ---------------------------------------------------------------------------

const INTEGER_TOKEN = /^[+-]?\d+$/

/**
 * Parse 625 comma-separated decimal integers into a flat buffer.
 *
 * Whitespace around tokens is ignored. Values are kept as written, not
 * clamped.
 */
export function parsePixelString(pixelString: string): FlatBuffer {
  const tokens = pixelString.split(',').map((token) => token.trim())
  if (tokens.length !== FLAT_BUFFER_SIZE) {
    throw new ParseError(
      `Pixel string must contain exactly ${FLAT_BUFFER_SIZE} values, got ${tokens.length}`,
    )
  }

  return tokens.map((token, i) => {
    if (!INTEGER_TOKEN.test(token)) {
      throw new ParseError(`Token ${i} is not an integer: "${token}"`, i)
    }
    return Number.parseInt(token, 10)
  })
}

export function flatArrayToPixelString(flat: readonly number[]): string {
  assertFlatSize(flat)
  return flat.join(',')
}
