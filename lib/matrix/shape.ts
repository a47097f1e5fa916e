/**
 * Physical layout of the glyph matrix.
 *
 * The display is 25 rows tall, but rows are not equally wide: the outline is
 * a lens that narrows to 7 pixels at the top and bottom. Each row is centred
 * inside a 25-column rectangle when embedded in a flat buffer.
 *
 * No side effects on import.
 */

import { RowRangeError } from './errors.js'

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const MATRIX_ROWS = 25
export const MATRIX_COLUMNS = 25
export const FLAT_BUFFER_SIZE = MATRIX_ROWS * MATRIX_COLUMNS

/** Real pixels per row, top to bottom. */
export const ROW_WIDTHS: readonly number[] = Object.freeze([
  7, 11, 15, 17, 19, 21, 21, 23, 23, 25,
  25, 25, 25, 25, 25, 25, 23, 23, 21, 21,
  19, 17, 15, 11, 7,
])

/** Column where each row's real pixels start once centred. */
export const ROW_OFFSETS: readonly number[] = Object.freeze(
  ROW_WIDTHS.map((width) => Math.floor((MATRIX_COLUMNS - width) / 2)),
)

/** Centre pixel of the rectangular buffer. */
export const CENTER_X = Math.floor(MATRIX_COLUMNS / 2)
export const CENTER_Y = Math.floor(MATRIX_ROWS / 2)

// ---------------------------------------------------------------------------
// Row accessors
// ---------------------------------------------------------------------------

function checkRow(row: number): void {
  if (!Number.isInteger(row) || row < 0 || row >= MATRIX_ROWS) {
    throw new RowRangeError(row)
  }
}

export function getRowWidth(row: number): number {
  checkRow(row)
  return ROW_WIDTHS[row]
}

export function getRowOffset(row: number): number {
  checkRow(row)
  return ROW_OFFSETS[row]
}

/** Whether (x, y) is a physically real pixel rather than an inert corner cell. */
export function isInShape(x: number, y: number): boolean {
  if (y < 0 || y >= MATRIX_ROWS) return false
  const start = ROW_OFFSETS[y]
  return x >= start && x < start + ROW_WIDTHS[y]
}
