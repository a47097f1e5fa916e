/**
 * Text renderings of a flat buffer for terminal preview.
 *
 * Two layouts:
 *   - `renderMatrixLines`: one character per pixel, 25 lines of 25 chars.
 *     Inert corner cells are blank, unlit pixels `·`, lit pixels `●`.
 *   - `renderBrailleLines`: one braille character per 2x4 pixel block,
 *     7 lines of 13 chars, for narrow terminals.
 *
 * Lit pixels are tinted grey with the brightness model's preview alpha, so
 * the terminal shows what the hardware would. Pass a `Chalk` instance with
 * `level: 0` to get plain text.
 */

import chalk, { type ChalkInstance } from 'chalk'

import { calculatePreviewAlpha } from '../matrix/brightness.js'
import { assertFlatSize } from '../matrix/mapper.js'
import { MATRIX_COLUMNS, MATRIX_ROWS, isInShape } from '../matrix/shape.js'

export const LIT_PIXEL = '●'
export const UNLIT_PIXEL = '·'

export interface PreviewOptions {
  /** Formatter used for tints. Defaults to the global chalk instance. */
  chalk?: ChalkInstance
  /** Theme brightness 0-255 used for the preview alpha. Defaults to 255. */
  themeBrightness?: number
}

function tint(painter: ChalkInstance, value: number, themeBrightness: number, text: string): string {
  const grey = Math.round(calculatePreviewAlpha(value, themeBrightness) * 255)
  return painter.rgb(grey, grey, grey)(text)
}

export function renderMatrixLines(
  frame: readonly number[],
  opts: PreviewOptions = {},
): string[] {
  assertFlatSize(frame)
  const painter = opts.chalk ?? chalk
  const themeBrightness = opts.themeBrightness ?? 255

  const lines: string[] = []
  for (let y = 0; y < MATRIX_ROWS; y++) {
    let line = ''
    for (let x = 0; x < MATRIX_COLUMNS; x++) {
      if (!isInShape(x, y)) {
        line += ' '
        continue
      }
      const value = frame[y * MATRIX_COLUMNS + x]
      line += value > 0 ? tint(painter, value, themeBrightness, LIT_PIXEL) : painter.dim(UNLIT_PIXEL)
    }
    lines.push(line)
  }
  return lines
}

// ---------------------------------------------------------------------------
// Braille encoding
// ---------------------------------------------------------------------------

/**
 * Braille dot layout per terminal character cell (2 columns x 4 rows):
 *
 *   [dot1][dot4]     (0,0) (1,0)
 *   [dot2][dot5]     (0,1) (1,1)
 *   [dot3][dot6]     (0,2) (1,2)
 *   [dot7][dot8]     (0,3) (1,3)
 *
 * Unicode: 0x2800 + bit pattern
 */
const DOT_BITS: number[][] = [
  // [x][y] -> bit value
  [0x01, 0x02, 0x04, 0x40], // x=0: dots 1,2,3,7
  [0x08, 0x10, 0x20, 0x80], // x=1: dots 4,5,6,8
]

export const BRAILLE_COLUMNS = Math.ceil(MATRIX_COLUMNS / 2)
export const BRAILLE_ROWS = Math.ceil(MATRIX_ROWS / 4)

export function renderBrailleLines(
  frame: readonly number[],
  opts: PreviewOptions = {},
): string[] {
  assertFlatSize(frame)
  const painter = opts.chalk ?? chalk
  const themeBrightness = opts.themeBrightness ?? 255

  const lines: string[] = []
  for (let cy = 0; cy < BRAILLE_ROWS; cy++) {
    let line = ''
    for (let cx = 0; cx < BRAILLE_COLUMNS; cx++) {
      let code = 0x2800
      let peak = 0

      for (let dx = 0; dx < 2; dx++) {
        for (let dy = 0; dy < 4; dy++) {
          const x = cx * 2 + dx
          const y = cy * 4 + dy
          if (!isInShape(x, y)) continue
          const value = frame[y * MATRIX_COLUMNS + x]
          if (value > 0) {
            code |= DOT_BITS[dx][dy]
            peak = Math.max(peak, value)
          }
        }
      }

      const char = String.fromCharCode(code)
      line += peak > 0 ? tint(painter, peak, themeBrightness, char) : char
    }
    lines.push(line)
  }
  return lines
}
