import { describe, it, expect } from 'vitest'
import { Chalk } from 'chalk'
import { SizeMismatchError } from '@/lib/matrix/errors.js'
import { createEmptyFlat } from '@/lib/matrix/mapper.js'
import {
  BRAILLE_COLUMNS,
  BRAILLE_ROWS,
  LIT_PIXEL,
  UNLIT_PIXEL,
  renderBrailleLines,
  renderMatrixLines,
} from '@/lib/preview/matrix-preview.js'

const plain = new Chalk({ level: 0 })
const truecolor = new Chalk({ level: 3 })

describe('renderMatrixLines', () => {
  it('should draw the lens outline for an empty frame', () => {
    const lines = renderMatrixLines(createEmptyFlat(), { chalk: plain })
    expect(lines).toHaveLength(25)
    expect(lines[0]).toBe(' '.repeat(9) + UNLIT_PIXEL.repeat(7) + ' '.repeat(9))
    expect(lines[12]).toBe(UNLIT_PIXEL.repeat(25))
    expect(lines[24]).toBe(lines[0])
  })

  it('should mark lit pixels', () => {
    const frame = createEmptyFlat()
    frame[12 * 25 + 12] = 255
    const lines = renderMatrixLines(frame, { chalk: plain })
    expect(lines[12]).toBe(UNLIT_PIXEL.repeat(12) + LIT_PIXEL + UNLIT_PIXEL.repeat(12))
  })

  it('should hide corner cells even when set', () => {
    const frame = createEmptyFlat()
    frame[0] = 255
    expect(renderMatrixLines(frame, { chalk: plain })[0][0]).toBe(' ')
  })

  it('should tint lit pixels by preview alpha', () => {
    const frame = createEmptyFlat()
    frame[12 * 25] = 255
    const lines = renderMatrixLines(frame, { chalk: truecolor })
    expect(lines[12].startsWith(`\u001b[38;2;255;255;255m${LIT_PIXEL}\u001b[39m`)).toBe(true)
  })

  it('should reject buffers of the wrong size', () => {
    expect(() => renderMatrixLines([0, 0], { chalk: plain })).toThrow(SizeMismatchError)
  })
})

describe('renderBrailleLines', () => {
  it('should produce 7 rows of 13 cells', () => {
    const lines = renderBrailleLines(createEmptyFlat(), { chalk: plain })
    expect(BRAILLE_ROWS).toBe(7)
    expect(BRAILLE_COLUMNS).toBe(13)
    expect(lines).toEqual(new Array<string>(7).fill('\u2800'.repeat(13)))
  })

  it('should map pixels to braille dots', () => {
    const frame = createEmptyFlat()
    frame[12 * 25] = 255 // (0, 12): dot 1 of cell (0, 3)
    frame[13 * 25 + 1] = 255 // (1, 13): dot 5 of cell (0, 3)
    const lines = renderBrailleLines(frame, { chalk: plain })
    expect(lines[3][0]).toBe(String.fromCharCode(0x2800 | 0x01 | 0x10))
  })

  it('should ignore corner cells', () => {
    const frame = createEmptyFlat()
    frame[0] = 255
    expect(renderBrailleLines(frame, { chalk: plain })[0][0]).toBe('\u2800')
  })
})
