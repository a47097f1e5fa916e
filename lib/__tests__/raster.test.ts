import { describe, it, expect } from 'vitest'
import { drawCircle, drawDot, drawLine, fillGrid, toRadians } from '@/lib/animation/raster.js'
import { createEmptyFlat } from '@/lib/matrix/mapper.js'

function at(buf: number[], x: number, y: number): number {
  return buf[y * 25 + x]
}

function litCells(buf: number[]): [number, number][] {
  const cells: [number, number][] = []
  buf.forEach((v, i) => {
    if (v > 0) cells.push([i % 25, Math.floor(i / 25)])
  })
  return cells
}

describe('toRadians', () => {
  it('should convert degrees', () => {
    expect(toRadians(180)).toBeCloseTo(Math.PI)
    expect(toRadians(0)).toBe(0)
  })
})

describe('drawLine', () => {
  it('should draw a horizontal run inclusive of both ends', () => {
    const buf = createEmptyFlat()
    drawLine(buf, 0, 0, 4, 0, 200)
    expect(litCells(buf)).toEqual([[0, 0], [1, 0], [2, 0], [3, 0], [4, 0]])
    expect(at(buf, 2, 0)).toBe(200)
  })

  it('should draw a diagonal', () => {
    const buf = createEmptyFlat()
    drawLine(buf, 3, 3, 0, 0, 10)
    expect(litCells(buf)).toEqual([[0, 0], [1, 1], [2, 2], [3, 3]])
  })

  it('should plot a single point for a zero-length line', () => {
    const buf = createEmptyFlat()
    drawLine(buf, 5, 5, 5, 5, 10)
    expect(litCells(buf)).toEqual([[5, 5]])
  })

  it('should skip points outside the rectangle', () => {
    const buf = createEmptyFlat()
    drawLine(buf, -2, 0, 2, 0, 10)
    expect(litCells(buf)).toEqual([[0, 0], [1, 0], [2, 0]])
  })

  it('should clamp brightness', () => {
    const buf = createEmptyFlat()
    drawLine(buf, 0, 0, 1, 0, 300)
    expect(at(buf, 0, 0)).toBe(255)
    drawLine(buf, 0, 1, 1, 1, -5)
    expect(at(buf, 0, 1)).toBe(0)
  })

  it('should overwrite earlier writes', () => {
    const buf = createEmptyFlat()
    drawLine(buf, 0, 0, 4, 0, 200)
    drawLine(buf, 2, 0, 2, 2, 50)
    expect(at(buf, 2, 0)).toBe(50)
    expect(at(buf, 1, 0)).toBe(200)
  })
})

describe('drawCircle', () => {
  it('should plot only the centre for radius 0', () => {
    const buf = createEmptyFlat()
    drawCircle(buf, 12, 12, 0, 100)
    expect(litCells(buf)).toEqual([[12, 12]])
  })

  it('should draw nothing for a negative radius', () => {
    const buf = createEmptyFlat()
    drawCircle(buf, 12, 12, -3, 100)
    expect(litCells(buf)).toEqual([])
  })

  it('should ring the centre at radius 1', () => {
    const buf = createEmptyFlat()
    drawCircle(buf, 12, 12, 1, 100)
    expect(litCells(buf)).toHaveLength(8)
    expect(at(buf, 12, 12)).toBe(0)
    expect(at(buf, 13, 12)).toBe(100)
    expect(at(buf, 11, 11)).toBe(100)
    expect(at(buf, 12, 13)).toBe(100)
  })

  it('should reach the compass points of larger circles', () => {
    const buf = createEmptyFlat()
    drawCircle(buf, 12, 12, 10, 255)
    expect(at(buf, 22, 12)).toBe(255)
    expect(at(buf, 2, 12)).toBe(255)
    expect(at(buf, 12, 2)).toBe(255)
    expect(at(buf, 12, 22)).toBe(255)
  })

  it('should clip at the buffer edge', () => {
    const buf = createEmptyFlat()
    drawCircle(buf, 0, 0, 3, 255)
    expect(at(buf, 3, 0)).toBe(255)
    expect(at(buf, 0, 3)).toBe(255)
    expect(litCells(buf).every(([x, y]) => x >= 0 && y >= 0)).toBe(true)
  })
})

describe('drawDot', () => {
  it('should fill a plus shape at radius 1', () => {
    const buf = createEmptyFlat()
    drawDot(buf, 12, 12, 1, 255)
    expect(litCells(buf)).toEqual([[12, 11], [11, 12], [12, 12], [13, 12], [12, 13]])
  })

  it('should clip at corners', () => {
    const buf = createEmptyFlat()
    drawDot(buf, 0, 0, 1, 255)
    expect(litCells(buf)).toEqual([[0, 0], [1, 0], [0, 1]])
  })

  it('should ignore fractional coordinates', () => {
    const buf = createEmptyFlat()
    drawDot(buf, 0.5, 0.5, 1, 255)
    expect(litCells(buf)).toEqual([])
  })
})

describe('fillGrid', () => {
  it('should set every cell, corners included', () => {
    const buf = createEmptyFlat()
    fillGrid(buf, 300)
    expect(buf.every((v) => v === 255)).toBe(true)
    fillGrid(buf, 12.7)
    expect(buf[0]).toBe(12)
  })
})
