import { describe, it, expect } from 'vitest'
import {
  applyThemeBrightness,
  brightnessToMultiplier,
  calculateFinalBrightness,
  calculatePreviewAlpha,
  multiplierToBrightness,
} from '@/lib/matrix/brightness.js'
import { createEmptyFlat } from '@/lib/matrix/mapper.js'

describe('calculateFinalBrightness', () => {
  it('should scale by the theme brightness', () => {
    expect(calculateFinalBrightness(200, 51)).toBe(40)
    expect(calculateFinalBrightness(255, 255)).toBe(255)
    expect(calculateFinalBrightness(100, 0)).toBe(0)
  })

  it('should keep unlit pixels unlit', () => {
    expect(calculateFinalBrightness(0, 255)).toBe(0)
  })

  it('should clamp out-of-range pixels', () => {
    expect(calculateFinalBrightness(300, 255)).toBe(255)
    expect(calculateFinalBrightness(-20, 255)).toBe(0)
  })
})

describe('calculatePreviewAlpha', () => {
  it('should be 0 for unlit pixels', () => {
    expect(calculatePreviewAlpha(0, 255)).toBe(0)
  })

  it('should be fully opaque at full brightness', () => {
    expect(calculatePreviewAlpha(255, 255)).toBe(1)
  })

  it('should keep a floor of one half for lit pixels', () => {
    expect(calculatePreviewAlpha(100, 0)).toBe(0.5)
    expect(calculatePreviewAlpha(64, 255)).toBeCloseTo(0.5 + Math.sqrt(64 / 255) * 0.5)
  })
})

describe('multipliers', () => {
  it('should convert a settings multiplier to brightness', () => {
    expect(multiplierToBrightness(1)).toBe(255)
    expect(multiplierToBrightness(0.5)).toBe(127)
    expect(multiplierToBrightness(2)).toBe(255)
  })

  it('should convert brightness back to a unit multiplier', () => {
    expect(brightnessToMultiplier(51)).toBeCloseTo(0.2)
    expect(brightnessToMultiplier(510)).toBe(1)
    expect(brightnessToMultiplier(-1)).toBe(0)
  })
})

describe('applyThemeBrightness', () => {
  it('should return a scaled copy', () => {
    const frame = createEmptyFlat()
    frame[312] = 200
    frame[313] = 255
    const scaled = applyThemeBrightness(frame, 51)
    expect(scaled.slice(312, 315)).toEqual([40, 51, 0])
    expect(frame[312]).toBe(200)
  })

  it('should zero cells outside the matrix shape', () => {
    const frame = createEmptyFlat().fill(255)
    const scaled = applyThemeBrightness(frame, 255)
    expect(scaled[0]).toBe(0)
    expect(scaled[8]).toBe(0)
    expect(scaled[9]).toBe(255)
    expect(scaled[15]).toBe(255)
    expect(scaled[16]).toBe(0)
    expect(scaled[624]).toBe(0)
    expect(frame[0]).toBe(255)
  })
})
