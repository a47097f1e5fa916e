/**
 * Drawing primitives over a flat 25x25 buffer.
 *
 * Every primitive mutates the buffer in place, clamps its brightness once up
 * front, and silently skips points that fall outside the rectangle. Points
 * are discrete: a later write to a cell replaces the earlier value.
 */

import { clampBrightness } from '../matrix/mapper.js'
import { MATRIX_COLUMNS, MATRIX_ROWS } from '../matrix/shape.js'

function plot(buf: number[], x: number, y: number, value: number): void {
  if (!Number.isInteger(x) || !Number.isInteger(y)) return
  if (x >= 0 && x < MATRIX_COLUMNS && y >= 0 && y < MATRIX_ROWS) {
    buf[y * MATRIX_COLUMNS + x] = value
  }
}

export function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180
}

/**
 * Parametric line: samples max(|dx|, |dy|, 1) + 1 evenly spaced points and
 * rounds each to the nearest cell. Not Bresenham; rounding may revisit a
 * cell.
 */
export function drawLine(
  buf: number[],
  x1: number,
  y1: number,
  x2: number,
  y2: number,
  brightness: number,
): void {
  const value = clampBrightness(brightness)
  const steps = Math.max(Math.abs(x2 - x1), Math.abs(y2 - y1), 1)

  for (let i = 0; i <= steps; i++) {
    const t = i / steps
    plot(buf, Math.round(x1 + (x2 - x1) * t), Math.round(y1 + (y2 - y1) * t), value)
  }
}

/**
 * Circle outline sampled every floor(360 / (radius * 8)) whole degrees.
 *
 * Small radii get a coarse step and visible gaps; that look is part of the
 * existing themes. The step never drops below one degree.
 */
export function drawCircle(
  buf: number[],
  cx: number,
  cy: number,
  radius: number,
  brightness: number,
): void {
  if (radius < 0) return
  const value = clampBrightness(brightness)
  const step = Math.max(1, Math.floor(360 / (radius * 8)))

  for (let angle = 0; angle < 360; angle += step) {
    const rad = toRadians(angle)
    plot(
      buf,
      cx + Math.round(Math.cos(rad) * radius),
      cy + Math.round(Math.sin(rad) * radius),
      value,
    )
  }
}

/** Filled disk: every cell within `radius` (Euclidean) of the centre. */
export function drawDot(
  buf: number[],
  cx: number,
  cy: number,
  radius: number,
  brightness: number,
): void {
  const value = clampBrightness(brightness)

  for (let y = cy - radius; y <= cy + radius; y++) {
    for (let x = cx - radius; x <= cx + radius; x++) {
      const dx = x - cx
      const dy = y - cy
      if (Math.sqrt(dx * dx + dy * dy) <= radius) {
        plot(buf, x, y, value)
      }
    }
  }
}

export function fillGrid(buf: number[], brightness: number): void {
  buf.fill(clampBrightness(brightness))
}
