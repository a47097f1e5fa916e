/**
 * Pixel containers shared by the mapper, rasterizer and generators.
 */

/**
 * Ragged per-row representation: row r holds exactly ROW_WIDTHS[r]
 * brightness values, only the physically real pixels.
 */
export type ShapedGrid = number[][]

/**
 * 625-cell row-major 25x25 buffer, the format the display driver takes.
 * Cells outside a row's real span stay 0.
 */
export type FlatBuffer = number[]
