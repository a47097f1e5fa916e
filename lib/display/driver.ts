/**
 * Boundary to the display hardware.
 *
 * Drivers receive complete 625-cell flat buffers with values already
 * clamped to [0, 255] and inert corner cells at 0. They own everything past
 * this point: transport, timing, hardware brightness.
 */

import { assertFlatSize } from '../matrix/mapper.js'

export interface DisplayDriver {
  /** Show a frame. May throw; the engine logs and counts the drop. */
  setMatrixFrame(frame: readonly number[]): void
}

/** Throws SizeMismatchError unless `frame` is a full 625-cell buffer. */
export function assertDisplayFrame(frame: readonly number[]): void {
  assertFlatSize(frame)
}
