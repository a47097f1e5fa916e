/**
 * Core type definitions for the animation layer.
 *
 * Renderer-agnostic: shared between the display driver path and the
 * terminal preview. No side effects on import.
 */

import type { AudioLevels } from '../audio/levels.js'
import type { FlatBuffer } from '../matrix/types.js'

// ---------------------------------------------------------------------------
// Frame rendering
// ---------------------------------------------------------------------------

/**
 * Pure function that computes one frame of a sequence.
 *
 * Receives the frame index and the sequence length. Returns a fresh flat
 * buffer. Must have no side effects; calling it twice with the same index
 * yields the same frame, so frames can be built in any order.
 */
export type FrameRenderer = (frameIndex: number, frameCount: number) => FlatBuffer

/** Supplies band levels for a given frame of an audio-reactive sequence. */
export type LevelSource = (frameIndex: number) => AudioLevels

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export type AnimationName =
  | 'rotatingLine'
  | 'pulse'
  | 'wave'
  | 'horizontalWave'
  | 'audioSpectrum'

export interface AnimationParams {
  /** Peak pixel brightness 0-255. */
  brightness: number
  /** Line length, pulse radius or wave amplitude, depending on the animation. */
  size?: number
  /** Half sine cycles across the columns (horizontal wave only). */
  wavelength?: number
  /** Wave line thickness 1-3 (horizontal wave only). */
  thickness?: number
  /** Band levels per frame (audio spectrum only). */
  levels?: LevelSource
}

export interface AnimationDefinition {
  name: AnimationName
  description: string
  defaultFrameCount: number
  /** Default for `AnimationParams.size`. */
  defaultSize: number
  create(params: AnimationParams): FrameRenderer
}

// ---------------------------------------------------------------------------
// Priority system
// ---------------------------------------------------------------------------

export enum AnimationPriority {
  /** Lowest: ambient themes and playlists. */
  AMBIENT = 0,
  /** Mid: audio-reactive content. */
  REACTIVE = 1,
  /** Highest: user-triggered overlays (track skip, notifications). */
  OVERRIDE = 2,
}

// ---------------------------------------------------------------------------
// Animation slot
// ---------------------------------------------------------------------------

export interface AnimationSlot {
  /** The pure renderer that generates frames. */
  renderer: FrameRenderer
  /** Length of one cycle; the renderer is called with localFrame mod frameCount. */
  frameCount: number
  /** Priority level -- higher interrupts lower. */
  priority: AnimationPriority
  /** Total ticks to play, or null for infinite (loop until replaced). */
  duration: number | null
  /** Theme brightness 0-255 applied on output. Defaults to 255. */
  brightness?: number
  /** Optional label for logging. */
  label?: string
}
