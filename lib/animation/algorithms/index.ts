/**
 * Registry of all frame generators.
 *
 * Maps camelCase names to definitions that bind user-facing parameters
 * (brightness, size, wavelength...) to a pure per-frame renderer. The CLI,
 * config loader and playlist all look animations up here.
 */

import { simulateLevels } from '../../audio/levels.js'
import type { FlatBuffer } from '../../matrix/types.js'
import { buildFrames } from '../frames.js'
import type {
  AnimationDefinition,
  AnimationName,
  AnimationParams,
  LevelSource,
} from '../types.js'

import { audioSpectrumFrame } from './audio-spectrum.js'
import { horizontalWaveFrame } from './horizontal-wave.js'
import { pulseFrame } from './pulse.js'
import { rotatingLineFrame } from './rotating-line.js'
import { waveFrame } from './wave.js'

export {
  audioSpectrumFrame,
  audioSpectrumFrames,
  drawAudioSpectrumWaves,
} from './audio-spectrum.js'
export {
  drawHorizontalWave,
  horizontalWaveFrame,
  horizontalWaveFrames,
} from './horizontal-wave.js'
export { pulseFrame, pulseFrames, pulseRadius } from './pulse.js'
export { rotatingLineEndpoint, rotatingLineFrame, rotatingLineFrames } from './rotating-line.js'
export { waveFrame, waveFrames } from './wave.js'

/** Frame rate assumed when mapping frame indices to simulated audio time. */
export const SIMULATED_LEVEL_FPS = 10

const simulatedLevels: LevelSource = (frameIndex) =>
  simulateLevels(frameIndex / SIMULATED_LEVEL_FPS)

export const ANIMATIONS: Record<AnimationName, AnimationDefinition> = {
  rotatingLine: {
    name: 'rotatingLine',
    description: 'Clock hand sweeping around the centre',
    defaultFrameCount: 24,
    defaultSize: 8,
    create: ({ brightness, size = 8 }) => (i, n) => rotatingLineFrame(i, n, size, brightness),
  },
  pulse: {
    name: 'pulse',
    description: 'Ring swelling out from the centre and back',
    defaultFrameCount: 16,
    defaultSize: 10,
    create: ({ brightness, size = 10 }) => (i, n) => pulseFrame(i, n, size, brightness),
  },
  wave: {
    name: 'wave',
    description: 'Thin sine wave scrolling across the matrix',
    defaultFrameCount: 20,
    defaultSize: 5,
    create: ({ brightness, size = 5 }) => (i, n) => waveFrame(i, n, size, brightness),
  },
  horizontalWave: {
    name: 'horizontalWave',
    description: 'Smooth horizontal wave with soft edges',
    defaultFrameCount: 20,
    defaultSize: 5,
    create: ({ brightness, size = 5, wavelength = 2.0, thickness = 1 }) => (i, n) =>
      horizontalWaveFrame(i, n, size, brightness, wavelength, thickness),
  },
  audioSpectrum: {
    name: 'audioSpectrum',
    description: 'Bass, mid and treble bands reacting to audio levels',
    defaultFrameCount: 32,
    defaultSize: 0,
    create: ({ brightness, levels = simulatedLevels }) => (i, n) =>
      audioSpectrumFrame(i, n, levels, brightness),
  },
}

export const ANIMATION_NAMES = Object.keys(ANIMATIONS).filter(isAnimationName)

export function isAnimationName(name: string): name is AnimationName {
  return Object.prototype.hasOwnProperty.call(ANIMATIONS, name)
}

/** Render a definition's full sequence. */
export function renderSequence(
  definition: AnimationDefinition,
  frameCount: number,
  params: AnimationParams,
): FlatBuffer[] {
  return buildFrames(frameCount, definition.create(params))
}
