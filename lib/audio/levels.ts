/**
 * Audio level extraction for audio-reactive animations.
 *
 * Turns Visualizer-style captures (signed 8-bit FFT and waveform bytes) into
 * normalized bass/mid/treble/beat levels, and provides a simulated source
 * for playback when no audio is available.
 *
 * Everything here is pure except BeatDetector, which keeps a decaying
 * intensity and takes an injectable clock.
 *
 * Built-in playback uses `simulateLevels`. `analyzeFft`, `rmsLevel` and
 * `BeatDetector` are the entry points for callers that supply real
 * captures, typically wrapped into a `LevelSource` for the audio spectrum.
 */

export interface AudioLevels {
  /** Beat intensity 0-1. */
  beat: number
  bass: number
  mid: number
  treble: number
}

export const SILENT_LEVELS: AudioLevels = Object.freeze({ beat: 0, bass: 0, mid: 0, treble: 0 })

type Samples = ArrayLike<number>

function clampUnit(value: number): number {
  return Math.min(1, Math.max(0, value))
}

// ---------------------------------------------------------------------------
// FFT bands
// ---------------------------------------------------------------------------

const BASS_END_RATIO = 0.08
const MID_END_RATIO = 0.4

function meanMagnitude(fft: Samples, startBin: number, endBin: number): number {
  if (endBin <= startBin) return 0
  let sum = 0
  for (let k = startBin; k < endBin; k++) {
    sum += Math.hypot(fft[2 * k], fft[2 * k + 1])
  }
  return clampUnit(sum / (endBin - startBin) / 128)
}

/**
 * Split an interleaved real/imaginary FFT capture into three bands.
 *
 * Bass covers the lowest 8% of bins, mid up to 40%, treble the rest. Each
 * level is the mean bin magnitude over 128.
 */
export function analyzeFft(fft: Samples): Omit<AudioLevels, 'beat'> {
  const bins = Math.floor(fft.length / 2)
  const bassEnd = Math.floor(bins * BASS_END_RATIO)
  const midEnd = Math.floor(bins * MID_END_RATIO)
  return {
    bass: meanMagnitude(fft, 0, bassEnd),
    mid: meanMagnitude(fft, bassEnd, midEnd),
    treble: meanMagnitude(fft, midEnd, bins),
  }
}

/** Root-mean-square of a signed 8-bit waveform, normalized to [0, 1]. */
export function rmsLevel(waveform: Samples): number {
  if (waveform.length === 0) return 0
  let sum = 0
  for (let i = 0; i < waveform.length; i++) {
    sum += waveform[i] * waveform[i]
  }
  return clampUnit(Math.sqrt(sum / waveform.length) / 128)
}

// ---------------------------------------------------------------------------
// Beat shaping
// ---------------------------------------------------------------------------

/**
 * Beat envelope over one beat period (`progress` in [0, 1)).
 *
 * A squared main pulse on the downbeat plus smaller sub- and micro-beats.
 */
export function beatPattern(progress: number, volumeBoost: boolean = false): number {
  const main = Math.sin(progress * 2 * Math.PI)
  const mainBeat = main > 0 ? main * main : 0
  const subBeat = Math.sin(progress * 4 * Math.PI) * 0.3
  const microBeat = Math.sin(progress * 8 * Math.PI) * 0.1
  const boost = volumeBoost ? 0.2 : 0
  return clampUnit(mainBeat + subBeat + microBeat + boost)
}

/** Synthetic levels for demo playback, `timeSeconds` into the track. */
export function simulateLevels(timeSeconds: number, bpm: number = 128): AudioLevels {
  const progress = ((timeSeconds * bpm) / 60) % 1
  return {
    beat: beatPattern(progress),
    bass: Math.sin(timeSeconds * 2) * 0.5 + 0.5,
    mid: Math.sin(timeSeconds * 3) * 0.3 + 0.4,
    treble: Math.sin(timeSeconds * 5) * 0.2 + 0.3,
  }
}

// ---------------------------------------------------------------------------
// BeatDetector
// ---------------------------------------------------------------------------

export const BEAT_THRESHOLD = 0.3
export const MIN_BEAT_INTERVAL_MS = 200
const BEAT_DECAY = 0.95

/**
 * Energy-based beat detection over successive waveform RMS readings.
 *
 * A reading above BEAT_THRESHOLD counts as a beat when at least
 * MIN_BEAT_INTERVAL_MS passed since the previous one; otherwise the current
 * intensity decays.
 */
export class BeatDetector {
  private _intensity: number = 0
  private _lastBeatTime: number = Number.NEGATIVE_INFINITY
  private _now: () => number

  constructor(now: () => number = Date.now) {
    this._now = now
  }

  /** Feed one RMS reading; returns the updated beat intensity. */
  push(rms: number): number {
    const now = this._now()
    if (rms > BEAT_THRESHOLD && now - this._lastBeatTime > MIN_BEAT_INTERVAL_MS) {
      this._lastBeatTime = now
      this._intensity = rms
    } else {
      this._intensity = Math.max(0, this._intensity * BEAT_DECAY)
    }
    return this._intensity
  }

  get intensity(): number {
    return this._intensity
  }

  reset(): void {
    this._intensity = 0
    this._lastBeatTime = Number.NEGATIVE_INFINITY
  }
}
