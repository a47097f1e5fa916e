/**
 * Player configuration: frame rate, theme brightness and playlist.
 *
 * Read from a YAML file (default ./glyph-matrix.yml, or GLYPH_MATRIX_CONFIG)
 * and overridden by GLYPH_MATRIX_FPS / GLYPH_MATRIX_BRIGHTNESS. Malformed
 * values fall back to defaults with a warning; only an unreadable file or
 * broken YAML is fatal.
 */

import { existsSync, readFileSync } from 'fs'
import { resolve } from 'path'
import { parse } from 'yaml'

import { ANIMATIONS, ANIMATION_NAMES, isAnimationName } from '../animation/algorithms/index.js'
import { AnimationPriority, type AnimationName, type AnimationSlot } from '../animation/types.js'
import { clampBrightness } from '../matrix/mapper.js'

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

export interface PlaylistEntry {
  animation: AnimationName
  /** Frames per cycle. */
  frames: number
  /** Cycles to play before moving on. */
  loops: number
  size?: number
  wavelength?: number
  thickness?: number
}

export interface MatrixConfig {
  fps: number
  /** Theme brightness 0-255 applied to every frame. */
  brightness: number
  playlist: PlaylistEntry[]
}

export const DEFAULT_CONFIG_FILE = 'glyph-matrix.yml'

export const DEFAULT_CONFIG: MatrixConfig = {
  fps: 10,
  brightness: 255,
  playlist: ANIMATION_NAMES.map((name) => ({
    animation: name,
    frames: ANIMATIONS[name].defaultFrameCount,
    loops: 2,
  })),
}

type Env = Record<string, string | undefined>

// ---------------------------------------------------------------------------
// Load
// ---------------------------------------------------------------------------

function expandHome(p: string, env: Env): string {
  if (p.startsWith('~/')) return resolve(env.HOME ?? '', p.slice(2))
  return p
}

/**
 * Load configuration from disk and the environment.
 *
 * A missing file at the default location yields defaults; a missing file
 * that was asked for explicitly is an error.
 */
export function loadConfig(opts: { path?: string; env?: Env; cwd?: string } = {}): MatrixConfig {
  const env = opts.env ?? process.env
  const requested = opts.path ?? env.GLYPH_MATRIX_CONFIG
  const configPath = expandHome(
    requested ?? resolve(opts.cwd ?? process.cwd(), DEFAULT_CONFIG_FILE),
    env,
  )

  if (requested === undefined && !existsSync(configPath)) {
    console.debug(`[config] No config at ${configPath}, using defaults`)
    return applyEnvOverrides(cloneDefaults(), env)
  }

  let data: unknown
  try {
    data = parse(readFileSync(configPath, 'utf-8'))
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err))
    console.error(`[config] Failed to load config from ${configPath}:`, error.message)

    const code = 'code' in error ? error.code : undefined
    if (code === 'ENOENT') {
      throw new Error(`Config file not found at ${configPath}`)
    } else if (code === 'EACCES') {
      throw new Error(`Permission denied reading config file at ${configPath}`)
    } else {
      throw new Error(`Failed to parse config: ${error.message}`)
    }
  }

  return applyEnvOverrides(parseConfig(data), env)
}

function cloneDefaults(): MatrixConfig {
  return { ...DEFAULT_CONFIG, playlist: DEFAULT_CONFIG.playlist.map((e) => ({ ...e })) }
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function extractPositiveInt(data: Record<string, unknown>, key: string): number | null {
  const value = data[key]
  if (typeof value === 'number' && Number.isInteger(value) && value >= 1) return value
  return null
}

function extractNumber(data: Record<string, unknown>, key: string): number | undefined {
  const value = data[key]
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined
}

function extractEntry(item: unknown, index: number): PlaylistEntry | null {
  if (!isRecord(item)) {
    console.warn(`[config] Playlist entry ${index} is not a mapping, skipping`)
    return null
  }
  const animation = item.animation
  if (typeof animation !== 'string' || !isAnimationName(animation)) {
    console.warn(`[config] Playlist entry ${index} has unknown animation ${String(animation)}, skipping`)
    return null
  }

  const entry: PlaylistEntry = {
    animation,
    frames: extractPositiveInt(item, 'frames') ?? ANIMATIONS[animation].defaultFrameCount,
    loops: extractPositiveInt(item, 'loops') ?? 1,
  }
  const size = extractNumber(item, 'size')
  const wavelength = extractNumber(item, 'wavelength')
  const thickness = extractNumber(item, 'thickness')
  if (size !== undefined) entry.size = size
  if (wavelength !== undefined) entry.wavelength = wavelength
  if (thickness !== undefined) entry.thickness = thickness
  return entry
}

/** Validate a parsed YAML document, keeping what is usable. */
export function parseConfig(data: unknown): MatrixConfig {
  const config = cloneDefaults()
  if (data === null || data === undefined) return config
  if (!isRecord(data)) {
    console.warn('[config] Config root is not a mapping, using defaults')
    return config
  }

  const fps = extractPositiveInt(data, 'fps')
  if (fps !== null) config.fps = fps
  else if (data.fps !== undefined) console.warn(`[config] Invalid fps ${String(data.fps)}, using ${config.fps}`)

  const brightness = extractNumber(data, 'brightness')
  if (brightness !== undefined) config.brightness = clampBrightness(brightness)

  if (Array.isArray(data.playlist)) {
    const entries = data.playlist
      .map((item, i) => extractEntry(item, i))
      .filter((entry): entry is PlaylistEntry => entry !== null)
    if (entries.length > 0) config.playlist = entries
  }

  return config
}

function parseIntEnv(env: Env, key: string): number | null {
  const raw = env[key]
  if (raw === undefined || raw === '') return null
  const value = Number(raw)
  if (!Number.isInteger(value)) {
    console.warn(`[config] Ignoring ${key}=${raw}: not an integer`)
    return null
  }
  return value
}

export function applyEnvOverrides(config: MatrixConfig, env: Env): MatrixConfig {
  const fps = parseIntEnv(env, 'GLYPH_MATRIX_FPS')
  const brightness = parseIntEnv(env, 'GLYPH_MATRIX_BRIGHTNESS')
  return {
    ...config,
    fps: fps !== null ? Math.max(1, fps) : config.fps,
    brightness: brightness !== null ? clampBrightness(brightness) : config.brightness,
  }
}

// ---------------------------------------------------------------------------
// Slots
// ---------------------------------------------------------------------------

/** Engine slots for the playlist, one per entry, each `frames * loops` ticks long. */
export function buildPlaylistSlots(config: MatrixConfig): AnimationSlot[] {
  return config.playlist.map((entry) => ({
    renderer: ANIMATIONS[entry.animation].create({
      brightness: 255,
      size: entry.size,
      wavelength: entry.wavelength,
      thickness: entry.thickness,
    }),
    frameCount: entry.frames,
    priority: AnimationPriority.AMBIENT,
    duration: entry.frames * entry.loops,
    brightness: config.brightness,
    label: entry.animation,
  }))
}
