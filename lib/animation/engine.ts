/**
 * Double-buffered playback engine with priority queue.
 *
 * Owns one animation slot for the matrix, back/front frame buffers, and a
 * bounded queue for pending animations. Higher-priority animations
 * interrupt lower-priority ones.
 *
 * The engine ticks via setInterval (injectable for testing). Each tick calls
 * update() which: renders the slot's current frame, applies its theme
 * brightness, writes to the back buffer, swaps buffers, and pushes the front
 * buffer to the attached display driver.
 *
 * No React, no DOM -- pure TypeScript.
 */

import type { DisplayDriver } from '../display/driver.js'
import { applyThemeBrightness } from '../matrix/brightness.js'
import { createEmptyFlat } from '../matrix/mapper.js'
import type { FlatBuffer } from '../matrix/types.js'
import type { AnimationSlot } from './types.js'

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

const MAX_QUEUE_SIZE = 5
const DEFAULT_FPS = 10

export type IdleListener = () => void

export type TimerHandle = ReturnType<typeof setInterval>
export type ScheduleInterval = (callback: () => void, ms: number) => TimerHandle
export type CancelInterval = (handle: TimerHandle) => void

export class AnimationEngine {
  private _slot: AnimationSlot | null = null
  private _localFrame: number = 0
  private _queue: AnimationSlot[] = []
  private _looping: boolean = false

  // Double buffers
  private _front: FlatBuffer = createEmptyFlat()
  private _back: FlatBuffer = createEmptyFlat()

  private _driver: DisplayDriver | null
  private _idleListeners: Set<IdleListener> = new Set()
  private _droppedFrames: number = 0

  // Timing
  private _fps: number = DEFAULT_FPS
  private _timerId: TimerHandle | null = null
  private _globalFrame: number = 0
  private _enabled: boolean = true

  // Injectable timer for testing
  private _setInterval: ScheduleInterval
  private _clearInterval: CancelInterval

  constructor(opts?: {
    driver?: DisplayDriver
    fps?: number
    setInterval?: ScheduleInterval
    clearInterval?: CancelInterval
  }) {
    this._driver = opts?.driver ?? null
    if (opts?.fps !== undefined) this._fps = Math.max(1, opts.fps)
    this._setInterval = opts?.setInterval ?? ((callback, ms) => setInterval(callback, ms))
    this._clearInterval = opts?.clearInterval ?? ((handle) => clearInterval(handle))
  }

  // -----------------------------------------------------------------------
  // Driver
  // -----------------------------------------------------------------------

  /** Attach (or detach with null) the display receiving each frame. */
  attachDriver(driver: DisplayDriver | null): void {
    this._driver = driver
  }

  // -----------------------------------------------------------------------
  // Playback
  // -----------------------------------------------------------------------

  /**
   * Start a new animation.
   *
   * Priority rules:
   *   - Higher priority interrupts the current animation.
   *   - Same priority replaces the current animation.
   *   - Lower priority is queued (up to MAX_QUEUE_SIZE).
   */
  play(slot: AnimationSlot): void {
    if (!this._enabled) return

    if (this._slot === null || slot.priority >= this._slot.priority) {
      // Interrupt / replace
      this._slot = slot
      this._localFrame = 0
      this._looping = false
    } else if (this._queue.length < MAX_QUEUE_SIZE) {
      this._queue.push(slot)
    } else {
      console.warn(`[engine] Queue full, dropping ${slot.label ?? 'animation'}`)
    }
  }

  /** Stop the current animation, drop the queue, and blank the buffers. */
  clear(): void {
    this._slot = null
    this._localFrame = 0
    this._queue.length = 0
    this._looping = false
    this._front = createEmptyFlat()
    this._back = createEmptyFlat()
  }

  /** Set the current animation to loop. */
  setLooping(looping: boolean): void {
    this._looping = looping
  }

  /**
   * Register a listener fired when the last animation ends with nothing
   * queued. Returns an unsubscribe function.
   */
  onIdle(listener: IdleListener): () => void {
    this._idleListeners.add(listener)
    return () => {
      this._idleListeners.delete(listener)
    }
  }

  // -----------------------------------------------------------------------
  // Frame update
  // -----------------------------------------------------------------------

  /**
   * Advance the slot by one frame, swap buffers and push to the driver.
   *
   * Called automatically by the internal timer, but can also be called
   * manually for testing or external timing control.
   */
  update(): void {
    this._globalFrame++
    let wentIdle = false

    const slot = this._slot
    if (slot) {
      if (slot.frameCount > 0) {
        const frame = slot.renderer(this._localFrame % slot.frameCount, slot.frameCount)
        this._back = applyThemeBrightness(frame, slot.brightness ?? 255)
        this._localFrame++
      } else {
        this._back = createEmptyFlat()
      }

      // Check completion. A slot with no frames ends on its first tick.
      const empty = slot.frameCount <= 0
      if (empty || (slot.duration !== null && this._localFrame >= slot.duration)) {
        if (this._looping && !empty) {
          this._localFrame = 0
        } else {
          const next = this._queue.shift()
          if (next) {
            this._slot = next
            this._localFrame = 0
            this._looping = false
          } else {
            this._slot = null
            wentIdle = true
          }
        }
      }
    } else {
      this._back = createEmptyFlat()
    }

    // Atomic buffer swap
    const tmp = this._front
    this._front = this._back
    this._back = tmp

    this._push()
    if (wentIdle) {
      for (const listener of [...this._idleListeners]) listener()
    }
  }

  // -----------------------------------------------------------------------
  // Frame queries
  // -----------------------------------------------------------------------

  /** Current frame (front buffer, stable between ticks). */
  getFrame(): readonly number[] {
    return this._front
  }

  /** Whether an animation is playing. */
  get isPlaying(): boolean {
    return this._slot !== null
  }

  /** Label of the current slot, if any. */
  get currentLabel(): string | undefined {
    return this._slot?.label
  }

  get queueLength(): number {
    return this._queue.length
  }

  /** Frames the driver rejected. */
  get droppedFrames(): number {
    return this._droppedFrames
  }

  // -----------------------------------------------------------------------
  // Engine lifecycle
  // -----------------------------------------------------------------------

  /** Set the frame rate (frames per second). Default 10. */
  setFPS(fps: number): void {
    this._fps = Math.max(1, fps)
    // Restart timer if running
    if (this._timerId !== null) {
      this.stop()
      this.start()
    }
  }

  /** Current FPS. */
  get fps(): number {
    return this._fps
  }

  /** Whether the engine is ticking. */
  get isRunning(): boolean {
    return this._timerId !== null
  }

  /** Whether animations are enabled. */
  get isEnabled(): boolean {
    return this._enabled
  }

  set isEnabled(value: boolean) {
    this._enabled = value
    if (!value) this.clear()
  }

  /** Global frame counter (monotonically increasing). */
  get frame(): number {
    return this._globalFrame
  }

  /** Start the engine timer. */
  start(): void {
    if (this._timerId !== null) return
    const interval = Math.round(1000 / this._fps)
    this._timerId = this._setInterval(() => this.update(), interval)
  }

  /** Stop the engine timer. Buffers and slot are preserved. */
  stop(): void {
    if (this._timerId !== null) {
      this._clearInterval(this._timerId)
      this._timerId = null
    }
  }

  /** Full teardown: stop timer, clear all state. */
  destroy(): void {
    this.stop()
    this.clear()
    this._idleListeners.clear()
    this._driver = null
    this._globalFrame = 0
    this._droppedFrames = 0
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private _push(): void {
    if (!this._driver) return
    try {
      this._driver.setMatrixFrame(this._front)
    } catch (err) {
      this._droppedFrames++
      console.error(`[engine] Driver rejected frame ${this._globalFrame}:`, err)
    }
  }
}
