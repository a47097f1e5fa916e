/**
 * Animation triggers.
 *
 * Triggers decide *when* animations fire. They observe engine state and
 * call engine.play().
 *
 * No React, no DOM -- pure TypeScript.
 */

import type { AnimationEngine } from './engine.js'
import type { AnimationSlot } from './types.js'

// ---------------------------------------------------------------------------
// PlaylistTrigger
// ---------------------------------------------------------------------------

/**
 * Plays a fixed list of slots in order, advancing whenever the engine runs
 * out of work, and wrapping back to the first entry after the last.
 *
 * Entries need a finite duration; an entry with `duration: null` plays
 * until something else replaces it.
 */
export class PlaylistTrigger {
  private _entries: AnimationSlot[]
  private _index: number = 0
  private _engine: AnimationEngine | null = null
  private _unsubscribe: (() => void) | null = null

  constructor(entries: AnimationSlot[]) {
    this._entries = [...entries]
  }

  /** Start playing from the first entry. */
  start(engine: AnimationEngine): void {
    this.stop()
    if (this._entries.length === 0) return
    this._engine = engine
    this._index = 0
    this._unsubscribe = engine.onIdle(() => this._advance())
    engine.play(this._entries[0])
  }

  /** Stop advancing. The current entry keeps playing until it ends. */
  stop(): void {
    this._unsubscribe?.()
    this._unsubscribe = null
    this._engine = null
  }

  /** Whether the trigger is active. */
  isActive(): boolean {
    return this._engine !== null
  }

  /** Index of the entry most recently started. */
  get currentIndex(): number {
    return this._index
  }

  get length(): number {
    return this._entries.length
  }

  private _advance(): void {
    if (!this._engine) return
    this._index = (this._index + 1) % this._entries.length
    this._engine.play(this._entries[this._index])
  }
}
