/**
 * PlaybackClock
 *
 * Advances the model's playhead at wall-clock rate scaled by a speed factor.
 * Ticks run on a `setTimeout` chain: the next tick is scheduled only after
 * the previous tick and its listeners have returned, so ticks never overlap.
 *
 * The model owns `currentTime`; the clock only writes to it. In `audio` sync
 * mode the clock stops free-running and follows an attached audio transport.
 */

import type { AudioTransport, TimeSec, Unsubscribe } from '@/types';
import type { TimelineModelStore } from '@/stores/timelineModelStore';
import { PLAYBACK_SPEED_STEPS, TICK_INTERVAL_MS } from '@/constants/timeline';
import { InvalidRangeError } from './errors';
import { TypedEmitter } from './TypedEmitter';
import { createLogger } from '@/services/logger';

const logger = createLogger('PlaybackClock');

// =============================================================================
// Types
// =============================================================================

export type PlaybackState = 'stopped' | 'playing' | 'paused';

export type SyncSource = 'internal' | 'audio';

export interface PlaybackClockEvents {
  play: { time: TimeSec };
  paused: { time: TimeSec };
  stopped: { time: TimeSec };
  /** Reached the end with looping off */
  ended: { time: TimeSec };
  /** Wrapped back to the start */
  loop: { time: TimeSec };
  timeUpdate: { time: TimeSec };
  speedChange: { speed: number };
}

export interface PlaybackClockConfig {
  tickIntervalMs?: number;
  speedFactor?: number;
  loop?: boolean;
  syncSource?: SyncSource;
  /** Millisecond clock used to measure tick deltas */
  now?: () => number;
}

// =============================================================================
// Helpers
// =============================================================================

function checkSpeed(speed: number): void {
  if (!Number.isFinite(speed) || speed <= 0) {
    throw new InvalidRangeError(`Speed factor must be positive, got ${speed}`, speed, speed);
  }
}

// =============================================================================
// PlaybackClock Class
// =============================================================================

export class PlaybackClock extends TypedEmitter<PlaybackClockEvents> {
  // ---------------------------------------------------------------------------
  // State
  // ---------------------------------------------------------------------------

  private _state: PlaybackState = 'stopped';
  private _speedFactor: number;
  private _loop: boolean;
  private _syncSource: SyncSource;
  private readonly _tickIntervalMs: number;
  private readonly _now: () => number;
  private readonly _model: TimelineModelStore;

  private _timeoutId: ReturnType<typeof setTimeout> | null = null;
  private _lastTickAt: number = 0;
  private _isTicking: boolean = false;
  private _isDisposed: boolean = false;
  private _detachTransport: Unsubscribe | null = null;

  // ---------------------------------------------------------------------------
  // Constructor
  // ---------------------------------------------------------------------------

  constructor(model: TimelineModelStore, config: PlaybackClockConfig = {}) {
    super();
    const speed = config.speedFactor ?? 1;
    checkSpeed(speed);

    this._model = model;
    this._speedFactor = speed;
    this._loop = config.loop ?? false;
    this._syncSource = config.syncSource ?? 'internal';
    this._tickIntervalMs = config.tickIntervalMs ?? TICK_INTERVAL_MS;
    this._now = config.now ?? (() => Date.now());
  }

  // ---------------------------------------------------------------------------
  // Getters
  // ---------------------------------------------------------------------------

  get state(): PlaybackState {
    return this._state;
  }

  get isPlaying(): boolean {
    return this._state === 'playing';
  }

  get currentTime(): TimeSec {
    return this._model.getState().currentTime;
  }

  get totalDuration(): TimeSec {
    return this._model.getState().totalDuration;
  }

  get speedFactor(): number {
    return this._speedFactor;
  }

  get loop(): boolean {
    return this._loop;
  }

  get syncSource(): SyncSource {
    return this._syncSource;
  }

  // ---------------------------------------------------------------------------
  // Transport
  // ---------------------------------------------------------------------------

  /** Playing from the end with looping off restarts from 0. */
  play(): void {
    if (this._isDisposed || this._state === 'playing') return;

    if (!this._loop && this.currentTime >= this.totalDuration) {
      this._model.getState().setCurrentTime(0);
    }

    this._state = 'playing';
    this._lastTickAt = this._now();
    this._scheduleTick();
    this._emit('play', { time: this.currentTime });
    logger.debug('Playback started', { time: this.currentTime, speed: this._speedFactor });
  }

  pause(): void {
    if (this._isDisposed || this._state !== 'playing') return;

    this._cancelTick();
    this._state = 'paused';
    this._emit('paused', { time: this.currentTime });
  }

  /** Halt and rewind to 0. */
  stop(): void {
    if (this._isDisposed) return;

    this._cancelTick();
    this._state = 'stopped';
    this._model.getState().setCurrentTime(0);
    this._emit('stopped', { time: 0 });
    this._emit('timeUpdate', { time: 0 });
  }

  togglePlayback(): void {
    if (this._state === 'playing') {
      this.pause();
    } else {
      this.play();
    }
  }

  seek(time: TimeSec): void {
    if (this._isDisposed) return;

    this._model.getState().setCurrentTime(time);
    this._lastTickAt = this._now();
    this._emit('timeUpdate', { time: this.currentTime });
  }

  // ---------------------------------------------------------------------------
  // Speed & Loop
  // ---------------------------------------------------------------------------

  /** Throws `InvalidRangeError` for zero, negative or non-finite factors. */
  setSpeedFactor(speed: number): void {
    checkSpeed(speed);
    if (speed === this._speedFactor) return;

    this._speedFactor = speed;
    this._emit('speedChange', { speed });
  }

  /**
   * Move to the next or previous entry of `PLAYBACK_SPEED_STEPS`.
   * A factor between steps moves to the neighbouring step in that direction.
   */
  stepSpeed(direction: 1 | -1): number {
    const steps: readonly number[] = PLAYBACK_SPEED_STEPS;
    const next =
      direction > 0
        ? steps.find((step) => step > this._speedFactor)
        : [...steps].reverse().find((step) => step < this._speedFactor);

    if (next !== undefined) {
      this.setSpeedFactor(next);
    }
    return this._speedFactor;
  }

  setLoop(loop: boolean): void {
    this._loop = loop;
  }

  toggleLoop(): void {
    this._loop = !this._loop;
  }

  // ---------------------------------------------------------------------------
  // Audio Sync
  // ---------------------------------------------------------------------------

  setSyncSource(source: SyncSource): void {
    if (source === this._syncSource) return;

    this._syncSource = source;
    if (this._state === 'playing') {
      this._cancelTick();
      this._lastTickAt = this._now();
      this._scheduleTick();
    }
  }

  /**
   * Follow an audio transport. Duration reports always update the model;
   * positions drive the playhead only in `audio` mode while playing.
   *
   * @returns A function that detaches the transport
   */
  attachAudioTransport(transport: AudioTransport): Unsubscribe {
    this.detachAudioTransport();

    const offDuration = transport.onDurationKnown((duration) => {
      if (!(duration > 0) || !Number.isFinite(duration)) {
        logger.warn('Ignoring invalid audio duration', { duration });
        return;
      }
      this._model.getState().setTotalDuration(duration);
    });
    const offPosition = transport.onPosition((time) => {
      if (this._syncSource === 'audio' && this._state === 'playing') {
        this._applyTime(time);
      }
    });

    const detach = () => {
      offDuration();
      offPosition();
      if (this._detachTransport === detach) {
        this._detachTransport = null;
      }
    };
    this._detachTransport = detach;
    return detach;
  }

  detachAudioTransport(): void {
    this._detachTransport?.();
  }

  // ---------------------------------------------------------------------------
  // Ticking
  // ---------------------------------------------------------------------------

  /**
   * Advance by `frameDelta` seconds of wall-clock time, scaled by the speed
   * factor. Ignored unless playing on the internal clock.
   */
  advance(frameDelta: TimeSec): void {
    if (this._state !== 'playing' || this._syncSource !== 'internal') return;
    if (!(frameDelta > 0)) return;

    this._applyTime(this.currentTime + frameDelta * this._speedFactor);
  }

  private _applyTime(time: TimeSec): void {
    const { totalDuration, setCurrentTime } = this._model.getState();

    if (time < totalDuration) {
      setCurrentTime(time);
      this._emit('timeUpdate', { time: this.currentTime });
      return;
    }

    if (this._loop) {
      const wrapped = time % totalDuration;
      setCurrentTime(wrapped);
      this._emit('loop', { time: wrapped });
      this._emit('timeUpdate', { time: wrapped });
      return;
    }

    setCurrentTime(totalDuration);
    this._emit('timeUpdate', { time: totalDuration });
    this._cancelTick();
    this._state = 'stopped';
    this._emit('ended', { time: totalDuration });
  }

  /** Internal tick method - exposed for testing */
  _tick(): void {
    this._cancelTick();
    if (this._isTicking || this._state !== 'playing') return;

    const now = this._now();
    const frameDelta = (now - this._lastTickAt) / 1000;
    this._lastTickAt = now;

    this._isTicking = true;
    try {
      this.advance(frameDelta);
    } finally {
      this._isTicking = false;
    }

    if (this._state === 'playing') {
      this._scheduleTick();
    }
  }

  private _scheduleTick(): void {
    if (this._syncSource !== 'internal' || this._timeoutId !== null) return;
    this._timeoutId = setTimeout(() => this._tick(), this._tickIntervalMs);
  }

  private _cancelTick(): void {
    if (this._timeoutId !== null) {
      clearTimeout(this._timeoutId);
      this._timeoutId = null;
    }
  }

  // ---------------------------------------------------------------------------
  // Cleanup
  // ---------------------------------------------------------------------------

  dispose(): void {
    this._cancelTick();
    this.detachAudioTransport();
    this._state = 'stopped';
    this._isDisposed = true;
    this._removeAllListeners();

    logger.debug('PlaybackClock disposed');
  }
}
