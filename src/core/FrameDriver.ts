/**
 * FrameDriver
 *
 * Turns playhead movement into render calls. Listens to the clock's time
 * updates and to model `currentTime` changes (scrubbing, seeks), evaluates
 * every element at that time and hands each state to the renderer.
 */

import type { AnimatedElement, ElementId, PropertyMap, Renderer, TimeSec, Unsubscribe } from '@/types';
import type { TimelineModelStore } from '@/stores/timelineModelStore';
import type { PlaybackClock } from './PlaybackClock';
import { sampleElements } from '@/utils/keyframeInterpolation';
import { createLogger, serializeError } from '@/services/logger';

const logger = createLogger('FrameDriver');

export class FrameDriver {
  private _elements: readonly AnimatedElement[] = [];
  private _lastRenderedTime: TimeSec | null = null;
  private readonly _renderer: Renderer;
  private readonly _subscriptions: Unsubscribe[] = [];

  constructor(renderer: Renderer) {
    this._renderer = renderer;
  }

  get elements(): readonly AnimatedElement[] {
    return this._elements;
  }

  get lastRenderedTime(): TimeSec | null {
    return this._lastRenderedTime;
  }

  setElements(elements: readonly AnimatedElement[]): void {
    this._elements = [...elements];
  }

  /**
   * Render on clock ticks and on playhead moves made outside the clock.
   * Each time is rendered at most once in a row, so a tick that also moves
   * the model playhead does not draw twice.
   */
  attach(model: TimelineModelStore, clock: PlaybackClock): void {
    this.detach();
    this._subscriptions.push(
      clock.on('timeUpdate', ({ time }) => this._renderIfChanged(time)),
      model.subscribe((state, previous) => {
        if (state.currentTime !== previous.currentTime) {
          this._renderIfChanged(state.currentTime);
        }
      }),
    );
  }

  detach(): void {
    for (const unsubscribe of this._subscriptions.splice(0)) {
      unsubscribe();
    }
  }

  /**
   * Evaluate and draw every element at `time`. A renderer failure is logged
   * and the frame is abandoned so the next tick can proceed.
   */
  renderFrame(time: TimeSec): Map<ElementId, PropertyMap> {
    const frame = sampleElements(this._elements, time);
    this._lastRenderedTime = time;

    try {
      this._renderer.beginFrame?.(time);
      for (const [elementId, state] of frame) {
        this._renderer.renderElement(elementId, state);
      }
      this._renderer.endFrame?.(time);
    } catch (error) {
      logger.error('Renderer failed', { time, error: serializeError(error) });
    }
    return frame;
  }

  private _renderIfChanged(time: TimeSec): void {
    if (time === this._lastRenderedTime) return;
    this.renderFrame(time);
  }
}
