/**
 * TimelineSession
 *
 * Wires one model, one interaction controller, one playback clock and one
 * frame driver together. A host creates a session per open document and
 * disposes it when the document closes.
 */

import type { AnimatedElement, AudioTransport, Renderer } from '@/types';
import { createTimelineModelStore, type TimelineModelStore } from '@/stores/timelineModelStore';
import { TimelineInteractionController } from './TimelineInteractionController';
import { PlaybackClock } from './PlaybackClock';
import { FrameDriver } from './FrameDriver';
import {
  parseTimelineConfig,
  resolveLogLevel,
  type TimelineConfig,
  type TimelineConfigInput,
} from '@/config/timelineConfig';
import { getElementsEndTime } from '@/utils/keyframeInterpolation';
import { createLogger, setGlobalLogLevel } from '@/services/logger';

const logger = createLogger('TimelineSession');

export interface TimelineSessionOptions {
  renderer: Renderer;
  /** An explicit `logLevel` here sets the global log level */
  config?: TimelineConfigInput;
  elements?: readonly AnimatedElement[];
  audioTransport?: AudioTransport;
  /** Millisecond clock for the playback clock */
  now?: () => number;
}

export interface TimelineSession {
  readonly config: TimelineConfig;
  readonly model: TimelineModelStore;
  readonly controller: TimelineInteractionController;
  readonly clock: PlaybackClock;
  readonly frameDriver: FrameDriver;
  /** Swap the elements and grow the timeline to fit their animations. */
  setElements(elements: readonly AnimatedElement[]): void;
  dispose(): void;
}

export function createTimelineSession(options: TimelineSessionOptions): TimelineSession {
  const config = parseTimelineConfig(options.config ?? {});
  // Only an explicit level overrides what the host set up
  if (options.config?.logLevel !== undefined) {
    setGlobalLogLevel(resolveLogLevel(config));
  }

  const model = createTimelineModelStore({ totalDuration: config.totalDuration });
  const controller = new TimelineInteractionController(model, {
    pixelsPerSecond: config.pixelsPerSecond,
    trackCount: config.trackCount,
    snapEnabled: config.snapEnabled,
  });
  const clock = new PlaybackClock(model, {
    tickIntervalMs: config.tickIntervalMs,
    speedFactor: config.speedFactor,
    loop: config.loop,
    syncSource: config.syncSource,
    now: options.now,
  });
  const frameDriver = new FrameDriver(options.renderer);
  frameDriver.attach(model, clock);

  if (options.audioTransport) {
    clock.attachAudioTransport(options.audioTransport);
  }

  const setElements = (elements: readonly AnimatedElement[]): void => {
    frameDriver.setElements(elements);
    const endTime = getElementsEndTime(elements);
    if (endTime > model.getState().totalDuration) {
      model.getState().setTotalDuration(endTime);
    }
    frameDriver.renderFrame(model.getState().currentTime);
  };

  if (options.elements) {
    setElements(options.elements);
  }

  logger.debug('Session created', { totalDuration: config.totalDuration, syncSource: config.syncSource });

  return {
    config,
    model,
    controller,
    clock,
    frameDriver,
    setElements,
    dispose: () => {
      clock.dispose();
      controller.dispose();
      frameDriver.detach();
      logger.debug('Session disposed');
    },
  };
}
