/**
 * Public API
 */

// Types
export type {
  AnimatedElement,
  AnimationDescriptor,
  AudioTransport,
  EasingName,
  ElementId,
  PropertyMap,
  PropertyValue,
  Renderer,
  SegmentId,
  SegmentInput,
  SegmentKind,
  SegmentPatch,
  TimeSec,
  TimelineExport,
  TimelineSegment,
  Unsubscribe,
} from './types';
export { EASING_NAMES, SEGMENT_KINDS } from './types';
export * from './constants/timeline';

// Errors
export {
  InvalidRangeError,
  NotFoundError,
  TimelineError,
  TimelineValidationError,
  UnknownEasingWarning,
  fail,
  isTimelineError,
  ok,
} from './core/errors';
export type { MutationResult } from './core/errors';

// Logging & Config
export {
  LogLevel,
  addLogHandler,
  clearLogHandlers,
  clearLogHistory,
  consoleHandler,
  createLogger,
  exportLogHistory,
  getGlobalLogLevel,
  getLogHistory,
  initializeLogger,
  removeLogHandler,
  setGlobalLogLevel,
} from './services/logger';
export type { LogEntry, LogHandler, Logger, LoggerOptions } from './services/logger';
export {
  TimelineConfigSchema,
  loadTimelineConfigFromEnv,
  parseTimelineConfig,
  resolveLogLevel,
} from './config/timelineConfig';
export type { TimelineConfig, TimelineConfigInput } from './config/timelineConfig';

// Animation
export { ease, easingFunctions, isEasingName, resolveEasing } from './utils/easing';
export type { EasingFunction } from './utils/easing';
export { getAnimationEndTime, getElementsEndTime, sampleElements, stateAt } from './utils/keyframeInterpolation';

// Model
export { createTimelineModelStore } from './stores/timelineModelStore';
export type {
  TimelineModel,
  TimelineModelActions,
  TimelineModelOptions,
  TimelineModelState,
  TimelineModelStore,
} from './stores/timelineModelStore';
export { containsTime, segmentDuration, segmentsOverlap } from './utils/segment';

// Geometry & Snapping
export {
  DEFAULT_LAYOUT,
  clampZoom,
  formatTime,
  pixelToTime,
  timeToPixel,
  trackAtY,
  trackTop,
} from './utils/timeline';
export type { TimelineLayout } from './utils/timeline';
export { collectSnapPoints, findNearestSnapPoint, snapRange, snapTime } from './utils/snapping';
export type { SnapPoint, SnapPointType } from './utils/snapping';

// Controllers
export { TypedEmitter } from './core/TypedEmitter';
export { TimelineInteractionController } from './core/TimelineInteractionController';
export type {
  CursorHint,
  HitResult,
  InteractionControllerConfig,
  InteractionEvents,
  InteractionState,
  Modifiers,
  PointerInput,
  SegmentDraft,
} from './core/TimelineInteractionController';
export { PlaybackClock } from './core/PlaybackClock';
export type { PlaybackClockConfig, PlaybackClockEvents, PlaybackState, SyncSource } from './core/PlaybackClock';
export { FrameDriver } from './core/FrameDriver';
export { createTimelineSession } from './core/TimelineSession';
export type { TimelineSession, TimelineSessionOptions } from './core/TimelineSession';

// Persistence
export {
  TimelineExportSchema,
  exportTimeline,
  exportTimelineJson,
  importTimeline,
  importTimelineJson,
  parseAnimatedElements,
  parseTimelineExport,
} from './schemas/timelineSchemas';
