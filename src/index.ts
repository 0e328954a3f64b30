export * from './types/domain';
export { createCameraPreview, type CameraPreview, type CameraPreviewOptions } from './core/cameraPreview';
export { PlaybackScheduler, globalTimers, type PlaybackSchedulerOptions } from './core/playbackScheduler';
export { DualPlayerPool, otherSlot, SLOT_IDS } from './core/dualPlayerPool';
export { ExportTrigger, defaultDispatcher, type ExportTriggerOptions } from './core/exportTrigger';
export {
  assertPlayableSegments,
  createImageSegment,
  createSegment,
  createVideoSegment,
  segmentRef,
  SegmentValidationError
} from './core/segments';
export { validateSegments } from './core/validators';
export { createPreviewStore, type PreviewState, type PreviewStore } from './store/previewStore';
export { loadPreviewConfig, PreviewConfigError, STOP_MOTION_FRAME_INTERVAL_MS, type PreviewConfig } from './shared/config';
export { Logger, logger } from './shared/logger';
