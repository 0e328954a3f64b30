import type {
  AssetMergeService,
  CaptureSettings,
  Dispatcher,
  ExportDelegate,
  MediaPlayer,
  PreviewSurface,
  SchedulerState,
  Segment,
  SegmentInput,
  TimerHost
} from '../types/domain';
import { loadPreviewConfig, type PreviewConfig } from '../shared/config';
import { logger as rootLogger, type Logger } from '../shared/logger';
import { createPreviewStore, type PreviewStore } from '../store/previewStore';
import { ExportTrigger } from './exportTrigger';
import { PlaybackScheduler } from './playbackScheduler';
import { assertPlayableSegments, createSegment } from './segments';

export interface CameraPreviewOptions {
  segments: ReadonlyArray<Segment | SegmentInput>;
  settings: CaptureSettings;
  players: readonly [MediaPlayer, MediaPlayer];
  mergeService: AssetMergeService;
  delegate: ExportDelegate;
  surface?: PreviewSurface;
  config?: PreviewConfig;
  timers?: TimerHost;
  dispatch?: Dispatcher;
  logger?: Logger;
}

export interface CameraPreview {
  readonly store: PreviewStore;
  /** Call whenever the preview screen becomes visible. */
  appear(): void;
  confirm(): Promise<void>;
  dismiss(): void;
  retryExport(): Promise<void>;
  cancelExport(): Promise<void>;
  dispose(): void;
  getState(): SchedulerState;
}

function toSegment(value: Segment | SegmentInput): Segment {
  return 'kind' in value ? value : createSegment(value);
}

export function createCameraPreview(options: CameraPreviewOptions): CameraPreview {
  const segments = assertPlayableSegments(options.segments.map(toSegment));
  const logger = options.logger ?? rootLogger;
  const store = createPreviewStore();
  const exporter = new ExportTrigger({
    segments,
    settings: options.settings,
    mergeService: options.mergeService,
    delegate: options.delegate,
    store,
    dispatch: options.dispatch,
    logger
  });
  const scheduler = new PlaybackScheduler({
    segments,
    players: options.players,
    config: options.config ?? loadPreviewConfig(),
    exporter,
    delegate: options.delegate,
    surface: options.surface,
    store,
    timers: options.timers,
    logger
  });

  return {
    store,
    appear: () => scheduler.start(),
    confirm: () => scheduler.confirm(),
    dismiss: () => scheduler.dismiss(),
    retryExport: () => exporter.retry(),
    cancelExport: () => exporter.cancel(),
    dispose: () => scheduler.dispose(),
    getState: () => scheduler.getState()
  };
}
