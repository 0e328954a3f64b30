export type MediaRef = string;

export interface ImageSegment {
  id: string;
  kind: 'image';
  imageRef: MediaRef;
  videoRepresentation?: MediaRef;
}

export interface VideoSegment {
  id: string;
  kind: 'video';
  videoRef: MediaRef;
}

export type Segment = ImageSegment | VideoSegment;

export interface SegmentInput {
  id?: string;
  imageRef?: MediaRef;
  videoRef?: MediaRef;
}

export type SlotId = 'A' | 'B';

export type SlotState = 'idle' | 'loaded' | 'playing' | 'paused';

export interface PlayerSlot {
  id: SlotId;
  loadedRef?: MediaRef;
  loadedSegmentIndex?: number;
  state: SlotState;
}

export type SchedulerStatus =
  | { kind: 'stopped' }
  | { kind: 'playingVideo'; slot: SlotId; index: number }
  | { kind: 'playingImage'; index: number }
  | { kind: 'exporting' };

export interface SchedulerState {
  status: SchedulerStatus;
  currentIndex: number;
  activeSlot: SlotId;
  running: boolean;
  hasTimer: boolean;
}

export type ExportStatus = 'idle' | 'merging' | 'failed' | 'completed';

export type ExportResult =
  | { type: 'video'; ref: MediaRef | null }
  | { type: 'image'; ref: MediaRef | null };

export interface CaptureSettings {
  exportStopMotionPhotoAsVideo: boolean;
}

/** Host media player behind one slot. Decoding happens on the host's side. */
export interface MediaPlayer {
  load(ref: MediaRef): void;
  play(): void;
  pause(): void;
  seekToStart(): void;
  /** Returns the function that removes the listener. */
  onEnded(listener: () => void): () => void;
  dispose(): void;
}

export interface PreviewSurface {
  showImage(ref: MediaRef): void;
  showSlot(slot: SlotId): void;
}

export interface ExportDelegate {
  onVideoExported(ref: MediaRef | null): void;
  onImageExported(ref: MediaRef | null): void;
  onDismissed(): void;
}

export interface AssetMergeService {
  merge(segments: readonly Segment[]): Promise<MediaRef | null>;
}

export type TimerHandle = ReturnType<typeof setTimeout>;

export interface TimerHost {
  setTimeout(callback: () => void, ms: number): TimerHandle;
  clearTimeout(handle: TimerHandle): void;
}

/** Runs a task on the scheduler's owner context. */
export type Dispatcher = (task: () => void) => void;
