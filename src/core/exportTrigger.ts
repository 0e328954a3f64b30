import type {
  AssetMergeService,
  CaptureSettings,
  Dispatcher,
  ExportDelegate,
  ExportStatus,
  ImageSegment,
  MediaRef,
  Segment
} from '../types/domain';
import type { PreviewStore } from '../store/previewStore';
import { logger as rootLogger, type Logger } from '../shared/logger';

export interface ExportTriggerOptions {
  segments: readonly Segment[];
  settings: CaptureSettings;
  mergeService: AssetMergeService;
  delegate: ExportDelegate;
  store: PreviewStore;
  dispatch?: Dispatcher;
  logger?: Logger;
}

export const defaultDispatcher: Dispatcher = (task) => queueMicrotask(task);

/**
 * Turns a confirmed preview into one exported reference. Only one merge runs
 * at a time; a failed merge waits for `retry()` or `cancel()`.
 */
export class ExportTrigger {
  private status: ExportStatus = 'idle';
  private attempts = 0;
  private inFlight = false;
  private disposed = false;
  // Bumped by reset(); work started under an older generation never reaches the delegate.
  private generation = 0;
  private readonly segments: readonly Segment[];
  private readonly settings: CaptureSettings;
  private readonly mergeService: AssetMergeService;
  private readonly delegate: ExportDelegate;
  private readonly store: PreviewStore;
  private readonly dispatch: Dispatcher;
  private readonly logger: Logger;

  constructor(options: ExportTriggerOptions) {
    this.segments = options.segments;
    this.settings = options.settings;
    this.mergeService = options.mergeService;
    this.delegate = options.delegate;
    this.store = options.store;
    this.dispatch = options.dispatch ?? defaultDispatcher;
    this.logger = (options.logger ?? rootLogger).child('export');
  }

  getStatus(): ExportStatus {
    return this.status;
  }

  /** False while a merge is running, while a failure awaits retry or cancel, or after completion. */
  canConfirm(): boolean {
    return !this.disposed && !this.inFlight && this.status === 'idle';
  }

  async confirm(): Promise<void> {
    if (!this.canConfirm()) {
      this.logger.debug('confirm ignored', { status: this.status, inFlight: this.inFlight });
      return;
    }
    this.store.getState().setLoading(true);

    const photo = this.singlePhoto();
    if (!photo) {
      await this.runMerge();
      return;
    }

    this.setStatus('completed');
    const videoRef = this.settings.exportStopMotionPhotoAsVideo ? photo.videoRepresentation : undefined;
    if (videoRef) {
      this.logger.info('single photo exported as video', { ref: videoRef });
      await this.deliver(() => this.finish({ type: 'video', ref: videoRef }));
    } else {
      this.logger.info('single photo exported', { ref: photo.imageRef });
      await this.deliver(() => this.finish({ type: 'image', ref: photo.imageRef }));
    }
  }

  async retry(): Promise<void> {
    if (this.disposed || this.status !== 'failed') {
      this.logger.debug('retry ignored', { status: this.status });
      return;
    }
    await this.runMerge();
  }

  /** Gives up after a failed merge and reports "no result" to the delegate. */
  async cancel(): Promise<void> {
    if (this.disposed || this.status !== 'failed') {
      this.logger.debug('cancel ignored', { status: this.status });
      return;
    }
    this.setStatus('idle');
    this.logger.info('export cancelled', { attempts: this.attempts });
    await this.deliver(() => {
      const state = this.store.getState();
      state.recordResult({ type: 'video', ref: null });
      state.setLoading(false);
      this.delegate.onVideoExported(null);
    });
  }

  /**
   * Starts a new export session. A merge still running keeps the slot busy,
   * but its result is dropped.
   */
  reset(): void {
    if (this.status !== 'idle' || this.inFlight) {
      this.logger.info('export reset', { status: this.status, inFlight: this.inFlight });
    }
    this.generation += 1;
    this.setStatus('idle');
    this.store.getState().setLoading(false);
  }

  dispose(): void {
    this.disposed = true;
  }

  private singlePhoto(): ImageSegment | undefined {
    if (this.segments.length !== 1) return undefined;
    const [segment] = this.segments;
    return segment.kind === 'image' ? segment : undefined;
  }

  private async runMerge(): Promise<void> {
    this.setStatus('merging');
    this.attempts += 1;
    const attempt = this.attempts;
    const generation = this.generation;
    this.logger.info('merge started', { segments: this.segments.length, attempt });

    this.inFlight = true;
    const ref = await this.mergeOnce(attempt);
    this.inFlight = false;

    if (this.disposed || generation !== this.generation) {
      this.logger.warn('merge result dropped', { attempt, success: ref !== null });
      return;
    }

    await this.deliver(() => {
      if (ref) {
        this.setStatus('completed');
        this.logger.info('merge finished', { attempt, ref });
        this.finish({ type: 'video', ref });
      } else {
        this.setStatus('failed');
        this.logger.warn('merge failed', { attempt });
      }
    });
  }

  private async mergeOnce(attempt: number): Promise<MediaRef | null> {
    try {
      return await this.mergeService.merge(this.segments);
    } catch (error) {
      this.logger.error('merge threw', { attempt, error: error instanceof Error ? error.message : String(error) });
      return null;
    }
  }

  private finish(result: { type: 'video' | 'image'; ref: MediaRef }): void {
    const state = this.store.getState();
    state.recordResult(result);
    state.setLoading(false);
    if (result.type === 'video') {
      this.delegate.onVideoExported(result.ref);
    } else {
      this.delegate.onImageExported(result.ref);
    }
  }

  private setStatus(status: ExportStatus): void {
    this.status = status;
    this.store.getState().setExportStatus(status);
  }

  private deliver(task: () => void): Promise<void> {
    const generation = this.generation;
    return new Promise<void>((resolve, reject) => {
      this.dispatch(() => {
        if (this.disposed || generation !== this.generation) {
          this.logger.debug('delivery dropped', { generation });
          resolve();
          return;
        }
        try {
          task();
          resolve();
        } catch (error) {
          reject(error);
        }
      });
    });
  }
}
