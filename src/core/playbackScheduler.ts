import type {
  ExportDelegate,
  MediaRef,
  MediaPlayer,
  PreviewSurface,
  SchedulerState,
  SchedulerStatus,
  Segment,
  SlotId,
  TimerHandle,
  TimerHost
} from '../types/domain';
import type { PreviewConfig } from '../shared/config';
import { logger as rootLogger, type Logger } from '../shared/logger';
import { createPreviewStore, type PreviewStore } from '../store/previewStore';
import { DualPlayerPool } from './dualPlayerPool';
import type { ExportTrigger } from './exportTrigger';
import { assertPlayableSegments, segmentRef } from './segments';

export interface PlaybackSchedulerOptions {
  segments: readonly Segment[];
  players: readonly [MediaPlayer, MediaPlayer];
  config: PreviewConfig;
  exporter: ExportTrigger;
  delegate: ExportDelegate;
  surface?: PreviewSurface;
  store?: PreviewStore;
  timers?: TimerHost;
  logger?: Logger;
}

export const globalTimers: TimerHost = {
  setTimeout: (callback, ms) => setTimeout(callback, ms),
  clearTimeout: (handle) => clearTimeout(handle)
};

/**
 * Loops an ordered segment list through two player slots. While one slot
 * plays, the next video is loaded into the other, so the handoff at the end
 * of a clip never waits on a decoder.
 */
export class PlaybackScheduler {
  private readonly segments: readonly Segment[];
  private readonly pool: DualPlayerPool;
  private readonly config: PreviewConfig;
  private readonly exporter: ExportTrigger;
  private readonly delegate: ExportDelegate;
  private readonly surface?: PreviewSurface;
  private readonly store: PreviewStore;
  private readonly timers: TimerHost;
  private readonly logger: Logger;

  private status: SchedulerStatus = { kind: 'stopped' };
  private currentIndex = 0;
  private running = false;
  private dismissed = false;
  private disposed = false;
  // Bumped on every segment entry and on stop; callbacks from an older cycle are dropped.
  private cycle = 0;
  private imageTimer?: TimerHandle;
  private stallTimer?: TimerHandle;

  constructor(options: PlaybackSchedulerOptions) {
    this.segments = assertPlayableSegments(options.segments);
    this.config = options.config;
    this.exporter = options.exporter;
    this.delegate = options.delegate;
    this.surface = options.surface;
    this.store = options.store ?? createPreviewStore();
    this.timers = options.timers ?? globalTimers;
    this.logger = (options.logger ?? rootLogger).child('scheduler');
    this.pool = new DualPlayerPool(options.players, (slot) => this.handleReachedEnd(slot), this.logger);
  }

  /** Starts at the first segment, restarting if already playing. */
  start(): void {
    this.ensureAlive();
    this.stop();
    this.pool.seekToStart('A');
    this.pool.seekToStart('B');
    this.pool.activate('A');
    this.exporter.reset();
    this.currentIndex = 0;
    this.running = true;
    this.dismissed = false;
    this.logger.info('playback started', { segments: this.segments.length });
    this.enterSegment(true);
  }

  stop(): void {
    this.cycle += 1;
    this.clearTimers();
    if (this.status.kind === 'playingVideo') {
      this.pool.pause(this.status.slot);
    }
    const wasRunning = this.running;
    this.running = false;
    this.setStatus({ kind: 'stopped' });
    if (wasRunning) this.logger.debug('playback stopped', { index: this.currentIndex });
  }

  async confirm(): Promise<void> {
    if (this.disposed) return;
    if (!this.exporter.canConfirm()) {
      this.logger.debug('confirm ignored, export busy');
      return;
    }
    this.stop();
    this.setStatus({ kind: 'exporting' });
    await this.exporter.confirm();
  }

  dismiss(): void {
    if (this.disposed || this.dismissed) return;
    this.stop();
    this.exporter.reset();
    this.dismissed = true;
    this.logger.info('preview dismissed');
    this.delegate.onDismissed();
  }

  dispose(): void {
    if (this.disposed) return;
    this.stop();
    this.exporter.dispose();
    this.pool.dispose();
    this.disposed = true;
  }

  getState(): SchedulerState {
    return {
      status: this.status,
      currentIndex: this.currentIndex,
      activeSlot: this.pool.activeSlot(),
      running: this.running,
      hasTimer: this.imageTimer !== undefined
    };
  }

  getPool(): DualPlayerPool {
    return this.pool;
  }

  private enterSegment(initial: boolean): void {
    this.cycle += 1;
    const cycle = this.cycle;
    const index = this.currentIndex;
    const segment = this.segments[index];
    this.logger.debug('segment entered', { index, kind: segment.kind, ref: segmentRef(segment) });

    if (segment.kind === 'image') {
      this.surface?.showImage(segment.imageRef);
      this.store.getState().presentImage(segment.imageRef);
      this.imageTimer = this.timers.setTimeout(() => {
        this.imageTimer = undefined;
        this.advance(cycle);
      }, this.config.stopMotionFrameIntervalMs);
      this.setStatus({ kind: 'playingImage', index });
    } else {
      const slot = initial ? this.pool.activeSlot() : this.pickSlot(segment.videoRef);
      this.pool.activate(slot);
      this.pool.load(slot, segment.videoRef, index);
      this.surface?.showSlot(slot);
      this.setStatus({ kind: 'playingVideo', slot, index });
      this.armStallWatchdog(cycle, index);
      // A clip can end inside play(); the status above must already name this slot.
      this.pool.play(slot);
      if (cycle !== this.cycle) return;
    }

    this.preloadNext();
  }

  /** Standby slot when it holds the clip, else any idle slot that does, else the toggled one. */
  private pickSlot(ref: MediaRef): SlotId {
    const standby = this.pool.standbySlot();
    if (this.pool.getSlot(standby).loadedRef === ref) return standby;
    return this.pool.slotHolding(ref) ?? standby;
  }

  private preloadNext(): void {
    const nextIndex = (this.currentIndex + 1) % this.segments.length;
    const next = this.segments[nextIndex];
    if (next.kind !== 'video') return;
    const holder = this.pool.slotHolding(next.videoRef);
    const playing = this.status.kind === 'playingVideo' ? this.status.slot : undefined;
    if (holder !== undefined && holder !== playing) return;
    this.pool.load(this.pool.standbySlot(), next.videoRef, nextIndex);
  }

  private handleReachedEnd(slot: SlotId): void {
    if (this.status.kind !== 'playingVideo' || this.status.slot !== slot) {
      this.logger.debug('stale end of item ignored', { slot });
      return;
    }
    this.advance(this.cycle);
  }

  private advance(cycle: number): void {
    if (!this.running || cycle !== this.cycle) return;
    this.clearTimers();
    if (this.status.kind === 'playingVideo') {
      const { slot } = this.status;
      this.pool.pause(slot);
      this.pool.seekToStart(slot);
    }
    this.currentIndex = (this.currentIndex + 1) % this.segments.length;
    this.enterSegment(false);
  }

  private armStallWatchdog(cycle: number, index: number): void {
    const timeoutMs = this.config.decoderStallTimeoutMs;
    if (timeoutMs === undefined) return;
    this.stallTimer = this.timers.setTimeout(() => {
      this.stallTimer = undefined;
      if (cycle !== this.cycle) return;
      this.logger.warn('end of item never arrived, skipping clip', { index, timeoutMs });
      this.advance(cycle);
    }, timeoutMs);
  }

  private clearTimers(): void {
    if (this.imageTimer !== undefined) {
      this.timers.clearTimeout(this.imageTimer);
      this.imageTimer = undefined;
    }
    if (this.stallTimer !== undefined) {
      this.timers.clearTimeout(this.stallTimer);
      this.stallTimer = undefined;
    }
  }

  private setStatus(status: SchedulerStatus): void {
    this.status = status;
    this.store.getState().setPlayback({
      status,
      currentIndex: this.currentIndex,
      activeSlot: this.pool.activeSlot()
    });
  }

  private ensureAlive(): void {
    if (this.disposed) {
      throw new Error('Playback scheduler has been disposed');
    }
  }
}
