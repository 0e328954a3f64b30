import { describe, expect, it, vi } from 'vitest';
import type { CaptureSettings, MediaRef, Segment } from '../types/domain';
import { createPreviewStore } from '../store/previewStore';
import { createDelegate, createMergeService, syncDispatch, testLogger } from '../test/fakes';
import { ExportTrigger } from './exportTrigger';
import { createImageSegment, createVideoSegment } from './segments';

function setup(
  segments: Segment[],
  options: { settings?: CaptureSettings; mergeResults?: Array<MediaRef | null> } = {}
) {
  const delegate = createDelegate();
  const mergeService = createMergeService(...(options.mergeResults ?? []));
  const store = createPreviewStore();
  const trigger = new ExportTrigger({
    segments,
    settings: options.settings ?? { exportStopMotionPhotoAsVideo: false },
    mergeService,
    delegate,
    store,
    dispatch: syncDispatch,
    logger: testLogger
  });
  return { delegate, mergeService, store, trigger };
}

const threeSegments = () => [createVideoSegment('v1.mp4'), createImageSegment('p.jpg'), createVideoSegment('v2.mp4')];

describe('ExportTrigger', () => {
  describe('single photo', () => {
    it('should hand the photo straight to the delegate', async () => {
      const { trigger, delegate, mergeService, store } = setup([createImageSegment('photo.jpg', 'photo.mov')]);

      await trigger.confirm();

      expect(delegate.onImageExported).toHaveBeenCalledWith('photo.jpg');
      expect(delegate.onVideoExported).not.toHaveBeenCalled();
      expect(mergeService.merge).not.toHaveBeenCalled();
      expect(store.getState().loading).toBe(false);
      expect(store.getState().lastResult).toEqual({ type: 'image', ref: 'photo.jpg' });
      expect(trigger.getStatus()).toBe('completed');
    });

    it('should export the video representation when settings ask for video', async () => {
      const { trigger, delegate, mergeService } = setup([createImageSegment('photo.jpg', 'photo.mov')], {
        settings: { exportStopMotionPhotoAsVideo: true }
      });

      await trigger.confirm();

      expect(delegate.onVideoExported).toHaveBeenCalledWith('photo.mov');
      expect(delegate.onImageExported).not.toHaveBeenCalled();
      expect(mergeService.merge).not.toHaveBeenCalled();
    });

    it('should fall back to the photo when there is no video representation', async () => {
      const { trigger, delegate } = setup([createImageSegment('photo.jpg')], {
        settings: { exportStopMotionPhotoAsVideo: true }
      });

      await trigger.confirm();

      expect(delegate.onImageExported).toHaveBeenCalledWith('photo.jpg');
    });
  });

  describe('merge', () => {
    it('should merge a single clip', async () => {
      const segments = [createVideoSegment('clip.mp4')];
      const { trigger, delegate, mergeService } = setup(segments, { mergeResults: ['merged.mp4'] });

      await trigger.confirm();

      expect(mergeService.merge).toHaveBeenCalledWith(segments);
      expect(delegate.onVideoExported).toHaveBeenCalledWith('merged.mp4');
    });

    it('should keep loading and wait for a decision when the merge returns nothing', async () => {
      const { trigger, delegate, store } = setup(threeSegments(), { mergeResults: [null] });

      await trigger.confirm();

      expect(trigger.getStatus()).toBe('failed');
      expect(store.getState()).toMatchObject({ loading: true, exportStatus: 'failed', retryable: true });
      expect(delegate.onVideoExported).not.toHaveBeenCalled();
    });

    it('should treat a rejected merge as a failure', async () => {
      const { trigger, mergeService } = setup(threeSegments());
      mergeService.merge.mockRejectedValueOnce(new Error('disk full'));

      await trigger.confirm();

      expect(trigger.getStatus()).toBe('failed');
    });

    it('should retry with the identical segment list', async () => {
      const segments = threeSegments();
      const { trigger, delegate, mergeService, store } = setup(segments, { mergeResults: [null, 'merged.mp4'] });

      await trigger.confirm();
      await trigger.retry();

      expect(mergeService.merge).toHaveBeenCalledTimes(2);
      expect(mergeService.merge.mock.calls[0][0]).toBe(segments);
      expect(mergeService.merge.mock.calls[1][0]).toBe(segments);
      expect(delegate.onVideoExported).toHaveBeenCalledTimes(1);
      expect(delegate.onVideoExported).toHaveBeenCalledWith('merged.mp4');
      expect(store.getState()).toMatchObject({ loading: false, exportStatus: 'completed', retryable: false });
    });

    it('should report no result when the user cancels after a failure', async () => {
      const { trigger, delegate, store } = setup(threeSegments(), { mergeResults: [null] });

      await trigger.confirm();
      await trigger.cancel();

      expect(delegate.onVideoExported).toHaveBeenCalledTimes(1);
      expect(delegate.onVideoExported).toHaveBeenCalledWith(null);
      expect(store.getState()).toMatchObject({ loading: false, exportStatus: 'idle' });
      expect(trigger.getStatus()).toBe('idle');
    });

    it('should ignore retry and cancel unless a merge failed', async () => {
      const { trigger, delegate, mergeService } = setup(threeSegments());

      await trigger.retry();
      await trigger.cancel();

      expect(mergeService.merge).not.toHaveBeenCalled();
      expect(delegate.onVideoExported).not.toHaveBeenCalled();
    });

    it('should not start a second merge while one is in flight', async () => {
      const { trigger, delegate, mergeService } = setup(threeSegments());
      let resolveMerge: (ref: MediaRef | null) => void = () => undefined;
      mergeService.merge.mockReturnValueOnce(
        new Promise<MediaRef | null>((resolve) => {
          resolveMerge = resolve;
        })
      );

      const first = trigger.confirm();
      const second = trigger.confirm();
      expect(trigger.getStatus()).toBe('merging');

      resolveMerge('merged.mp4');
      await Promise.all([first, second]);

      expect(mergeService.merge).toHaveBeenCalledTimes(1);
      expect(delegate.onVideoExported).toHaveBeenCalledTimes(1);
    });

    it('should drop a merge result that arrives after dispose', async () => {
      const { trigger, delegate, mergeService } = setup(threeSegments());
      let resolveMerge: (ref: MediaRef | null) => void = () => undefined;
      mergeService.merge.mockReturnValueOnce(
        new Promise<MediaRef | null>((resolve) => {
          resolveMerge = resolve;
        })
      );

      const pending = trigger.confirm();
      trigger.dispose();
      resolveMerge('merged.mp4');
      await pending;

      expect(delegate.onVideoExported).not.toHaveBeenCalled();
    });
  });

  describe('reset', () => {
    it('should accept a new confirm after a completed export', async () => {
      const { trigger, delegate, store } = setup([createImageSegment('p.jpg')]);

      await trigger.confirm();
      expect(trigger.canConfirm()).toBe(false);

      trigger.reset();
      expect(trigger.canConfirm()).toBe(true);
      expect(store.getState()).toMatchObject({ exportStatus: 'idle', loading: false });

      await trigger.confirm();
      expect(delegate.onImageExported).toHaveBeenCalledTimes(2);
    });

    it('should drop the result of a merge that was running when reset', async () => {
      const { trigger, delegate, mergeService, store } = setup(threeSegments());
      let resolveMerge: (ref: MediaRef | null) => void = () => undefined;
      mergeService.merge.mockReturnValueOnce(
        new Promise<MediaRef | null>((resolve) => {
          resolveMerge = resolve;
        })
      );

      const pending = trigger.confirm();
      trigger.reset();
      expect(trigger.canConfirm()).toBe(false);

      resolveMerge('merged.mp4');
      await pending;

      expect(delegate.onVideoExported).not.toHaveBeenCalled();
      expect(trigger.getStatus()).toBe('idle');
      expect(trigger.canConfirm()).toBe(true);
      expect(store.getState()).toMatchObject({ exportStatus: 'idle', loading: false, lastResult: undefined });
    });

    it('should drop a delivery still queued on the dispatcher', async () => {
      const delegate = createDelegate();
      const queued: Array<() => void> = [];
      const trigger = new ExportTrigger({
        segments: [createImageSegment('photo.jpg')],
        settings: { exportStopMotionPhotoAsVideo: false },
        mergeService: createMergeService(),
        delegate,
        store: createPreviewStore(),
        dispatch: (task) => {
          queued.push(task);
        },
        logger: testLogger
      });

      const pending = trigger.confirm();
      trigger.reset();
      queued[0]();
      await pending;

      expect(delegate.onImageExported).not.toHaveBeenCalled();
    });
  });

  it('should deliver results through the dispatcher', async () => {
    const delegate = createDelegate();
    const queued: Array<() => void> = [];
    const dispatch = vi.fn((task: () => void) => {
      queued.push(task);
    });
    const trigger = new ExportTrigger({
      segments: [createImageSegment('photo.jpg')],
      settings: { exportStopMotionPhotoAsVideo: false },
      mergeService: createMergeService(),
      delegate,
      store: createPreviewStore(),
      dispatch,
      logger: testLogger
    });

    const pending = trigger.confirm();
    expect(delegate.onImageExported).not.toHaveBeenCalled();
    expect(queued).toHaveLength(1);

    queued[0]();
    await pending;
    expect(delegate.onImageExported).toHaveBeenCalledWith('photo.jpg');
  });
});
