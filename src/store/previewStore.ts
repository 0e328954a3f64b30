import { createStore, type StoreApi } from 'zustand/vanilla';
import type { ExportResult, ExportStatus, MediaRef, SchedulerStatus, SlotId } from '../types/domain';

interface PlaybackSnapshot {
  status: SchedulerStatus;
  currentIndex: number;
  activeSlot: SlotId;
}

export interface PreviewState extends PlaybackSnapshot {
  presentedImage?: MediaRef;
  loading: boolean;
  exportStatus: ExportStatus;
  retryable: boolean;
  lastResult?: ExportResult;
  setPlayback: (snapshot: PlaybackSnapshot) => void;
  presentImage: (ref?: MediaRef) => void;
  setLoading: (loading: boolean) => void;
  setExportStatus: (exportStatus: ExportStatus) => void;
  recordResult: (result: ExportResult) => void;
}

export type PreviewStore = StoreApi<PreviewState>;

export const createPreviewStore = (): PreviewStore =>
  createStore<PreviewState>()((set) => ({
    status: { kind: 'stopped' },
    currentIndex: 0,
    activeSlot: 'A',
    presentedImage: undefined,
    loading: false,
    exportStatus: 'idle',
    retryable: false,
    lastResult: undefined,
    setPlayback: ({ status, currentIndex, activeSlot }) =>
      set((state) => ({
        status,
        currentIndex,
        activeSlot,
        presentedImage: status.kind === 'playingImage' ? state.presentedImage : undefined
      })),
    presentImage: (presentedImage) => set({ presentedImage }),
    setLoading: (loading) => set({ loading }),
    setExportStatus: (exportStatus) => set({ exportStatus, retryable: exportStatus === 'failed' }),
    recordResult: (lastResult) => set({ lastResult })
  }));
