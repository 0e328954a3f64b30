import type { MediaPlayer, MediaRef, PlayerSlot, SlotId } from '../types/domain';
import { logger as rootLogger, type Logger } from '../shared/logger';

export const SLOT_IDS: readonly SlotId[] = ['A', 'B'];

export function otherSlot(slot: SlotId): SlotId {
  return slot === 'A' ? 'B' : 'A';
}

interface SlotEntry {
  player: MediaPlayer;
  snapshot: PlayerSlot;
  detachEnded?: () => void;
}

/**
 * Two interchangeable players addressed by slot. Which slot is active is
 * plain bookkeeping; presenting it is the caller's job.
 */
export class DualPlayerPool {
  private readonly slots: Record<SlotId, SlotEntry>;
  private active: SlotId = 'A';
  private disposed = false;
  private readonly logger: Logger;

  constructor(
    players: readonly [MediaPlayer, MediaPlayer],
    private readonly onReachedEnd: (slot: SlotId) => void,
    logger: Logger = rootLogger
  ) {
    this.logger = logger.child('pool');
    this.slots = {
      A: { player: players[0], snapshot: { id: 'A', state: 'idle' } },
      B: { player: players[1], snapshot: { id: 'B', state: 'idle' } }
    };
  }

  /** Returns false when the slot already held `ref` and nothing was loaded. */
  load(slot: SlotId, ref: MediaRef, segmentIndex?: number): boolean {
    this.ensureAlive();
    const entry = this.slots[slot];
    if (entry.snapshot.loadedRef === ref) {
      if (segmentIndex !== undefined) entry.snapshot.loadedSegmentIndex = segmentIndex;
      return false;
    }
    this.detach(entry);
    entry.player.load(ref);
    entry.snapshot = { id: slot, loadedRef: ref, loadedSegmentIndex: segmentIndex, state: 'loaded' };
    this.logger.debug('load', { slot, ref, index: segmentIndex });
    return true;
  }

  play(slot: SlotId): void {
    this.ensureAlive();
    const entry = this.slots[slot];
    if (!entry.snapshot.loadedRef) {
      throw new Error(`Slot ${slot} has nothing loaded to play`);
    }
    this.detach(entry);
    let fired = false;
    const unsubscribe = entry.player.onEnded(() => {
      if (fired || entry.detachEnded !== unsubscribe) return;
      fired = true;
      this.detach(entry);
      this.onReachedEnd(slot);
    });
    entry.detachEnded = unsubscribe;
    entry.snapshot.state = 'playing';
    entry.player.play();
  }

  pause(slot: SlotId): void {
    const entry = this.slots[slot];
    this.detach(entry);
    if (entry.snapshot.state !== 'playing') return;
    entry.player.pause();
    entry.snapshot.state = 'paused';
  }

  seekToStart(slot: SlotId): void {
    const entry = this.slots[slot];
    this.detach(entry);
    if (!entry.snapshot.loadedRef) return;
    entry.player.seekToStart();
  }

  isActive(slot: SlotId): boolean {
    return this.active === slot;
  }

  activate(slot: SlotId): void {
    this.active = slot;
  }

  activeSlot(): SlotId {
    return this.active;
  }

  standbySlot(): SlotId {
    return otherSlot(this.active);
  }

  slotHolding(ref: MediaRef): SlotId | undefined {
    return SLOT_IDS.find((slot) => this.slots[slot].snapshot.loadedRef === ref);
  }

  getSlot(slot: SlotId): PlayerSlot {
    return { ...this.slots[slot].snapshot };
  }

  dispose(): void {
    if (this.disposed) return;
    for (const slot of SLOT_IDS) {
      const entry = this.slots[slot];
      this.pause(slot);
      entry.player.dispose();
      entry.snapshot = { id: slot, state: 'idle' };
    }
    this.disposed = true;
  }

  private detach(entry: SlotEntry): void {
    const detachEnded = entry.detachEnded;
    entry.detachEnded = undefined;
    detachEnded?.();
  }

  private ensureAlive(): void {
    if (this.disposed) {
      throw new Error('Player pool has been disposed');
    }
  }
}
