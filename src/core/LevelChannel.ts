/**
 * Level Channel
 *
 * Single-producer / multi-consumer handoff between the capture callback
 * and observers. The producer only writes the latest snapshot and asks the
 * scheduler for a flush; observers are notified from the flush, never from
 * inside publish(). Snapshots published between two flushes are coalesced,
 * only the newest is delivered, and delivered sequences only ever grow.
 *
 * The delivered snapshot lives in a zustand vanilla store so UI bindings
 * can read it with zustand's own hooks.
 *
 * @module core/LevelChannel
 */

import { createStore, type StoreApi } from 'zustand/vanilla';

// ============ Types ============

export type MeterState = 'stopped' | 'starting' | 'running';

export interface MeterSnapshot {
  /** Normalized level, 0..1 */
  level: number;
  state: MeterState;
  /** Incremented on every publish */
  sequence: number;
}

/** Runs a flush some time after the current call returns */
export type Scheduler = (flush: () => void) => void;

export type LevelListener = (level: number, state: MeterState) => void;

export interface MeterSubscription {
  readonly id: number;
  unsubscribe(): void;
}

export const microtaskScheduler: Scheduler = flush => queueMicrotask(flush);

// ============ Channel ============

export class LevelChannel {
  readonly store: StoreApi<MeterSnapshot>;

  private latest: MeterSnapshot;
  private flushPending = false;
  private readonly scheduler: Scheduler;
  private readonly subscriptions = new Map<number, () => void>();
  private nextSubscriptionId = 1;

  constructor(initial: Omit<MeterSnapshot, 'sequence'>, scheduler: Scheduler = microtaskScheduler) {
    this.latest = { ...initial, sequence: 0 };
    this.store = createStore<MeterSnapshot>()(() => this.latest);
    this.scheduler = scheduler;
  }

  /**
   * Replace the latest snapshot. Never calls observers directly.
   */
  publish(level: number, state: MeterState): void {
    this.latest = { level, state, sequence: this.latest.sequence + 1 };

    if (!this.flushPending) {
      this.flushPending = true;
      this.scheduler(() => this.flush());
    }
  }

  /**
   * Deliver the newest snapshot to observers, if it has not been delivered yet.
   */
  flush(): void {
    this.flushPending = false;
    const snapshot = this.latest;
    if (snapshot.sequence <= this.store.getState().sequence) return;
    this.store.setState(snapshot, true);
  }

  /** Newest published snapshot (may not be delivered yet) */
  getLatest(): MeterSnapshot {
    return this.latest;
  }

  /** Snapshot observers have last seen */
  getDelivered(): MeterSnapshot {
    return this.store.getState();
  }

  hasPendingFlush(): boolean {
    return this.flushPending;
  }

  subscribe(listener: LevelListener): MeterSubscription {
    const id = this.nextSubscriptionId++;
    const unsubscribeStore = this.store.subscribe(snapshot => {
      try {
        listener(snapshot.level, snapshot.state);
      } catch (err) {
        // One failing observer must not starve the others
        console.error('[LevelChannel] Subscriber threw:', err);
      }
    });
    this.subscriptions.set(id, unsubscribeStore);

    return {
      id,
      unsubscribe: () => this.unsubscribe(id),
    };
  }

  /**
   * Remove a subscription. Unknown or already removed ids are ignored.
   */
  unsubscribe(subscription: MeterSubscription | number): void {
    const id = typeof subscription === 'number' ? subscription : subscription.id;
    const unsubscribeStore = this.subscriptions.get(id);
    if (!unsubscribeStore) return;
    unsubscribeStore();
    this.subscriptions.delete(id);
  }

  get subscriberCount(): number {
    return this.subscriptions.size;
  }

  /**
   * Drop every subscriber.
   */
  clear(): void {
    this.subscriptions.forEach(unsubscribeStore => unsubscribeStore());
    this.subscriptions.clear();
  }
}
