/**
 * Level Meter
 *
 * Turns each captured block into one normalized display level and hands
 * it to observers through a LevelChannel:
 * - RMS over all channels and frames
 * - dB conversion with a silence floor
 * - Normalization into the configured dB window, clamped to 0..1
 * - Optional one-pole smoothing
 *
 * process() runs on the capture path: no I/O, no logging, no observer
 * calls. Observers are notified later, from the channel flush.
 *
 * @module core/LevelMeter
 */

import {
  LevelChannel,
  type LevelListener,
  type MeterSnapshot,
  type MeterState,
  type MeterSubscription,
  type Scheduler,
} from './LevelChannel';
import { computeNormalizedLevel, smoothLevel } from './levelMath';
import { meterDebug } from './meterDebug';
import type { AudioBlock } from './audioBlock';
import {
  parseMeterConfig,
  type LevelMeterConfig,
  type LevelMeterConfigInput,
} from '../schemas/meterConfigSchema';
import type { StoreApi } from 'zustand/vanilla';

// ============ Types ============

export interface LevelMeterOptions {
  /** How deferred observer flushes are run (default: microtask) */
  scheduler?: Scheduler;
}

const ALLOWED_TRANSITIONS: Record<MeterState, readonly MeterState[]> = {
  stopped: ['starting'],
  starting: ['running', 'stopped'],
  running: ['stopped'],
};

// ============ Meter Class ============

export class LevelMeter {
  private readonly config: LevelMeterConfig;
  private readonly channel: LevelChannel;
  private level = 0;
  private state: MeterState = 'stopped';

  /**
   * @throws MeterError METER_ERR_INVALID_CONFIGURATION
   */
  constructor(config: LevelMeterConfigInput = {}, options: LevelMeterOptions = {}) {
    this.config = Object.freeze(parseMeterConfig(config));
    this.channel = new LevelChannel({ level: this.level, state: this.state }, options.scheduler);
  }

  /**
   * Compute and publish the level for one block.
   * A block without frames or channels is ignored and the previous level returned.
   */
  process(block: AudioBlock): number {
    if (block.frameCount === 0 || block.channelCount === 0) {
      return this.level;
    }

    const raw = computeNormalizedLevel(block, this.config, this.config.silenceFloor);
    this.level = this.config.smoothing > 0
      ? smoothLevel(this.level, raw, this.config.smoothing)
      : raw;

    this.channel.publish(this.level, this.state);
    return this.level;
  }

  /**
   * Move the lifecycle state machine. Driven by the capture controller.
   * @throws Error on a transition the state machine does not allow
   */
  transition(next: MeterState): void {
    if (next === this.state) return;

    if (!ALLOWED_TRANSITIONS[this.state].includes(next)) {
      throw new Error(`Invalid meter transition: ${this.state} -> ${next}`);
    }

    meterDebug('LevelMeter', `${this.state} -> ${next}`);
    this.state = next;
    this.channel.publish(this.level, this.state);
  }

  /**
   * Drop the level back to 0 and publish it.
   */
  reset(): void {
    this.level = 0;
    this.channel.publish(this.level, this.state);
  }

  // ============ Accessors ============

  getLevel(): number {
    return this.level;
  }

  getState(): MeterState {
    return this.state;
  }

  getConfig(): Readonly<LevelMeterConfig> {
    return this.config;
  }

  /** Snapshot as last delivered to observers */
  getSnapshot(): MeterSnapshot {
    return this.channel.getDelivered();
  }

  /** Delivered snapshots as a zustand store, for UI bindings */
  get store(): StoreApi<MeterSnapshot> {
    return this.channel.store;
  }

  // ============ Observers ============

  subscribe(listener: LevelListener): MeterSubscription {
    return this.channel.subscribe(listener);
  }

  unsubscribe(subscription: MeterSubscription): void {
    this.channel.unsubscribe(subscription);
  }

  get subscriberCount(): number {
    return this.channel.subscriberCount;
  }

  /**
   * Deliver any pending update now.
   */
  flush(): void {
    this.channel.flush();
  }

  /**
   * Remove all observers.
   */
  dispose(): void {
    this.channel.clear();
  }
}
