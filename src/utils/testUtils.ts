/**
 * Meter Test Utilities
 *
 * Helpers for testing the meter, the channel and the capture controller
 * without audio hardware.
 *
 * @module utils/testUtils
 */

import type { AudioSource, BlockCallback, PermissionOutcome } from '../audio-engine/AudioSource';
import { createAudioBlock, type AudioBlock } from '../core/audioBlock';
import type { Scheduler } from '../core/LevelChannel';

// ============ Block Generators ============

/**
 * Block where every sample of every channel has the same value.
 */
export function createConstantBlock(value: number, frameCount = 1024, channelCount = 1): AudioBlock {
  const channels: Float32Array[] = [];
  for (let ch = 0; ch < channelCount; ch++) {
    channels.push(new Float32Array(frameCount).fill(value));
  }
  return createAudioBlock(channels);
}

export function createSilentBlock(frameCount = 1024, channelCount = 1): AudioBlock {
  return createConstantBlock(0, frameCount, channelCount);
}

/**
 * Sine block at the given amplitude; RMS is amplitude / sqrt(2) over whole periods.
 */
export function createSineBlock(
  amplitude: number,
  frequency = 1000,
  sampleRate = 48000,
  frameCount = 1024,
  channelCount = 1
): AudioBlock {
  const channels: Float32Array[] = [];
  for (let ch = 0; ch < channelCount; ch++) {
    const data = new Float32Array(frameCount);
    for (let i = 0; i < frameCount; i++) {
      data[i] = amplitude * Math.sin((2 * Math.PI * frequency * i) / sampleRate);
    }
    channels.push(data);
  }
  return createAudioBlock(channels);
}

/**
 * A block with channels but no frames.
 */
export function createEmptyBlock(channelCount = 1): AudioBlock {
  return {
    channelCount,
    frameCount: 0,
    samples: Array.from({ length: channelCount }, () => new Float32Array(0)),
  };
}

// ============ Scheduler ============

export interface ManualScheduler {
  scheduler: Scheduler;
  /** Run every queued flush */
  runAll: () => void;
  readonly queued: number;
}

/**
 * Scheduler that only runs flushes when asked to.
 */
export function createManualScheduler(): ManualScheduler {
  const queue: Array<() => void> = [];
  return {
    scheduler: flush => {
      queue.push(flush);
    },
    runAll: () => {
      while (queue.length > 0) {
        const flush = queue.shift();
        flush?.();
      }
    },
    get queued() {
      return queue.length;
    },
  };
}

// ============ Fake Audio Source ============

export interface FakeStreamHandle {
  readonly id: number;
}

export interface FakeAudioSourceOptions {
  permission?: PermissionOutcome;
  /** Reject openInputStream with this error */
  openError?: Error;
}

interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>(res => {
    resolve = res;
  });
  return { promise, resolve };
}

/**
 * In-process stand-in for the platform audio input.
 */
export class FakeAudioSource implements AudioSource<FakeStreamHandle> {
  permission: PermissionOutcome;
  openError: Error | null;

  readonly calls = {
    requestPermission: 0,
    openInputStream: [] as Array<{ sampleRate: number; channelHint: number; blockSize: number }>,
    onBlock: 0,
    closeInputStream: [] as FakeStreamHandle[],
  };

  private callbacks = new Map<number, BlockCallback>();
  private nextId = 1;
  private heldPermission: Deferred<PermissionOutcome> | null = null;
  private heldOpen: Deferred<FakeStreamHandle> | null = null;
  private latestCallback: BlockCallback | null = null;

  constructor(options: FakeAudioSourceOptions = {}) {
    this.permission = options.permission ?? 'granted';
    this.openError = options.openError ?? null;
  }

  /**
   * Keep the next requestPermission() pending until releasePermission().
   */
  holdPermission(): void {
    this.heldPermission = createDeferred<PermissionOutcome>();
  }

  releasePermission(outcome: PermissionOutcome = this.permission): void {
    const held = this.heldPermission;
    this.heldPermission = null;
    held?.resolve(outcome);
  }

  /**
   * Keep the next openInputStream() pending until releaseOpen().
   */
  holdOpen(): void {
    this.heldOpen = createDeferred<FakeStreamHandle>();
  }

  releaseOpen(): FakeStreamHandle {
    const handle = { id: this.nextId++ };
    const held = this.heldOpen;
    this.heldOpen = null;
    held?.resolve(handle);
    return handle;
  }

  requestPermission(): Promise<PermissionOutcome> {
    this.calls.requestPermission++;
    if (this.heldPermission) return this.heldPermission.promise;
    return Promise.resolve(this.permission);
  }

  openInputStream(sampleRate: number, channelHint: number, blockSize: number): Promise<FakeStreamHandle> {
    this.calls.openInputStream.push({ sampleRate, channelHint, blockSize });
    if (this.openError) return Promise.reject(this.openError);
    if (this.heldOpen) return this.heldOpen.promise;
    return Promise.resolve({ id: this.nextId++ });
  }

  onBlock(handle: FakeStreamHandle, callback: BlockCallback): void {
    this.calls.onBlock++;
    this.callbacks.set(handle.id, callback);
    this.latestCallback = callback;
  }

  closeInputStream(handle: FakeStreamHandle): void {
    this.calls.closeInputStream.push(handle);
    this.callbacks.delete(handle.id);
  }

  /** Most recently installed callback, kept even after close */
  get lastCallback(): BlockCallback | null {
    return this.latestCallback;
  }

  get installedCallbacks(): number {
    return this.callbacks.size;
  }

  /**
   * Deliver a block to every installed callback, as the capture thread would.
   */
  emit(block: AudioBlock): void {
    this.callbacks.forEach(callback => callback(block));
  }
}
