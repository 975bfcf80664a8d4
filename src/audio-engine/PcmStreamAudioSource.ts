/**
 * PCM Stream Audio Source
 *
 * Adapts a Node readable of raw interleaved PCM (e.g. the stdout of a
 * command-line recorder) into fixed-size planar blocks.
 *
 * @module audio-engine/PcmStreamAudioSource
 */

import type { Readable } from 'node:stream';
import type { AudioSource, BlockCallback, PermissionOutcome } from './AudioSource';
import { deinterleave } from '../core/audioBlock';
import { createMeterError, describeError, logMeterError } from '../core/meterErrors';
import { meterDebug } from '../core/meterDebug';

// ============ Types ============

export type PcmFormat = 'f32le' | 's16le';

export interface PcmStreamAudioSourceOptions {
  /** Open the raw PCM stream for the requested format */
  open: (sampleRate: number, channels: number) => Readable | Promise<Readable>;
  format?: PcmFormat;
  /** Permission check; streams need none by default */
  permission?: () => Promise<PermissionOutcome>;
}

export interface PcmStreamHandle {
  readonly id: number;
  readonly stream: Readable;
  readonly channels: number;
  readonly blockSize: number;
}

interface HandleState {
  callbacks: Set<BlockCallback>;
  pending: Buffer;
  closed: boolean;
  detach: () => void;
}

const BYTES_PER_SAMPLE: Record<PcmFormat, number> = {
  f32le: 4,
  s16le: 2,
};

// ============ Source ============

export class PcmStreamAudioSource implements AudioSource<PcmStreamHandle> {
  private readonly options: PcmStreamAudioSourceOptions;
  private readonly format: PcmFormat;
  private readonly handles = new Map<PcmStreamHandle, HandleState>();
  private nextHandleId = 1;

  constructor(options: PcmStreamAudioSourceOptions) {
    this.options = options;
    this.format = options.format ?? 'f32le';
  }

  requestPermission(): Promise<PermissionOutcome> {
    return this.options.permission ? this.options.permission() : Promise.resolve('granted');
  }

  async openInputStream(sampleRate: number, channelHint: number, blockSize: number): Promise<PcmStreamHandle> {
    const stream = await this.options.open(sampleRate, channelHint);
    if (stream.readableEncoding !== null) {
      stream.destroy();
      throw new Error(`PCM stream must be in binary mode, got encoding ${stream.readableEncoding}`);
    }

    const handle: PcmStreamHandle = {
      id: this.nextHandleId++,
      stream,
      channels: channelHint,
      blockSize,
    };

    const state: HandleState = {
      callbacks: new Set(),
      pending: Buffer.alloc(0),
      closed: false,
      detach: () => {},
    };

    const onError = (err: unknown) => {
      logMeterError(createMeterError('METER_ERR_STREAM_FAILED', describeError(err), err));
      this.release(handle, state);
      stream.destroy();
    };
    const onData = (chunk: unknown) => {
      if (!Buffer.isBuffer(chunk)) {
        onError(new Error(`PCM stream ${handle.id} switched to text mode`));
        return;
      }
      this.consume(handle, state, chunk);
    };
    const onEnd = () => {
      meterDebug('PcmStream', `stream ${handle.id} ended`);
    };

    stream.on('data', onData);
    stream.on('error', onError);
    stream.on('end', onEnd);
    state.detach = () => {
      stream.off('data', onData);
      stream.off('error', onError);
      stream.off('end', onEnd);
    };

    this.handles.set(handle, state);
    return handle;
  }

  onBlock(handle: PcmStreamHandle, callback: BlockCallback): void {
    const state = this.handles.get(handle);
    if (!state || state.closed) {
      throw new Error(`PCM stream ${handle.id} is not open`);
    }
    state.callbacks.add(callback);
  }

  closeInputStream(handle: PcmStreamHandle): void {
    const state = this.handles.get(handle);
    if (state) this.release(handle, state);
    handle.stream.destroy();
  }

  /** Number of handles currently open */
  get openCount(): number {
    return this.handles.size;
  }

  private release(handle: PcmStreamHandle, state: HandleState): void {
    state.closed = true;
    state.detach();
    state.callbacks.clear();
    state.pending = Buffer.alloc(0);
    this.handles.delete(handle);
  }

  private consume(handle: PcmStreamHandle, state: HandleState, chunk: Buffer): void {
    if (state.closed) return;

    const bytesPerSample = BYTES_PER_SAMPLE[this.format];
    const blockBytes = bytesPerSample * handle.channels * handle.blockSize;

    let pending = state.pending.length > 0 ? Buffer.concat([state.pending, chunk]) : chunk;

    while (pending.length >= blockBytes && !state.closed) {
      const interleaved = this.decode(pending.subarray(0, blockBytes), bytesPerSample);
      const block = deinterleave(interleaved, handle.channels);
      state.callbacks.forEach(callback => callback(block));
      pending = pending.subarray(blockBytes);
    }

    // Copy the remainder so the chunk it came from can be collected
    state.pending = state.closed ? Buffer.alloc(0) : Buffer.from(pending);
  }

  private decode(bytes: Buffer, bytesPerSample: number): Float32Array {
    const sampleCount = bytes.length / bytesPerSample;
    const samples = new Float32Array(sampleCount);

    for (let i = 0; i < sampleCount; i++) {
      samples[i] = this.format === 'f32le'
        ? bytes.readFloatLE(i * bytesPerSample)
        : bytes.readInt16LE(i * bytesPerSample) / 32768;
    }

    return samples;
  }
}
