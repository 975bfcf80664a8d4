/**
 * PCM Stream Audio Source Tests
 *
 * @module audio-engine/__tests__/PcmStreamAudioSource.test
 */

import { describe, it, expect, vi } from 'vitest';
import { PassThrough, Readable } from 'node:stream';
import { PcmStreamAudioSource } from '../PcmStreamAudioSource';
import { createMicLevelMeter } from '../CaptureController';
import type { AudioBlock } from '../../core/audioBlock';

function f32(values: number[]): Buffer {
  const buffer = Buffer.alloc(values.length * 4);
  values.forEach((value, i) => buffer.writeFloatLE(value, i * 4));
  return buffer;
}

function s16(values: number[]): Buffer {
  const buffer = Buffer.alloc(values.length * 2);
  values.forEach((value, i) => buffer.writeInt16LE(value, i * 2));
  return buffer;
}

describe('PcmStreamAudioSource', () => {
  it('should grant permission by default', async () => {
    const source = new PcmStreamAudioSource({ open: () => new PassThrough() });
    await expect(source.requestPermission()).resolves.toBe('granted');
  });

  it('should use the supplied permission check', async () => {
    const source = new PcmStreamAudioSource({
      open: () => new PassThrough(),
      permission: () => Promise.resolve('denied'),
    });
    await expect(source.requestPermission()).resolves.toBe('denied');
  });

  it('should pass sample rate and channels to open', async () => {
    const open = vi.fn(() => new PassThrough());
    const source = new PcmStreamAudioSource({ open });

    await source.openInputStream(16000, 2, 256);

    expect(open).toHaveBeenCalledWith(16000, 2);
  });

  it('should cut f32le data into blocks of blockSize frames', async () => {
    const stream = new PassThrough();
    const source = new PcmStreamAudioSource({ open: () => stream });
    const handle = await source.openInputStream(48000, 1, 4);
    const blocks: AudioBlock[] = [];
    source.onBlock(handle, block => blocks.push(block));

    stream.write(f32([0.5, 0.5, 0.5, 0.5, 0.25, 0.25]));
    await vi.waitFor(() => expect(blocks).toHaveLength(1));

    stream.write(f32([0.25, 0.25]));
    await vi.waitFor(() => expect(blocks).toHaveLength(2));

    expect(blocks[0].frameCount).toBe(4);
    expect(Array.from(blocks[0].samples[0])).toEqual([0.5, 0.5, 0.5, 0.5]);
    expect(Array.from(blocks[1].samples[0])).toEqual([0.25, 0.25, 0.25, 0.25]);
  });

  it('should decode interleaved s16le stereo', async () => {
    const stream = new PassThrough();
    const source = new PcmStreamAudioSource({ open: () => stream, format: 's16le' });
    const handle = await source.openInputStream(48000, 2, 2);
    const blocks: AudioBlock[] = [];
    source.onBlock(handle, block => blocks.push(block));

    stream.write(s16([16384, -16384, 8192, 0]));
    await vi.waitFor(() => expect(blocks).toHaveLength(1));

    expect(blocks[0].channelCount).toBe(2);
    expect(Array.from(blocks[0].samples[0])).toEqual([0.5, 0.25]);
    expect(Array.from(blocks[0].samples[1])).toEqual([-0.5, 0]);
  });

  it('should reassemble samples split across chunks', async () => {
    const stream = new PassThrough();
    const source = new PcmStreamAudioSource({ open: () => stream });
    const handle = await source.openInputStream(48000, 1, 2);
    const blocks: AudioBlock[] = [];
    source.onBlock(handle, block => blocks.push(block));

    const bytes = f32([0.25, 0.75]);
    stream.write(bytes.subarray(0, 3));
    stream.write(bytes.subarray(3));
    await vi.waitFor(() => expect(blocks).toHaveLength(1));

    expect(Array.from(blocks[0].samples[0])).toEqual([0.25, 0.75]);
  });

  it('should destroy the stream on close', async () => {
    const stream = new PassThrough();
    const source = new PcmStreamAudioSource({ open: () => stream });
    const handle = await source.openInputStream(48000, 1, 4);

    source.closeInputStream(handle);
    source.closeInputStream(handle);

    expect(stream.destroyed).toBe(true);
    expect(source.openCount).toBe(0);
    expect(() => source.onBlock(handle, () => {})).toThrow('PCM stream 1 is not open');
  });

  it('should log and release the handle when the stream fails', async () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const stream = new PassThrough();
    const source = new PcmStreamAudioSource({ open: () => stream });
    await source.openInputStream(48000, 1, 4);

    stream.destroy(new Error('device unplugged'));
    await vi.waitFor(() => expect(source.openCount).toBe(0));

    expect(warnSpy).toHaveBeenCalledWith(
      '[METER_ERR_STREAM_FAILED] Input Stream Error: ' +
      'The input stream reported an error and stopped delivering audio. (device unplugged)'
    );
  });

  it('should destroy a failed stream and still close it on stop', async () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const stream = new Readable({ read() {}, autoDestroy: false });
    const controller = createMicLevelMeter(
      new PcmStreamAudioSource({ open: () => stream }),
      { blockSize: 4 }
    );
    await controller.start();

    stream.emit('error', new Error('device unplugged'));

    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(stream.destroyed).toBe(true);

    controller.stop();
    expect(stream.destroyed).toBe(true);
    expect(controller.getState()).toBe('stopped');
  });

  it('should refuse a stream opened in text mode', async () => {
    const stream = new PassThrough({ encoding: 'latin1' });
    const source = new PcmStreamAudioSource({ open: () => stream });

    await expect(source.openInputStream(48000, 1, 4)).rejects.toThrow(
      'PCM stream must be in binary mode, got encoding latin1'
    );
    expect(stream.destroyed).toBe(true);
    expect(source.openCount).toBe(0);
  });

  it('should fail the handle when the stream switches to text mode', async () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const stream = new PassThrough();
    const source = new PcmStreamAudioSource({ open: () => stream });
    const handle = await source.openInputStream(48000, 1, 1);
    const blocks: AudioBlock[] = [];
    source.onBlock(handle, block => blocks.push(block));

    stream.setEncoding('latin1');
    stream.write(f32([0.5]));
    await vi.waitFor(() => expect(source.openCount).toBe(0));

    expect(blocks).toHaveLength(0);
    expect(stream.destroyed).toBe(true);
    expect(warnSpy).toHaveBeenCalledWith(
      '[METER_ERR_STREAM_FAILED] Input Stream Error: ' +
      'The input stream reported an error and stopped delivering audio. (PCM stream 1 switched to text mode)'
    );
  });

  it('should drive a level meter end to end', async () => {
    const stream = new PassThrough();
    const controller = createMicLevelMeter(
      new PcmStreamAudioSource({ open: () => stream }),
      { blockSize: 4 }
    );

    await controller.start();
    stream.write(f32([1, 1, 1, 1]));
    await vi.waitFor(() => expect(controller.meter.getLevel()).toBe(1));

    controller.stop();
    expect(stream.destroyed).toBe(true);
    expect(controller.getState()).toBe('stopped');
  });
});
