/**
 * Audio Block
 *
 * Planar view of the samples delivered by one capture callback.
 * Blocks are only valid for the duration of the callback that delivers
 * them; use copyAudioBlock() to retain one.
 *
 * @module core/audioBlock
 */

// ============ Types ============

export interface AudioBlock {
  /** Number of channels (>= 1 for a valid block) */
  readonly channelCount: number;
  /** Samples per channel */
  readonly frameCount: number;
  /** One array of frameCount samples per channel, roughly -1..1 */
  readonly samples: readonly Float32Array[];
}

// ============ Construction ============

/**
 * Build a block from planar channel data.
 * All channels must have the same length.
 */
export function createAudioBlock(channels: readonly Float32Array[]): AudioBlock {
  if (channels.length === 0) {
    throw new Error('AudioBlock needs at least one channel');
  }

  const frameCount = channels[0].length;
  for (const channel of channels) {
    if (channel.length !== frameCount) {
      throw new Error(
        `AudioBlock channels differ in length (${channel.length} vs ${frameCount})`
      );
    }
  }

  return {
    channelCount: channels.length,
    frameCount,
    samples: channels,
  };
}

/**
 * Split interleaved samples (L R L R ...) into a planar block.
 * Trailing samples that do not fill a whole frame are ignored.
 */
export function deinterleave(data: ArrayLike<number>, channelCount: number): AudioBlock {
  if (!Number.isInteger(channelCount) || channelCount < 1) {
    throw new Error(`Invalid channel count: ${channelCount}`);
  }

  const frameCount = Math.floor(data.length / channelCount);
  const channels: Float32Array[] = [];
  for (let ch = 0; ch < channelCount; ch++) {
    channels.push(new Float32Array(frameCount));
  }

  for (let frame = 0; frame < frameCount; frame++) {
    const offset = frame * channelCount;
    for (let ch = 0; ch < channelCount; ch++) {
      channels[ch][frame] = data[offset + ch];
    }
  }

  return createAudioBlock(channels);
}

/**
 * Deep copy of a block, safe to keep after the callback returns.
 */
export function copyAudioBlock(block: AudioBlock): AudioBlock {
  return {
    channelCount: block.channelCount,
    frameCount: block.frameCount,
    samples: block.samples.map(channel => new Float32Array(channel)),
  };
}
