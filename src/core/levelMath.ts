/**
 * Level computation
 *
 * Block RMS → decibels → normalized display level.
 *
 * @module core/levelMath
 */

import type { AudioBlock } from './audioBlock';

export interface DecibelWindow {
  /** Power mapped to 0 */
  minDecibels: number;
  /** Power mapped to 1 */
  maxDecibels: number;
}

/**
 * Root-mean-square across every channel and frame of the block.
 * Returns 0 for an empty block. A NaN sample counts as 0, an infinite
 * one makes the result Infinity.
 */
export function computeRms(block: AudioBlock): number {
  const total = block.channelCount * block.frameCount;
  if (total === 0) return 0;

  let sumSquares = 0;
  for (let ch = 0; ch < block.channelCount; ch++) {
    const channel = block.samples[ch];
    for (let i = 0; i < block.frameCount; i++) {
      const sample = channel[i];
      if (!Number.isNaN(sample)) sumSquares += sample * sample;
    }
  }

  return Math.sqrt(sumSquares / total);
}

/**
 * Linear amplitude to dB, clamped below at floor so silence stays finite.
 */
export function linearToDb(linear: number, floor: number): number {
  return 20 * Math.log10(Math.max(linear, floor));
}

/**
 * dB to linear amplitude.
 */
export function dbToLinear(db: number): number {
  return Math.pow(10, db / 20);
}

/**
 * Map a dB value onto 0..1 inside the window, clamped.
 */
export function normalizeDb(powerDb: number, window: DecibelWindow): number {
  const level = (powerDb - window.minDecibels) / (window.maxDecibels - window.minDecibels);
  return clampUnit(level);
}

/**
 * Clamp to [0, 1]. NaN maps to 0.
 */
export function clampUnit(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/**
 * Full block → normalized level pipeline.
 * Infinite input reads as full scale.
 */
export function computeNormalizedLevel(
  block: AudioBlock,
  window: DecibelWindow,
  silenceFloor: number
): number {
  return normalizeDb(linearToDb(computeRms(block), silenceFloor), window);
}

/**
 * One-pole smoothing toward the next value. smoothing = 0 returns next.
 */
export function smoothLevel(previous: number, next: number, smoothing: number): number {
  return smoothing * previous + (1 - smoothing) * next;
}
