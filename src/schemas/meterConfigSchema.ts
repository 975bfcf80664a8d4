/**
 * Zod Schema for Level Meter Configuration
 *
 * Validates meter configuration at construction time so out-of-range
 * values fail fast instead of producing garbage levels later.
 *
 * @module schemas/meterConfigSchema
 */

import { z } from 'zod';
import { createMeterError } from '../core/meterErrors';

// ============ Schema ============

export const MeterConfigSchema = z
  .object({
    /** Power (dB) mapped to level 0 */
    minDecibels: z.number().finite().default(-60),
    /** Power (dB) mapped to level 1 */
    maxDecibels: z.number().finite().default(-10),
    /** Smallest RMS used before taking the logarithm */
    silenceFloor: z.number().finite().positive().default(1e-5),
    /** Frames per block requested from the source */
    blockSize: z.number().int().positive().default(1024),
    sampleRate: z.number().int().positive().default(48000),
    channelHint: z.number().int().positive().default(1),
    /** One-pole smoothing of the published level (0 = off) */
    smoothing: z.number().min(0).lt(1).default(0),
  })
  .refine(config => config.maxDecibels > config.minDecibels, {
    message: 'maxDecibels must be greater than minDecibels',
    path: ['maxDecibels'],
  });

// ============ Types ============

export type LevelMeterConfig = z.output<typeof MeterConfigSchema>;
export type LevelMeterConfigInput = z.input<typeof MeterConfigSchema>;

// ============ Defaults ============

export const DEFAULT_METER_CONFIG: Readonly<LevelMeterConfig> = Object.freeze(
  MeterConfigSchema.parse({})
);

/**
 * dB windows seen in the field. Which one fits depends on microphone gain
 * and use case; none of them is the "right" one.
 */
export const METER_CALIBRATIONS = {
  standard: { minDecibels: -60, maxDecibels: -10 },
  hot: { minDecibels: -50, maxDecibels: -5 },
  wide: { minDecibels: -80, maxDecibels: -10 },
} as const satisfies Record<string, Pick<LevelMeterConfig, 'minDecibels' | 'maxDecibels'>>;

export type MeterCalibration = keyof typeof METER_CALIBRATIONS;

// ============ Parsing ============

/**
 * Validate without throwing.
 */
export function safeParseMeterConfig(input: unknown) {
  return MeterConfigSchema.safeParse(input);
}

/**
 * Validate and fill defaults.
 * @throws MeterError METER_ERR_INVALID_CONFIGURATION
 */
export function parseMeterConfig(input: unknown = {}): LevelMeterConfig {
  const result = MeterConfigSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw createMeterError('METER_ERR_INVALID_CONFIGURATION', details, result.error);
  }
  return result.data;
}
