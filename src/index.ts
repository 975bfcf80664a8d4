/**
 * Microphone level meter: PCM blocks in, normalized 0..1 display level out.
 */

export * from './core';
export * from './audio-engine';
export {
  MeterConfigSchema,
  DEFAULT_METER_CONFIG,
  METER_CALIBRATIONS,
  parseMeterConfig,
  safeParseMeterConfig,
  type LevelMeterConfig,
  type LevelMeterConfigInput,
  type MeterCalibration,
} from './schemas/meterConfigSchema';
