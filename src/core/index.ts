/**
 * Metering core
 *
 * @module core
 */

export {
  createAudioBlock,
  deinterleave,
  copyAudioBlock,
  type AudioBlock,
} from './audioBlock';

export {
  computeRms,
  linearToDb,
  dbToLinear,
  normalizeDb,
  clampUnit,
  computeNormalizedLevel,
  smoothLevel,
  type DecibelWindow,
} from './levelMath';

export {
  LevelChannel,
  microtaskScheduler,
  type MeterState,
  type MeterSnapshot,
  type Scheduler,
  type LevelListener,
  type MeterSubscription,
} from './LevelChannel';

export { LevelMeter, type LevelMeterOptions } from './LevelMeter';

export { attachLevelLogger, type LevelLoggerOptions } from './levelLogger';

export { meterDebug, isMeterDebugEnabled } from './meterDebug';

export {
  MeterError,
  METER_ERROR_CATALOG,
  createMeterError,
  getErrorDef,
  isMeterError,
  logMeterError,
  describeError,
  type MeterErrorCode,
  type MeterErrorDef,
  type MeterErrorSeverity,
} from './meterErrors';
