/**
 * Capture side of the meter:
 * - Audio source contract
 * - Capture lifecycle controller
 * - Raw PCM stream source
 * - React hooks
 *
 * @module audio-engine
 */

export {
  type AudioSource,
  type BlockCallback,
  type PermissionOutcome,
} from './AudioSource';

export { CaptureController, createMicLevelMeter } from './CaptureController';

export {
  PcmStreamAudioSource,
  type PcmFormat,
  type PcmStreamAudioSourceOptions,
  type PcmStreamHandle,
} from './PcmStreamAudioSource';

export {
  useLevelMeter,
  useCaptureController,
  type UseLevelMeterReturn,
  type UseCaptureControllerReturn,
} from './hooks';
