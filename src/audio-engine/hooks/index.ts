/**
 * Meter React Hooks
 *
 * @module audio-engine/hooks
 */

export { useLevelMeter, type UseLevelMeterReturn } from './useLevelMeter';
export { useCaptureController, type UseCaptureControllerReturn } from './useCaptureController';
