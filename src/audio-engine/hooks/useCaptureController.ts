/**
 * useCaptureController Hook
 *
 * React hook for driving capture and reading the meter.
 * Capture is stopped when the component unmounts.
 *
 * @module audio-engine/hooks/useCaptureController
 */

import { useState, useEffect, useCallback } from 'react';
import type { CaptureController } from '../CaptureController';
import { isMeterError, type MeterError } from '../../core/meterErrors';
import type { MeterState } from '../../core/LevelChannel';
import { useLevelMeter } from './useLevelMeter';

export interface UseCaptureControllerReturn {
  // State
  level: number;
  state: MeterState;
  error: MeterError | null;
  /** User-facing text for the current error */
  errorMessage: string | null;
  // Actions
  start: () => Promise<void>;
  stop: () => void;
}

export function useCaptureController<H>(controller: CaptureController<H>): UseCaptureControllerReturn {
  const { level, state } = useLevelMeter(controller.meter);
  const [error, setError] = useState<MeterError | null>(null);

  useEffect(() => {
    return () => controller.stop();
  }, [controller]);

  const start = useCallback(async () => {
    setError(null);
    try {
      await controller.start();
    } catch (err) {
      if (!isMeterError(err)) throw err;
      setError(err);
    }
  }, [controller]);

  const stop = useCallback(() => {
    controller.stop();
  }, [controller]);

  return {
    level,
    state,
    error,
    errorMessage: error ? error.toUIMessage() : null,
    start,
    stop,
  };
}
