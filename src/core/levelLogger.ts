/**
 * Level logging observer.
 *
 * Logs published levels from the observer side, so nothing is written
 * from the capture path. Updates coalesced by the channel are never seen,
 * which keeps the log lossy under load.
 *
 * @module core/levelLogger
 */

import type { LevelMeter } from './LevelMeter';
import type { MeterSubscription } from './LevelChannel';
import { meterDebug } from './meterDebug';

export interface LevelLoggerOptions {
  /** Levels at or below this are not logged (default 0.01) */
  threshold?: number;
  log?: (category: string, ...args: unknown[]) => void;
}

export function attachLevelLogger(meter: LevelMeter, options: LevelLoggerOptions = {}): MeterSubscription {
  const threshold = options.threshold ?? 0.01;
  const log = options.log ?? meterDebug;
  const { minDecibels, maxDecibels } = meter.getConfig();

  return meter.subscribe((level, state) => {
    if (level <= threshold) return;
    const db = minDecibels + level * (maxDecibels - minDecibels);
    log('Level', `level=${level.toFixed(3)} power=${db.toFixed(1)}dB state=${state}`);
  });
}
