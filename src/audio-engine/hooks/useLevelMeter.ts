/**
 * useLevelMeter Hook
 *
 * React binding for a level meter's delivered snapshots.
 *
 * @module audio-engine/hooks/useLevelMeter
 */

import { useStore } from 'zustand';
import type { LevelMeter } from '../../core/LevelMeter';
import type { MeterState } from '../../core/LevelChannel';

export interface UseLevelMeterReturn {
  level: number;
  state: MeterState;
}

export function useLevelMeter(meter: LevelMeter): UseLevelMeterReturn {
  const level = useStore(meter.store, snapshot => snapshot.level);
  const state = useStore(meter.store, snapshot => snapshot.state);
  return { level, state };
}
