/**
 * Audio source contract consumed by the capture controller.
 *
 * @module audio-engine/AudioSource
 */

import type { AudioBlock } from '../core/audioBlock';

export type PermissionOutcome = 'granted' | 'denied' | 'restricted';

export type BlockCallback = (block: AudioBlock) => void;

/**
 * Platform audio input. H is the source's own stream handle type.
 */
export interface AudioSource<H = unknown> {
  /** Prompt for microphone access if undetermined, otherwise report the current outcome */
  requestPermission(): Promise<PermissionOutcome>;
  /** Acquire the device and start it. Rejects if the device is busy or the format is unsupported. */
  openInputStream(sampleRate: number, channelHint: number, blockSize: number): Promise<H>;
  /** Install the per-block callback */
  onBlock(handle: H, callback: BlockCallback): void;
  /** Remove callbacks and release the device */
  closeInputStream(handle: H): void;
}
