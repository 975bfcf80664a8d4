/**
 * Capture Controller
 *
 * Sequences permission → device acquisition → callback install → running,
 * and drives the level meter's state machine from it.
 *
 * Every start() gets its own AbortController. stop() aborts it, so a start
 * still waiting on the permission prompt or on the device never installs
 * its callback, and a callback from an earlier start never reaches the meter.
 *
 * @module audio-engine/CaptureController
 */

import type { AudioSource, PermissionOutcome } from './AudioSource';
import { LevelMeter, type LevelMeterOptions } from '../core/LevelMeter';
import type { MeterState } from '../core/LevelChannel';
import {
  createMeterError,
  describeError,
  logMeterError,
} from '../core/meterErrors';
import { meterDebug } from '../core/meterDebug';
import type { LevelMeterConfigInput } from '../schemas/meterConfigSchema';

// ============ Controller Class ============

export class CaptureController<H = unknown> {
  readonly meter: LevelMeter;
  private readonly source: AudioSource<H>;

  private pendingStart: Promise<void> | null = null;
  private abortController: AbortController | null = null;
  /** Boxed so a falsy handle value still counts as open */
  private openHandle: { value: H } | null = null;

  constructor(source: AudioSource<H>, meter: LevelMeter) {
    this.source = source;
    this.meter = meter;
  }

  getState(): MeterState {
    return this.meter.getState();
  }

  /**
   * Start capturing into the meter.
   * Resolves once running, or once cancelled by stop().
   * @throws MeterError METER_ERR_PERMISSION_DENIED | METER_ERR_ENGINE_START_FAILED
   */
  start(): Promise<void> {
    if (this.pendingStart) return this.pendingStart;
    if (this.meter.getState() === 'running') return Promise.resolve();

    const abortController = new AbortController();
    this.abortController = abortController;
    this.meter.transition('starting');

    const pending: Promise<void> = this.runStart(abortController.signal).finally(() => {
      if (this.pendingStart === pending) {
        this.pendingStart = null;
      }
    });
    this.pendingStart = pending;
    return pending;
  }

  /**
   * Tear down capture. Safe to call in any state, any number of times.
   */
  stop(): void {
    this.abortController?.abort();
    this.abortController = null;
    this.pendingStart = null;

    const handle = this.openHandle;
    this.openHandle = null;
    if (handle) {
      this.closeHandle(handle.value);
    }

    this.meter.transition('stopped');
  }

  private async runStart(signal: AbortSignal): Promise<void> {
    const { sampleRate, channelHint, blockSize } = this.meter.getConfig();

    // 1. Permission
    let permission: PermissionOutcome;
    try {
      permission = await this.source.requestPermission();
    } catch (err) {
      if (signal.aborted) return;
      this.meter.transition('stopped');
      throw createMeterError('METER_ERR_PERMISSION_DENIED', describeError(err), err);
    }

    if (signal.aborted) return;

    if (permission !== 'granted') {
      meterDebug('Capture', `permission ${permission}`);
      this.meter.transition('stopped');
      throw createMeterError('METER_ERR_PERMISSION_DENIED', `permission ${permission}`);
    }

    // 2. Device
    let handle: H;
    try {
      handle = await this.source.openInputStream(sampleRate, channelHint, blockSize);
    } catch (err) {
      if (signal.aborted) return;
      this.meter.transition('stopped');
      throw createMeterError('METER_ERR_ENGINE_START_FAILED', describeError(err), err);
    }

    if (signal.aborted) {
      this.closeHandle(handle);
      return;
    }

    // 3. Callback
    this.openHandle = { value: handle };
    try {
      this.source.onBlock(handle, block => {
        if (signal.aborted || this.meter.getState() !== 'running') return;
        this.meter.process(block);
      });
    } catch (err) {
      this.openHandle = null;
      this.closeHandle(handle);
      this.meter.transition('stopped');
      throw createMeterError('METER_ERR_ENGINE_START_FAILED', describeError(err), err);
    }

    this.meter.transition('running');
    meterDebug('Capture', `running at ${sampleRate}Hz, ${blockSize} frames per block`);
  }

  private closeHandle(handle: H): void {
    try {
      this.source.closeInputStream(handle);
    } catch (err) {
      logMeterError(createMeterError('METER_ERR_STREAM_FAILED', `close failed: ${describeError(err)}`, err));
    }
  }
}

// ============ Factory ============

/**
 * Build a meter and the controller that feeds it.
 * @throws MeterError METER_ERR_INVALID_CONFIGURATION
 */
export function createMicLevelMeter<H>(
  source: AudioSource<H>,
  config: LevelMeterConfigInput = {},
  options: LevelMeterOptions = {}
): CaptureController<H> {
  return new CaptureController(source, new LevelMeter(config, options));
}
