/**
 * Level Channel Tests
 *
 * @module core/__tests__/LevelChannel.test
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { LevelChannel } from '../LevelChannel';
import { createManualScheduler, type ManualScheduler } from '../../utils/testUtils';

describe('LevelChannel', () => {
  let clock: ManualScheduler;
  let channel: LevelChannel;

  beforeEach(() => {
    clock = createManualScheduler();
    channel = new LevelChannel({ level: 0, state: 'stopped' }, clock.scheduler);
  });

  it('should store the latest snapshot without delivering it', () => {
    channel.publish(0.5, 'running');

    expect(channel.getLatest()).toEqual({ level: 0.5, state: 'running', sequence: 1 });
    expect(channel.getDelivered()).toEqual({ level: 0, state: 'stopped', sequence: 0 });
    expect(channel.hasPendingFlush()).toBe(true);
  });

  it('should schedule a single flush per batch', () => {
    channel.publish(0.1, 'running');
    channel.publish(0.2, 'running');
    channel.publish(0.3, 'running');
    expect(clock.queued).toBe(1);

    clock.runAll();
    expect(channel.hasPendingFlush()).toBe(false);

    channel.publish(0.4, 'running');
    expect(clock.queued).toBe(1);
  });

  it('should deliver strictly increasing sequences', () => {
    const sequences: number[] = [];
    channel.store.subscribe(snapshot => sequences.push(snapshot.sequence));

    channel.publish(0.1, 'running');
    channel.publish(0.2, 'running');
    clock.runAll();
    channel.publish(0.3, 'running');
    clock.runAll();
    channel.publish(0.4, 'running');
    channel.publish(0.5, 'running');
    channel.publish(0.6, 'running');
    clock.runAll();

    expect(sequences).toEqual([2, 3, 6]);
  });

  it('should not redeliver an already delivered snapshot', () => {
    const listener = vi.fn();
    channel.subscribe(listener);

    channel.publish(0.5, 'running');
    channel.flush();
    clock.runAll();

    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('should keep delivering when a subscriber throws', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const failing = vi.fn(() => {
      throw new Error('render failed');
    });
    const healthy = vi.fn();
    channel.subscribe(failing);
    channel.subscribe(healthy);

    channel.publish(0.7, 'running');
    clock.runAll();

    expect(healthy).toHaveBeenCalledWith(0.7, 'running');
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy.mock.calls[0][0]).toBe('[LevelChannel] Subscriber threw:');
  });

  it('should unsubscribe by handle or id and ignore unknown ids', () => {
    const first = vi.fn();
    const second = vi.fn();
    const firstSub = channel.subscribe(first);
    const secondSub = channel.subscribe(second);

    channel.unsubscribe(firstSub);
    channel.unsubscribe(secondSub.id);
    channel.unsubscribe(999);
    firstSub.unsubscribe();

    channel.publish(1, 'running');
    clock.runAll();

    expect(first).not.toHaveBeenCalled();
    expect(second).not.toHaveBeenCalled();
    expect(channel.subscriberCount).toBe(0);
  });

  it('should hand out distinct subscription ids', () => {
    const a = channel.subscribe(() => {});
    const b = channel.subscribe(() => {});
    expect(a.id).not.toBe(b.id);
  });
});
