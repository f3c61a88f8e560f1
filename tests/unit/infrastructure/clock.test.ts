/**
 * @fileoverview Unit tests for the clocks
 */

import { CancelledError, ManualClock, systemClock } from '../../../src';

describe('ManualClock', () => {
  it('should only move when advanced', () => {
    const clock = new ManualClock({ start: 1_000 });

    expect(clock.now()).toBe(1_000);
    clock.advance(250);
    expect(clock.now()).toBe(1_250);
  });

  it('should wake sleeps in due order', async () => {
    const clock = new ManualClock();
    const woke: number[] = [];

    const long = clock.sleep(300).then(() => woke.push(300));
    const short = clock.sleep(100).then(() => woke.push(100));

    clock.advance(200);
    await short;
    expect(woke).toEqual([100]);
    expect(clock.pendingSleeps).toBe(1);

    clock.advance(100);
    await long;
    expect(woke).toEqual([100, 300]);
  });

  it('should reject a sleep when its signal aborts', async () => {
    const clock = new ManualClock();
    const controller = new AbortController();

    const sleeping = clock.sleep(1_000, controller.signal);
    controller.abort();

    await expect(sleeping).rejects.toBeInstanceOf(CancelledError);
    expect(clock.pendingSleeps).toBe(0);
  });

  it('should advance by itself in auto mode', async () => {
    const clock = new ManualClock({ autoAdvance: true });

    await clock.sleep(100);
    await clock.sleep(200);

    expect(clock.now()).toBe(300);
    expect(clock.sleeps).toEqual([100, 200]);
  });
});

describe('systemClock', () => {
  it('should reject immediately for an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort('gone');

    await expect(systemClock.sleep(10_000, controller.signal)).rejects.toBeInstanceOf(CancelledError);
  });

  it('should resolve after a short sleep', async () => {
    const before = systemClock.now();

    await systemClock.sleep(5);

    expect(systemClock.now()).toBeGreaterThan(before);
  });
});
