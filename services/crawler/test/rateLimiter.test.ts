import { describe, it, expect } from 'vitest';
import { RateLimiter } from '../domain/RateLimiter.js';
import { FakeClock } from './fixtures.js';

describe('RateLimiter', () => {
  it('only spaces requests while under the limit', async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter({ limit: 3, minInterval: 100, clock });

    await Promise.all([limiter.wait(), limiter.wait(), limiter.wait()]);

    expect(clock.sleeps).toEqual([100, 100]);
    expect(clock.now()).toBe(200);
  });

  it('blocks the request over the limit until one second past the next minute', async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter({ limit: 3, minInterval: 100, clock });

    await Promise.all([limiter.wait(), limiter.wait(), limiter.wait(), limiter.wait()]);

    expect(clock.sleeps).toEqual([100, 100, 60_800]);
    expect(clock.now()).toBe(61_000);
  });

  it('starts a fresh count in a new minute', async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter({ limit: 2, minInterval: 100, clock });

    await limiter.wait();
    await limiter.wait();
    clock.time = 60_000;
    await limiter.wait();
    await limiter.wait();

    expect(clock.sleeps).toEqual([100, 100]);
    expect(clock.now()).toBe(60_100);
  });

  it('does not wait for spacing when enough time has passed', async () => {
    const clock = new FakeClock(5_000);
    const limiter = new RateLimiter({ limit: 10, minInterval: 100, clock });

    await limiter.wait();
    clock.time += 250;
    await limiter.wait();

    expect(clock.sleeps).toEqual([]);
  });

  it('applies a lowered limit to later calls', async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter({ limit: 10, minInterval: 0, clock });

    await limiter.wait();
    limiter.setLimit(1);
    await limiter.wait();

    expect(clock.sleeps).toEqual([61_000]);
  });
});
