import { describe, expect, it } from 'vitest';
import { FixedDelayRateLimiter } from './rate-limiter.js';

function fakeClock() {
  const clock: { time: number; sleeps: number[] } = { time: 0, sleeps: [] };
  return {
    clock,
    now: () => clock.time,
    sleep: async (ms: number) => {
      clock.sleeps.push(ms);
      clock.time += ms;
    },
  };
}

describe('FixedDelayRateLimiter', () => {
  it('lets the first request through and spaces the following ones', async () => {
    const { clock, now, sleep } = fakeClock();
    const limiter = new FixedDelayRateLimiter({ delayMs: 500, now, sleep });

    await limiter.acquire();
    await limiter.acquire();
    clock.time += 200;
    await limiter.acquire();
    clock.time += 600;
    await limiter.acquire();

    expect(clock.sleeps).toEqual([500, 300]);
  });

  it('defaults to a 500 ms spacing', async () => {
    const { clock, now, sleep } = fakeClock();
    const limiter = new FixedDelayRateLimiter({ now, sleep });
    await limiter.acquire();
    await limiter.acquire();
    expect(clock.sleeps).toEqual([500]);
  });

  it('never sleeps with a zero delay', async () => {
    const { clock, now, sleep } = fakeClock();
    const limiter = new FixedDelayRateLimiter({ delayMs: 0, now, sleep });
    await limiter.acquire();
    await limiter.acquire();
    expect(clock.sleeps).toEqual([]);
  });
});
