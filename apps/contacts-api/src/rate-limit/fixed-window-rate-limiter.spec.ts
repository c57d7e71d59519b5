import { FixedWindowRateLimiter } from './fixed-window-rate-limiter';

describe('FixedWindowRateLimiter', () => {
  let limiter: FixedWindowRateLimiter;

  beforeEach(() => {
    limiter = new FixedWindowRateLimiter();
  });

  it('should allow up to the limit inside one window', () => {
    const decisions = [1, 2, 3, 4, 5, 6].map(() => limiter.hit('10.0.0.1:me', 5, 60000, 1000));

    expect(decisions.map((d) => d.allowed)).toEqual([true, true, true, true, true, false]);
    expect(decisions.map((d) => d.remaining)).toEqual([4, 3, 2, 1, 0, 0]);
    expect(decisions[5].resetAt).toBe(61000);
  });

  it('should open a new window once the previous one closes', () => {
    for (let i = 0; i < 6; i++) {
      limiter.hit('10.0.0.1:me', 5, 60000, 1000);
    }

    const decision = limiter.hit('10.0.0.1:me', 5, 60000, 61000);

    expect(decision).toEqual({ allowed: true, remaining: 4, resetAt: 121000 });
  });

  it('should count keys independently', () => {
    limiter.hit('10.0.0.1:me', 1, 60000, 1000);

    expect(limiter.hit('10.0.0.2:me', 1, 60000, 1000).allowed).toBe(true);
    expect(limiter.hit('10.0.0.1:me', 1, 60000, 1000).allowed).toBe(false);
  });

  it('should sweep only closed windows', () => {
    limiter.hit('a', 5, 1000, 0);
    limiter.hit('b', 5, 5000, 0);

    expect(limiter.sweep(2000)).toBe(1);
    expect(limiter.size).toBe(1);
  });
});
