import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { ErrorCode } from '@contactbook/common/errors';
import { FixedWindowRateLimiter } from './fixed-window-rate-limiter';
import { RateLimitGuard } from './rate-limit.guard';

class ProfileController {
  me() {
    return 'me';
  }

  other() {
    return 'other';
  }
}

function contextFor(ip: string, handler: () => string = ProfileController.prototype.me) {
  const response = { setHeader: jest.fn() };
  const context = new ExecutionContextHost([{ ip }, response], ProfileController, handler);
  return { context, response };
}

describe('RateLimitGuard', () => {
  const Guard = RateLimitGuard(2, 60000);
  let guard: InstanceType<typeof Guard>;

  beforeEach(() => {
    guard = new Guard(new FixedWindowRateLimiter());
  });

  it('should let requests through until the limit is reached', () => {
    expect(guard.canActivate(contextFor('10.0.0.1').context)).toBe(true);
    expect(guard.canActivate(contextFor('10.0.0.1').context)).toBe(true);
  });

  it('should reject the request over the limit with a retry hint', () => {
    guard.canActivate(contextFor('10.0.0.1').context);
    guard.canActivate(contextFor('10.0.0.1').context);
    const { context, response } = contextFor('10.0.0.1');

    expect(() => guard.canActivate(context)).toThrow(
      expect.objectContaining({
        code: ErrorCode.RateLimitExceeded,
        httpStatusCode: 429,
        message: 'Rate limit exceeded. Please try again later.',
      }),
    );
    expect(response.setHeader).toHaveBeenCalledWith('Retry-After', '60');
  });

  it('should keep separate budgets per client and per handler', () => {
    guard.canActivate(contextFor('10.0.0.1').context);
    guard.canActivate(contextFor('10.0.0.1').context);

    expect(guard.canActivate(contextFor('10.0.0.2').context)).toBe(true);
    expect(
      guard.canActivate(contextFor('10.0.0.1', ProfileController.prototype.other).context),
    ).toBe(true);
  });
});
