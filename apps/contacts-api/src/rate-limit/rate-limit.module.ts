import { Module } from '@nestjs/common';
import { FixedWindowRateLimiter } from './fixed-window-rate-limiter';

@Module({
  providers: [FixedWindowRateLimiter],
  exports: [FixedWindowRateLimiter],
})
export class RateLimitModule {}
