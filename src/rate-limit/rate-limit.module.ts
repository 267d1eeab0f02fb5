import { Module } from "@nestjs/common";
import { FixedWindowRateLimiter } from "./fixed-window.limiter";
import { RefreshRateLimitGuard } from "./refresh-rate-limit.guard";

@Module({
  providers: [FixedWindowRateLimiter, RefreshRateLimitGuard],
  exports: [FixedWindowRateLimiter, RefreshRateLimitGuard],
})
export class RateLimitModule { }
