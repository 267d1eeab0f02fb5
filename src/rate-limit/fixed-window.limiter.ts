import { Inject, Injectable } from "@nestjs/common";
import { CLOCK, type Clock } from "../common/clock";

interface Window {
    count: number;
    resetAt: number;
}

export interface RateLimitDecision {
    allowed: boolean;
    remaining: number;
    resetAt: number;
    retryAfterMs: number;
}

export interface RateLimitPolicy {
    max: number;
    windowMs: number;
}

/**
 * In-memory fixed-window counter per key. Expired windows are pruned
 * at most once per window length.
 */
@Injectable()
export class FixedWindowRateLimiter {
    private readonly windows = new Map<string, Window>();
    private lastPrune = 0;

    constructor(@Inject(CLOCK) private readonly clock: Clock) { }

    hit(key: string, policy: RateLimitPolicy): RateLimitDecision {
        const now = this.clock.now().getTime();
        this.prune(now, policy.windowMs);

        let window = this.windows.get(key);
        if (!window || window.resetAt <= now) {
            window = { count: 0, resetAt: now + policy.windowMs };
            this.windows.set(key, window);
        }
        window.count++;

        return {
            allowed: window.count <= policy.max,
            remaining: Math.max(0, policy.max - window.count),
            resetAt: window.resetAt,
            retryAfterMs: window.resetAt - now,
        };
    }

    reset(): void {
        this.windows.clear();
    }

    private prune(now: number, windowMs: number) {
        if (now - this.lastPrune < windowMs) return;
        this.lastPrune = now;
        for (const [key, window] of this.windows) {
            if (window.resetAt <= now) this.windows.delete(key);
        }
    }
}
