import { CanActivate, ExecutionContext, Inject, Injectable, Logger } from "@nestjs/common";
import type { Request, Response } from "express";
import { clientIp } from "../auth/client-origin";
import { toHttpException } from "../auth/http-errors";
import { APP_CONFIG, type AppConfig } from "../config/env";
import { RateLimitedError } from "../refresh-tokens/refresh-token.errors";
import { FixedWindowRateLimiter } from "./fixed-window.limiter";

/** Per-IP request budget for the refresh endpoint. Rejects before any token is read. */
@Injectable()
export class RefreshRateLimitGuard implements CanActivate {
    private readonly logger = new Logger(RefreshRateLimitGuard.name);

    constructor(
        private readonly limiter: FixedWindowRateLimiter,
        @Inject(APP_CONFIG) private readonly config: AppConfig,
    ) { }

    canActivate(context: ExecutionContext): boolean {
        const http = context.switchToHttp();
        const req = http.getRequest<Request>();
        const res = http.getResponse<Response>();
        const policy = this.config.refreshRateLimit;
        const ip = clientIp(req) ?? "unknown";

        const decision = this.limiter.hit(`refresh:${ip}`, policy);
        res.setHeader("X-RateLimit-Limit", String(policy.max));
        res.setHeader("X-RateLimit-Remaining", String(decision.remaining));
        res.setHeader("X-RateLimit-Reset", String(Math.ceil(decision.resetAt / 1000)));
        if (decision.allowed) return true;

        res.setHeader("Retry-After", String(Math.max(1, Math.ceil(decision.retryAfterMs / 1000))));
        this.logger.warn(`Rate limit exceeded for refresh endpoint from IP: ${ip}`);
        throw toHttpException(new RateLimitedError(decision.retryAfterMs));
    }
}
