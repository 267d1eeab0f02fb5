import { isIP } from "net";
import type { Request } from "express";
import type { RequestOrigin } from "../refresh-tokens/replay-detector.service";
import { REFRESH_COOKIE } from "./auth-cookies";

/**
 * Express' `req.ip`: the socket peer, or the X-Forwarded-For entry added by the
 * nearest untrusted hop when `trust proxy` is set. Anything that is not an address is dropped.
 */
export function clientIp(req: Request): string | null {
    const ip = req.ip;
    return ip && isIP(ip) ? ip : null;
}

export function requestOrigin(req: Request): RequestOrigin {
    const userAgent = req.get("user-agent")?.trim();
    return { ip: clientIp(req), userAgent: userAgent || null };
}

export function readRefreshCookie(req: Request): string | null {
    const cookies: Record<string, unknown> = req.cookies ?? {};
    const value = cookies[REFRESH_COOKIE];
    return typeof value === "string" && value.length > 0 ? value : null;
}
