import type { CookieOptions, Response } from "express";
import type { AppConfig } from "../config/env";

export const REFRESH_COOKIE = "refreshToken";

const cookieBase = (config: AppConfig): CookieOptions => ({
    httpOnly: true,
    sameSite: "lax",          // CSRF-friendly for SPA
    secure: config.cookieSecure,
    path: "/",
});

export function setRefreshCookie(res: Response, value: string, config: AppConfig) {
    // express turns maxAge (ms) into Max-Age (s)
    res.cookie(REFRESH_COOKIE, value, { ...cookieBase(config), maxAge: config.refreshTokenTtlMs });
}

export function clearRefreshCookie(res: Response, config: AppConfig) {
    res.cookie(REFRESH_COOKIE, "", { ...cookieBase(config), maxAge: 0 });
}
