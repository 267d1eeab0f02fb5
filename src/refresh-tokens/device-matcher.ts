import type { RefreshTokenRecord } from "./refresh-token.record";

export type BrowserFamily = "Chrome" | "Firefox" | "Safari" | "Edge" | "Opera" | "Unknown";

// order matters: Edge and Opera user-agents also carry "Chrome", Chrome carries "Safari"
const BROWSER_FAMILIES: readonly Exclude<BrowserFamily, "Unknown">[] = ["Chrome", "Firefox", "Safari", "Edge", "Opera"];

export function browserFamily(userAgent: string): BrowserFamily {
    return BROWSER_FAMILIES.find((family) => userAgent.includes(family)) ?? "Unknown";
}

/**
 * Permissive origin check: same IP, or same browser family.
 * Two unidentifiable user-agents both resolve to "Unknown" and therefore match.
 */
export function isDeviceMatching(
    token: Pick<RefreshTokenRecord, "ipAddress" | "userAgent">,
    currentIp: string | null,
    currentUserAgent: string | null,
): boolean {
    const ipMatches = token.ipAddress !== null && token.ipAddress === currentIp;
    if (ipMatches) return true;

    if (token.userAgent === null || currentUserAgent === null) return false;
    return browserFamily(token.userAgent) === browserFamily(currentUserAgent);
}
