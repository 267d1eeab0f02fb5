// Human-readable "<OS> - <Browser> - <DeviceType>" used for session listings and alert mails.

const UNKNOWN_OS = "Unknown OS";
const UNKNOWN_BROWSER = "Unknown Browser";

const MAC_RELEASES: [string, string][] = [
    ["Mac OS X 10_15", "macOS Catalina"],
    ["Mac OS X 11", "macOS Big Sur"],
    ["Mac OS X 12", "macOS Monterey"],
    ["Mac OS X 13", "macOS Ventura"],
    ["Mac OS X 14", "macOS Sonoma"],
    ["Mac OS X 15", "macOS Sequoia"],
];

const WINDOWS_RELEASES: [string, string][] = [
    ["Windows NT 10.0", "Windows 10"],
    ["Windows NT 6.3", "Windows 8.1"],
    ["Windows NT 6.2", "Windows 8"],
    ["Windows NT 6.1", "Windows 7"],
];

function lookup(ua: string, table: [string, string][]): string | undefined {
    return table.find(([marker]) => ua.includes(marker))?.[1];
}

export function detectOs(ua: string): string {
    if (ua.includes("Windows")) return lookup(ua, WINDOWS_RELEASES) ?? "Windows";
    if (ua.includes("iPhone") || ua.includes("iPad")) {
        for (const v of ["17", "16", "15"]) {
            if (ua.includes(`OS ${v}`)) return `iOS ${v}`;
        }
        return "iOS";
    }
    if (ua.includes("Mac OS X")) return lookup(ua, MAC_RELEASES) ?? "macOS";
    if (ua.includes("Android")) {
        const version = ua.split("Android ")[1]?.split(";")[0]?.trim();
        return version ? `Android ${version}` : "Android";
    }
    if (ua.includes("Ubuntu")) return "Ubuntu";
    if (ua.includes("CrOS")) return "Chrome OS";
    if (ua.includes("Linux")) return "Linux";
    return UNKNOWN_OS;
}

export function detectBrowser(ua: string): string {
    const mobile = ua.includes("Mobile");
    if (ua.includes("Edg/")) return "Edge";
    if (ua.includes("OPR/") || ua.includes("Opera/")) return "Opera";
    if (ua.includes("Chrome/")) return mobile ? "Chrome Mobile" : "Chrome";
    if (ua.includes("Firefox/")) return mobile ? "Firefox Mobile" : "Firefox";
    if (ua.includes("Safari/")) return mobile ? "Safari Mobile" : "Safari";
    if (ua.includes("MSIE") || ua.includes("Trident/")) return "Internet Explorer";
    return UNKNOWN_BROWSER;
}

export function detectDeviceType(ua: string): "Mobile" | "Tablet" | "Desktop" {
    if (ua.includes("iPad") || ua.includes("Tablet")) return "Tablet";
    if (ua.includes("Mobile") || ua.includes("Android") || ua.includes("iPhone")) return "Mobile";
    return "Desktop";
}

export function describeDevice(userAgent: string | null | undefined): string | null {
    if (!userAgent) return null;
    return `${detectOs(userAgent)} - ${detectBrowser(userAgent)} - ${detectDeviceType(userAgent)}`;
}
