/**
 * Immutable view of one refresh-token row.
 *
 * A row is created ACTIVE, may be REVOKED exactly once (rotation, logout or
 * replay fan-out) and is EXPIRED once the clock passes `expiresAt`. Expiry is
 * derived, never stored.
 */
export interface RefreshTokenRecord {
    readonly id: string;
    readonly value: string;
    readonly customerRef: string;
    readonly issuedAt: Date;
    readonly expiresAt: Date;
    readonly revoked: boolean;
    readonly ipAddress: string | null;
    readonly userAgent: string | null;
    readonly deviceInfo: string | null;
    readonly updatedAt: Date;
}

// column widths of refresh_tokens
export const USER_AGENT_MAX_LENGTH = 255;
export const DEVICE_INFO_MAX_LENGTH = 255;

export type RefreshTokenState = "ACTIVE" | "REVOKED" | "EXPIRED";

export function isExpired(record: RefreshTokenRecord, now: Date): boolean {
    return now.getTime() > record.expiresAt.getTime();
}

export function stateOf(record: RefreshTokenRecord, now: Date): RefreshTokenState {
    if (isExpired(record, now)) return "EXPIRED";
    return record.revoked ? "REVOKED" : "ACTIVE";
}

// revoked only ever goes false -> true
export function revokeRecord(record: RefreshTokenRecord, at: Date): RefreshTokenRecord {
    if (record.revoked) return record;
    return Object.freeze({ ...record, revoked: true, updatedAt: at });
}

/** Short, log-safe prefix of a token value. */
export function tokenPreview(value: string): string {
    return value.length <= 8 ? "***" : `${value.slice(0, 8)}…`;
}
