import type { RefreshTokenRecord } from "./refresh-token.record";

export const TOKEN_STORE = Symbol("TOKEN_STORE");

export interface NewRefreshToken {
    customerRef: string;
    ipAddress: string | null;
    userAgent: string | null;
    deviceInfo: string | null;
    issuedAt: Date;
    expiresAt: Date;
}

/**
 * Durable storage for refresh tokens. The only component that touches
 * persistence; everything above it works on immutable records.
 */
export interface TokenStore {
    /** Inserts a row with a freshly generated unique value, `revoked = false`. */
    create(input: NewRefreshToken): Promise<RefreshTokenRecord>;
    findByValue(value: string): Promise<RefreshTokenRecord | null>;
    /**
     * Atomically flips `revoked` from false to true for `value`.
     * Resolves true only for the single caller whose write changed the row.
     */
    tryClaimForRotation(value: string, at: Date): Promise<boolean>;
    /**
     * Claims `parentValue` exactly like `tryClaimForRotation` and inserts `successor` in the same
     * unit of work: either both happen or neither does. Resolves null when the claim is lost.
     */
    rotate(parentValue: string, successor: NewRefreshToken): Promise<RefreshTokenRecord | null>;
    /** Idempotent single-token revocation (logout). Resolves whether a row changed. */
    revoke(value: string, at: Date): Promise<boolean>;
    /** Revokes every row of the customer; resolves the number of rows changed. */
    revokeAllForCustomer(customerRef: string, at: Date): Promise<number>;
    findActiveForCustomer(customerRef: string, now: Date): Promise<RefreshTokenRecord[]>;
    deleteExpiredOlderThan(cutoff: Date): Promise<number>;
}
