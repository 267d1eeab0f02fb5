export type RefreshTokenErrorKind = "NotFound" | "Expired" | "ConcurrentRotation" | "Replay";

export abstract class RefreshTokenError extends Error {
    abstract readonly kind: RefreshTokenErrorKind;
}

export class RefreshTokenNotFoundError extends RefreshTokenError {
    readonly kind = "NotFound";
    constructor() {
        super("Refresh token not found");
        this.name = "RefreshTokenNotFoundError";
    }
}

export class RefreshTokenExpiredError extends RefreshTokenError {
    readonly kind = "Expired";
    constructor() {
        super("Refresh token has expired");
        this.name = "RefreshTokenExpiredError";
    }
}

/** Lost the claim to a concurrent rotation of the same token. Benign, no side effects. */
export class ConcurrentRotationError extends RefreshTokenError {
    readonly kind = "ConcurrentRotation";
    constructor() {
        super("Refresh token was rotated by a concurrent request");
        this.name = "ConcurrentRotationError";
    }
}

/** A revoked token was presented again; the customer's sessions have been revoked. */
export class RefreshTokenReplayError extends RefreshTokenError {
    readonly kind = "Replay";
    constructor(readonly customerRef: string) {
        super("Revoked refresh token reused");
        this.name = "RefreshTokenReplayError";
    }
}

export class MissingRefreshTokenError extends Error {
    constructor() {
        super("No refresh token provided");
        this.name = "MissingRefreshTokenError";
    }
}

export class RateLimitedError extends Error {
    constructor(readonly retryAfterMs: number) {
        super("Too many refresh attempts. Please try again later.");
        this.name = "RateLimitedError";
    }
}
