export const ACCESS_TOKEN_ISSUER = Symbol("ACCESS_TOKEN_ISSUER");

export type AccessTokenClaims = {
    sub: string;          // customer id (stringified)
    roles: string[];
    iat?: number;
    exp?: number;
};

export interface AccessTokenIssuer {
    /** Lifetime of issued tokens, reported to clients as `expiresIn`. */
    readonly ttlSeconds: number;
    issue(customerRef: string, roles: string[]): Promise<string>;
    /** Resolves the verified claims, or null for any invalid, expired or malformed token. */
    validate(signedToken: string): Promise<AccessTokenClaims | null>;
}
