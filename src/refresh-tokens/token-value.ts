import * as crypto from "crypto";

export const TOKEN_VALUE_BYTES = 32;

// 256 bits, url-safe so it survives cookies untouched
export function generateTokenValue(): string {
    return crypto.randomBytes(TOKEN_VALUE_BYTES).toString("base64url");
}
