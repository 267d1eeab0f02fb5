import { HttpException, HttpStatus, InternalServerErrorException, UnauthorizedException } from "@nestjs/common";
import { MissingRefreshTokenError, RateLimitedError, RefreshTokenError } from "../refresh-tokens/refresh-token.errors";

// replay, expiry, unknown token and lost races all look the same from outside
export const GENERIC_REFRESH_FAILURE = "Invalid or expired refresh token";

export function toHttpException(error: unknown): HttpException {
    if (error instanceof HttpException) return error;
    if (error instanceof RateLimitedError) {
        return new HttpException(
            { statusCode: HttpStatus.TOO_MANY_REQUESTS, error: "Too Many Requests", message: error.message },
            HttpStatus.TOO_MANY_REQUESTS,
        );
    }
    if (error instanceof MissingRefreshTokenError) return new UnauthorizedException(error.message);
    if (error instanceof RefreshTokenError) return new UnauthorizedException(GENERIC_REFRESH_FAILURE);
    return new InternalServerErrorException("Token refresh failed", { cause: error });
}
