import { CanActivate, ExecutionContext, Inject, Injectable, Logger, UnauthorizedException } from "@nestjs/common";
import { ACCESS_TOKEN_ISSUER, type AccessTokenIssuer } from "../../access-tokens/access-token.issuer";
import type { AuthenticatedRequest } from "../authenticated-request";

@Injectable()
export class JwtAccessGuard implements CanActivate {
    private readonly logger = new Logger(JwtAccessGuard.name);

    constructor(@Inject(ACCESS_TOKEN_ISSUER) private readonly accessTokens: AccessTokenIssuer) { }

    async canActivate(context: ExecutionContext): Promise<boolean> {
        const req = context.switchToHttp().getRequest<AuthenticatedRequest>();
        const token = extractBearerToken(req.headers.authorization);
        if (!token) throw new UnauthorizedException("Missing access token");

        const claims = await this.accessTokens.validate(token);
        if (!claims) {
            this.logger.warn("Access token invalid or expired");
            throw new UnauthorizedException("Invalid or expired access token");
        }
        req.user = claims;
        return true;
    }
}

export const extractBearerToken = (header: string | undefined): string | null => {
    if (!header) return null;
    const [scheme, token] = header.trim().split(/\s+/);
    return scheme?.toLowerCase() === "bearer" && token ? token : null;
}
