import { createParamDecorator, ExecutionContext, UnauthorizedException } from "@nestjs/common";
import type { AccessTokenClaims } from "../access-tokens/access-token.issuer";
import type { AuthenticatedRequest } from "./authenticated-request";

export const CurrentUser = createParamDecorator(
    (_data: unknown, ctx: ExecutionContext): AccessTokenClaims => {
        const req = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
        if (!req.user) throw new UnauthorizedException();
        return req.user;
    },
);
