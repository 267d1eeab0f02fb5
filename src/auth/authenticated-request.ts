import type { Request } from "express";
import type { AccessTokenClaims } from "../access-tokens/access-token.issuer";

export type AuthenticatedRequest = Request & { user?: AccessTokenClaims };
