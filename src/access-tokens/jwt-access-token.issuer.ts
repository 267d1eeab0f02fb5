import { Inject, Injectable, Logger } from "@nestjs/common";
import { JwtService } from "@nestjs/jwt";
import { APP_CONFIG, type AppConfig } from "../config/env";
import type { AccessTokenClaims, AccessTokenIssuer } from "./access-token.issuer";

@Injectable()
export class JwtAccessTokenIssuer implements AccessTokenIssuer {
    private readonly logger = new Logger(JwtAccessTokenIssuer.name);

    constructor(
        private readonly jwt: JwtService,
        @Inject(APP_CONFIG) private readonly config: AppConfig,
    ) { }

    get ttlSeconds(): number {
        return this.config.accessTokenTtlSeconds;
    }

    issue(customerRef: string, roles: string[]): Promise<string> {
        return this.jwt.signAsync(
            { sub: customerRef, roles },
            { secret: this.config.jwtAccessSecret, expiresIn: this.config.accessTokenTtlSeconds, algorithm: "HS256" },
        );
    }

    async validate(signedToken: string): Promise<AccessTokenClaims | null> {
        try {
            const payload = await this.jwt.verifyAsync<Record<string, unknown>>(signedToken, {
                secret: this.config.jwtAccessSecret,
                algorithms: ["HS256"],
            });
            return toClaims(payload);
        } catch (error) {
            this.logger.verbose(`Access token rejected: ${error instanceof Error ? error.message : String(error)}`);
            return null;
        }
    }
}

function toClaims(payload: Record<string, unknown>): AccessTokenClaims | null {
    const { sub, roles, iat, exp } = payload;
    if (typeof sub !== "string" || sub.length === 0) return null;
    const roleList = Array.isArray(roles) ? roles.filter((r): r is string => typeof r === "string") : [];
    return {
        sub,
        roles: roleList,
        iat: typeof iat === "number" ? iat : undefined,
        exp: typeof exp === "number" ? exp : undefined,
    };
}
