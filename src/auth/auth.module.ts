import { Module } from "@nestjs/common";
import { AccessTokensModule } from "../access-tokens/access-tokens.module";
import { CustomersModule } from "../customers/customers.module";
import { RateLimitModule } from "../rate-limit/rate-limit.module";
import { RefreshTokensModule } from "../refresh-tokens/refresh-tokens.module";
import { AuthController } from "./auth.controller";
import { AuthService } from "./auth.service";
import { JwtAccessGuard } from "./guards/jwt-access.guard";

@Module({
  imports: [CustomersModule, AccessTokensModule, RefreshTokensModule, RateLimitModule],
  controllers: [AuthController],
  providers: [AuthService, JwtAccessGuard],
})
export class AuthModule { }
