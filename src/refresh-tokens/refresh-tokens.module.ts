import { Module } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";
import { AccessTokensModule } from "../access-tokens/access-tokens.module";
import { CustomersModule } from "../customers/customers.module";
import { SecurityAlertsModule } from "../security-alerts/security-alerts.module";
import { RefreshTokenEntity } from "./entities/refresh-token.entity";
import { RefreshTokenCleanupService } from "./refresh-token-cleanup.service";
import { ReplayDetector } from "./replay-detector.service";
import { TOKEN_STORE } from "./token.store";
import { TokenRotationService } from "./token-rotation.service";
import { TypeOrmTokenStore } from "./typeorm-token.store";

@Module({
  imports: [
    TypeOrmModule.forFeature([RefreshTokenEntity]),
    AccessTokensModule,
    CustomersModule,
    SecurityAlertsModule,
  ],
  providers: [
    { provide: TOKEN_STORE, useClass: TypeOrmTokenStore },
    ReplayDetector,
    TokenRotationService,
    RefreshTokenCleanupService,
  ],
  exports: [TokenRotationService],
})
export class RefreshTokensModule { }
