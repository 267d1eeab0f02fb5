import { Module } from "@nestjs/common";
import { JwtModule } from "@nestjs/jwt";
import { ACCESS_TOKEN_ISSUER } from "./access-token.issuer";
import { JwtAccessTokenIssuer } from "./jwt-access-token.issuer";

@Module({
  imports: [JwtModule.register({})], // secret passed explicitly per call
  providers: [{ provide: ACCESS_TOKEN_ISSUER, useClass: JwtAccessTokenIssuer }],
  exports: [ACCESS_TOKEN_ISSUER],
})
export class AccessTokensModule { }
