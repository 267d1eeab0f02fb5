import { Expose } from "class-transformer";

export class SessionDto {
  @Expose() id!: string;
  @Expose() ipAddress!: string | null;
  @Expose() deviceInfo!: string | null;
  @Expose({ name: "issuedAt" }) createdAt!: Date;
  @Expose() expiresAt!: Date;
}
