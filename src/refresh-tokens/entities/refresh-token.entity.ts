import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn, UpdateDateColumn } from "typeorm";
import { DEVICE_INFO_MAX_LENGTH, USER_AGENT_MAX_LENGTH } from "../refresh-token.record";

@Entity("refresh_tokens")
@Index("idx_refresh_tokens_customer_active", ["customerId", "revoked", "expiresAt"])
export class RefreshTokenEntity {
    @PrimaryGeneratedColumn({ type: "bigint" })
    id!: string;

    @Index("idx_refresh_tokens_value", { unique: true })
    @Column({ type: "varchar", length: 64 })
    value!: string;

    @Column({ name: "customer_id", type: "bigint" })
    customerId!: string;

    @Column({ name: "expires_at", type: "datetime", precision: 3 })
    expiresAt!: Date;

    @Column({ type: "boolean", default: false })
    revoked!: boolean;

    @Column({ name: "ip_address", type: "varchar", length: 45, nullable: true })
    ipAddress!: string | null; // IPv6 max

    @Column({ name: "user_agent", type: "varchar", length: USER_AGENT_MAX_LENGTH, nullable: true })
    userAgent!: string | null;

    @Column({ name: "device_info", type: "varchar", length: DEVICE_INFO_MAX_LENGTH, nullable: true })
    deviceInfo!: string | null;

    @CreateDateColumn({
        name: "created_at",
        type: 'datetime',
        precision: 3,
        default: () => 'CURRENT_TIMESTAMP(3)',
    })
    createdAt!: Date;

    @UpdateDateColumn({
        name: "updated_at",
        type: 'datetime',
        precision: 3,
        default: () => 'CURRENT_TIMESTAMP(3)',
    })
    updatedAt!: Date;
}
