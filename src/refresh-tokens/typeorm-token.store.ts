import { Injectable } from "@nestjs/common";
import { InjectRepository } from "@nestjs/typeorm";
import { EntityManager, LessThan, MoreThan, Repository } from "typeorm";
import { RefreshTokenEntity } from "./entities/refresh-token.entity";
import type { RefreshTokenRecord } from "./refresh-token.record";
import { generateTokenValue } from "./token-value";
import type { NewRefreshToken, TokenStore } from "./token.store";

function toRecord(row: RefreshTokenEntity): RefreshTokenRecord {
    return Object.freeze({
        id: String(row.id),
        value: row.value,
        customerRef: String(row.customerId),
        issuedAt: row.createdAt,
        expiresAt: row.expiresAt,
        revoked: Boolean(row.revoked),
        ipAddress: row.ipAddress,
        userAgent: row.userAgent,
        deviceInfo: row.deviceInfo,
        updatedAt: row.updatedAt,
    });
}

@Injectable()
export class TypeOrmTokenStore implements TokenStore {
    constructor(@InjectRepository(RefreshTokenEntity) private readonly tokensRepo: Repository<RefreshTokenEntity>) { }

    create(input: NewRefreshToken): Promise<RefreshTokenRecord> {
        return this.insert(this.tokensRepo.manager, input);
    }

    async findByValue(value: string): Promise<RefreshTokenRecord | null> {
        const row = await this.tokensRepo.findOne({ where: { value } });
        return row ? toRecord(row) : null;
    }

    async tryClaimForRotation(value: string, at: Date, manager: EntityManager = this.tokensRepo.manager): Promise<boolean> {
        // single conditional write: only the request that still sees revoked = false matches the row
        const result = await manager.update(RefreshTokenEntity, { value, revoked: false }, { revoked: true, updatedAt: at });
        return (result.affected ?? 0) === 1;
    }

    rotate(parentValue: string, successor: NewRefreshToken): Promise<RefreshTokenRecord | null> {
        // a failed insert rolls the claim back, so the parent stays usable
        return this.tokensRepo.manager.transaction(async (manager) => {
            const claimed = await this.tryClaimForRotation(parentValue, successor.issuedAt, manager);
            return claimed ? this.insert(manager, successor) : null;
        });
    }

    async revoke(value: string, at: Date): Promise<boolean> {
        const result = await this.tokensRepo.update({ value, revoked: false }, { revoked: true, updatedAt: at });
        return (result.affected ?? 0) > 0;
    }

    async revokeAllForCustomer(customerRef: string, at: Date): Promise<number> {
        const result = await this.tokensRepo.update(
            { customerId: customerRef, revoked: false },
            { revoked: true, updatedAt: at },
        );
        return result.affected ?? 0;
    }

    async findActiveForCustomer(customerRef: string, now: Date): Promise<RefreshTokenRecord[]> {
        const rows = await this.tokensRepo.find({
            where: { customerId: customerRef, revoked: false, expiresAt: MoreThan(now) },
            order: { createdAt: "DESC" },
        });
        return rows.map(toRecord);
    }

    async deleteExpiredOlderThan(cutoff: Date): Promise<number> {
        const result = await this.tokensRepo.delete({ expiresAt: LessThan(cutoff) });
        return result.affected ?? 0;
    }

    private async insert(manager: EntityManager, input: NewRefreshToken): Promise<RefreshTokenRecord> {
        const row = manager.create(RefreshTokenEntity, {
            value: generateTokenValue(),
            customerId: input.customerRef,
            expiresAt: input.expiresAt,
            revoked: false,
            ipAddress: input.ipAddress,
            userAgent: input.userAgent,
            deviceInfo: input.deviceInfo,
            createdAt: input.issuedAt,
            updatedAt: input.issuedAt,
        });
        return toRecord(await manager.save(row));
    }
}
