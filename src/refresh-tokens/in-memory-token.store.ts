import { Injectable } from "@nestjs/common";
import { isExpired, revokeRecord, type RefreshTokenRecord } from "./refresh-token.record";
import { generateTokenValue } from "./token-value";
import type { NewRefreshToken, TokenStore } from "./token.store";

/**
 * Map-backed TokenStore. Every mutation happens synchronously inside one
 * call, so check-and-set is atomic on the single Node event loop.
 */
@Injectable()
export class InMemoryTokenStore implements TokenStore {
    private readonly byValue = new Map<string, RefreshTokenRecord>();
    private sequence = 0;

    async create(input: NewRefreshToken): Promise<RefreshTokenRecord> {
        return this.insert(input);
    }

    async findByValue(value: string): Promise<RefreshTokenRecord | null> {
        return this.byValue.get(value) ?? null;
    }

    async tryClaimForRotation(value: string, at: Date): Promise<boolean> {
        return this.revokeIfActive(value, at);
    }

    async rotate(parentValue: string, successor: NewRefreshToken): Promise<RefreshTokenRecord | null> {
        const parent = this.byValue.get(parentValue);
        if (!parent || parent.revoked) return null;
        // insert first: if it throws, the parent is untouched
        const record = this.insert(successor);
        this.byValue.set(parentValue, revokeRecord(parent, successor.issuedAt));
        return record;
    }

    async revoke(value: string, at: Date): Promise<boolean> {
        return this.revokeIfActive(value, at);
    }

    async revokeAllForCustomer(customerRef: string, at: Date): Promise<number> {
        let changed = 0;
        for (const record of this.byValue.values()) {
            if (record.customerRef === customerRef && !record.revoked) {
                this.byValue.set(record.value, revokeRecord(record, at));
                changed++;
            }
        }
        return changed;
    }

    async findActiveForCustomer(customerRef: string, now: Date): Promise<RefreshTokenRecord[]> {
        return Array.from(this.byValue.values())
            .filter((r) => r.customerRef === customerRef && !r.revoked && !isExpired(r, now))
            .sort((a, b) => b.issuedAt.getTime() - a.issuedAt.getTime());
    }

    async deleteExpiredOlderThan(cutoff: Date): Promise<number> {
        let deleted = 0;
        for (const [value, record] of this.byValue.entries()) {
            if (record.expiresAt.getTime() < cutoff.getTime()) {
                this.byValue.delete(value);
                deleted++;
            }
        }
        return deleted;
    }

    /** Every stored row, for inspection in tests. */
    all(): RefreshTokenRecord[] {
        return Array.from(this.byValue.values());
    }

    private insert(input: NewRefreshToken): RefreshTokenRecord {
        let value = generateTokenValue();
        while (this.byValue.has(value)) value = generateTokenValue();

        const record: RefreshTokenRecord = Object.freeze({
            id: String(++this.sequence),
            value,
            customerRef: input.customerRef,
            issuedAt: input.issuedAt,
            expiresAt: input.expiresAt,
            revoked: false,
            ipAddress: input.ipAddress,
            userAgent: input.userAgent,
            deviceInfo: input.deviceInfo,
            updatedAt: input.issuedAt,
        });
        this.byValue.set(value, record);
        return record;
    }

    private revokeIfActive(value: string, at: Date): boolean {
        const record = this.byValue.get(value);
        if (!record || record.revoked) return false;
        this.byValue.set(value, revokeRecord(record, at));
        return true;
    }
}
