import { Inject, Injectable, Logger } from "@nestjs/common";
import { ACCESS_TOKEN_ISSUER, type AccessTokenIssuer } from "../access-tokens/access-token.issuer";
import { CLOCK, type Clock } from "../common/clock";
import { APP_CONFIG, type AppConfig } from "../config/env";
import { CUSTOMER_DIRECTORY, type CustomerDirectory, type CustomerProfile } from "../customers/customer-directory";
import { AlertDispatcher } from "../security-alerts/alert-dispatcher.service";
import { SECURITY_ALERT_SINK, type SecurityAlertSink } from "../security-alerts/security-alert.sink";
import { describeDevice } from "./device-info";
import { isDeviceMatching } from "./device-matcher";
import {
    DEVICE_INFO_MAX_LENGTH,
    stateOf,
    tokenPreview,
    USER_AGENT_MAX_LENGTH,
    type RefreshTokenRecord,
} from "./refresh-token.record";
import {
    ConcurrentRotationError,
    RefreshTokenExpiredError,
    RefreshTokenNotFoundError,
    RefreshTokenReplayError,
} from "./refresh-token.errors";
import { ReplayDetector, type RequestOrigin } from "./replay-detector.service";
import { TOKEN_STORE, type NewRefreshToken, type TokenStore } from "./token.store";

export interface IssuedSession {
    customer: CustomerProfile;
    accessToken: string;
    refreshToken: RefreshTokenRecord;
    expiresIn: number;
}

/**
 * Refresh-token lifecycle: issue on login, verify, rotate exactly once per
 * value, hand replays to the ReplayDetector, revoke on logout.
 */
@Injectable()
export class TokenRotationService {
    private readonly logger = new Logger(TokenRotationService.name);

    constructor(
        @Inject(TOKEN_STORE) private readonly store: TokenStore,
        @Inject(ACCESS_TOKEN_ISSUER) private readonly accessTokens: AccessTokenIssuer,
        @Inject(CUSTOMER_DIRECTORY) private readonly customers: CustomerDirectory,
        @Inject(SECURITY_ALERT_SINK) private readonly alerts: SecurityAlertSink,
        private readonly replayDetector: ReplayDetector,
        private readonly dispatcher: AlertDispatcher,
        @Inject(APP_CONFIG) private readonly config: AppConfig,
        @Inject(CLOCK) private readonly clock: Clock,
    ) { }

    /** First token of a session chain, created on login. */
    async startSession(customer: CustomerProfile, origin: RequestOrigin): Promise<IssuedSession> {
        const accessToken = await this.accessTokens.issue(customer.id, customer.roles);
        const refreshToken = await this.store.create(this.newToken(customer.id, origin));
        this.logger.log(`Session started for customer ${customer.id} from IP ${origin.ip ?? "unknown"}`);
        return { customer, accessToken, refreshToken, expiresIn: this.accessTokens.ttlSeconds };
    }

    /**
     * Resolves the row behind `value`, revoked or not; expiry wins over revocation.
     */
    async verifyRefreshToken(value: string): Promise<RefreshTokenRecord> {
        const token = await this.store.findByValue(value);
        if (!token) {
            this.logger.warn(`Unknown refresh token ${tokenPreview(value)} presented`);
            throw new RefreshTokenNotFoundError();
        }
        if (stateOf(token, this.clock.now()) === "EXPIRED") {
            this.logger.warn(`Expired refresh token ${tokenPreview(value)} presented`);
            throw new RefreshTokenExpiredError();
        }
        return token;
    }

    async refreshAccessToken(value: string, origin: RequestOrigin): Promise<IssuedSession> {
        const token = await this.verifyRefreshToken(value);

        if (token.revoked) {
            await this.replayDetector.handleReplay(token, origin);
            throw new RefreshTokenReplayError(token.customerRef);
        }

        // everything that can fail runs before the store is touched
        const customer = await this.customers.findProfile(token.customerRef);
        if (!customer) {
            this.logger.error(`Customer ${token.customerRef} of refresh token ${tokenPreview(value)} no longer exists`);
            throw new RefreshTokenNotFoundError();
        }
        const accessToken = await this.accessTokens.issue(customer.id, customer.roles);

        const successor = await this.store.rotate(value, this.newToken(customer.id, origin));
        if (!successor) {
            this.logger.warn(`Lost rotation race for refresh token ${tokenPreview(value)} (customer ${token.customerRef})`);
            throw new ConcurrentRotationError();
        }
        this.checkDevice(token, origin);

        this.logger.log(`Refresh token rotated for customer ${customer.id}`);
        return { customer, accessToken, refreshToken: successor, expiresIn: this.accessTokens.ttlSeconds };
    }

    /** Logout. Absent or already revoked tokens are not an error. */
    async revoke(value: string): Promise<void> {
        const changed = await this.store.revoke(value, this.clock.now());
        this.logger.log(changed ? `Refresh token ${tokenPreview(value)} revoked` : "Logout with an unknown or already revoked token");
    }

    activeSessions(customerRef: string): Promise<RefreshTokenRecord[]> {
        return this.store.findActiveForCustomer(customerRef, this.clock.now());
    }

    private newToken(customerRef: string, origin: RequestOrigin): NewRefreshToken {
        const issuedAt = this.clock.now();
        return {
            customerRef,
            ipAddress: origin.ip,
            userAgent: origin.userAgent?.slice(0, USER_AGENT_MAX_LENGTH) ?? null,
            deviceInfo: describeDevice(origin.userAgent)?.slice(0, DEVICE_INFO_MAX_LENGTH) ?? null,
            issuedAt,
            expiresAt: new Date(issuedAt.getTime() + this.config.refreshTokenTtlMs),
        };
    }

    // permissive: a mismatch only raises a notification, rotation goes ahead
    private checkDevice(token: RefreshTokenRecord, origin: RequestOrigin): void {
        if (isDeviceMatching(token, origin.ip, origin.userAgent)) return;

        this.logger.warn(
            `Device/IP mismatch on refresh for customer ${token.customerRef}: expected IP ${token.ipAddress ?? "unknown"}, got ${origin.ip ?? "unknown"}`,
        );
        this.dispatcher.dispatch("new-device", () =>
            this.alerts.notifyNewDeviceLogin(token.customerRef, origin.ip, origin.userAgent),
        );
    }
}
