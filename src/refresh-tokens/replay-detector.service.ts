import { Inject, Injectable, Logger } from "@nestjs/common";
import { CLOCK, type Clock } from "../common/clock";
import { AlertDispatcher } from "../security-alerts/alert-dispatcher.service";
import { SECURITY_ALERT_SINK, type SecurityAlertSink } from "../security-alerts/security-alert.sink";
import { tokenPreview, type RefreshTokenRecord } from "./refresh-token.record";
import { TOKEN_STORE, type TokenStore } from "./token.store";

export const REPLAY_REASON = "revoked token reused";

export interface RequestOrigin {
    ip: string | null;
    userAgent: string | null;
}

@Injectable()
export class ReplayDetector {
    private readonly logger = new Logger(ReplayDetector.name);

    constructor(
        @Inject(TOKEN_STORE) private readonly store: TokenStore,
        @Inject(SECURITY_ALERT_SINK) private readonly alerts: SecurityAlertSink,
        private readonly dispatcher: AlertDispatcher,
        @Inject(CLOCK) private readonly clock: Clock,
    ) { }

    /**
     * A revoked token came back: assume the session chain is stolen and
     * revoke every token of the customer. The alert is detached from the revocation.
     */
    async handleReplay(token: RefreshTokenRecord, origin: RequestOrigin): Promise<void> {
        const { customerRef } = token;
        this.logger.error(
            `SECURITY: revoked refresh token ${tokenPreview(token.value)} reused for customer ${customerRef} ` +
            `from IP ${origin.ip ?? "unknown"} (originally ${token.ipAddress ?? "unknown"}) with User-Agent "${origin.userAgent ?? ""}"`,
        );

        const revoked = await this.store.revokeAllForCustomer(customerRef, this.clock.now());
        this.logger.warn(`Revoked ${revoked} active refresh token(s) for customer ${customerRef}`);

        this.dispatcher.dispatch("possible-compromise", () =>
            this.alerts.notifyPossibleCompromise(customerRef, origin.ip, origin.userAgent, REPLAY_REASON),
        );
    }
}
