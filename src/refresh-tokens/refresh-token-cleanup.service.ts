import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from "@nestjs/common";
import { CLOCK, type Clock } from "../common/clock";
import { APP_CONFIG, type AppConfig } from "../config/env";
import { TOKEN_STORE, type TokenStore } from "./token.store";

@Injectable()
export class RefreshTokenCleanupService implements OnModuleInit, OnModuleDestroy {
    private readonly logger = new Logger(RefreshTokenCleanupService.name);
    private timer?: NodeJS.Timeout;

    constructor(
        @Inject(TOKEN_STORE) private readonly store: TokenStore,
        @Inject(APP_CONFIG) private readonly config: AppConfig,
        @Inject(CLOCK) private readonly clock: Clock,
    ) { }

    onModuleInit() {
        const { enabled, intervalMs } = this.config.cleanup;
        if (!enabled) {
            this.logger.log("Refresh token cleanup disabled");
            return;
        }
        this.timer = setInterval(() => void this.runOnce(), intervalMs);
        this.timer.unref();
    }

    onModuleDestroy() {
        if (this.timer) clearInterval(this.timer);
    }

    /** Deletes tokens whose expiry lies more than the grace window in the past. Never throws. */
    async runOnce(): Promise<number> {
        const cutoff = new Date(this.clock.now().getTime() - this.config.cleanup.graceMs);
        try {
            const deleted = await this.store.deleteExpiredOlderThan(cutoff);
            this.logger.log(`Deleted ${deleted} refresh token(s) expired before ${cutoff.toISOString()}`);
            return deleted;
        } catch (error) {
            this.logger.error(`Refresh token cleanup failed: ${error instanceof Error ? error.message : String(error)}`,
                error instanceof Error ? error.stack : undefined);
            return 0;
        }
    }
}
