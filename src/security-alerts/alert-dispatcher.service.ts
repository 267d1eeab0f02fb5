import { Inject, Injectable, Logger } from "@nestjs/common";
import { APP_CONFIG, type AppConfig } from "../config/env";

class AlertTimeoutError extends Error {
    constructor(ms: number) {
        super(`timed out after ${ms}ms`);
        this.name = "AlertTimeoutError";
    }
}

/**
 * Runs alert deliveries detached from the request: the caller gets control back
 * immediately, slow deliveries are cut off after `alertTimeoutMs`, failures are logged.
 */
@Injectable()
export class AlertDispatcher {
    private readonly logger = new Logger(AlertDispatcher.name);
    private readonly inFlight = new Set<Promise<void>>();

    constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) { }

    dispatch(label: string, task: () => Promise<void>): void {
        const run = this.withTimeout(label, task)
            .catch((error: unknown) => {
                const message = error instanceof Error ? error.message : String(error);
                this.logger.error(`Failed to deliver ${label} alert: ${message}`);
            })
            .finally(() => this.inFlight.delete(run));
        this.inFlight.add(run);
    }

    /** Resolves once every alert dispatched so far has settled. */
    async drain(): Promise<void> {
        await Promise.all(Array.from(this.inFlight));
    }

    private withTimeout(label: string, task: () => Promise<void>): Promise<void> {
        const ms = this.config.alertTimeoutMs;
        let timer: NodeJS.Timeout | undefined;
        const timeout = new Promise<never>((_, reject) => {
            timer = setTimeout(() => reject(new AlertTimeoutError(ms)), ms);
            timer.unref();
        });
        // a sink that throws synchronously is treated like a rejected delivery
        const delivery = Promise.resolve().then(task);
        this.logger.debug(`Dispatching ${label} alert`);
        return Promise.race([delivery, timeout]).finally(() => clearTimeout(timer));
    }
}
