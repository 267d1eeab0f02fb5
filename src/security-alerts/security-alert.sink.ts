export const SECURITY_ALERT_SINK = Symbol("SECURITY_ALERT_SINK");

/**
 * Outbound channel for security notifications. Calls are best-effort: the
 * token lifecycle never waits on them and never fails because of them.
 */
export interface SecurityAlertSink {
    notifyPossibleCompromise(customerRef: string, ip: string | null, userAgent: string | null, reason: string): Promise<void>;
    notifyNewDeviceLogin(customerRef: string, ip: string | null, userAgent: string | null): Promise<void>;
}
