import { Inject, Injectable, Logger } from "@nestjs/common";
import type { SendMailOptions } from "nodemailer";
import { CLOCK, type Clock } from "../common/clock";
import { APP_CONFIG, type AppConfig } from "../config/env";
import { CUSTOMER_DIRECTORY, type CustomerDirectory } from "../customers/customer-directory";
import { describeDevice } from "../refresh-tokens/device-info";
import { compromiseMail, newDeviceMail, type RenderedMail } from "./alert-templates";
import type { SecurityAlertSink } from "./security-alert.sink";

export const MAIL_TRANSPORT = Symbol("MAIL_TRANSPORT");

export interface MailTransport {
    sendMail(options: SendMailOptions): Promise<unknown>;
}

@Injectable()
export class MailSecurityAlertSink implements SecurityAlertSink {
    private readonly logger = new Logger(MailSecurityAlertSink.name);

    constructor(
        @Inject(MAIL_TRANSPORT) private readonly transport: MailTransport,
        @Inject(CUSTOMER_DIRECTORY) private readonly customers: CustomerDirectory,
        @Inject(APP_CONFIG) private readonly config: AppConfig,
        @Inject(CLOCK) private readonly clock: Clock,
    ) { }

    notifyPossibleCompromise(customerRef: string, ip: string | null, userAgent: string | null, reason: string) {
        return this.send(customerRef, (name) =>
            compromiseMail(reason, { customerName: name, occurredAt: this.clock.now(), ipAddress: ip, device: describeDevice(userAgent) }),
        );
    }

    notifyNewDeviceLogin(customerRef: string, ip: string | null, userAgent: string | null) {
        return this.send(customerRef, (name) =>
            newDeviceMail({ customerName: name, occurredAt: this.clock.now(), ipAddress: ip, device: describeDevice(userAgent) }),
        );
    }

    private async send(customerRef: string, build: (customerName: string) => RenderedMail): Promise<void> {
        const customer = await this.customers.findProfile(customerRef);
        if (!customer || !customer.email.trim()) {
            this.logger.error(`Cannot send security alert: no email on record for customer ${customerRef}`);
            return;
        }

        const mail = build(customer.name);
        await this.transport.sendMail({
            from: this.config.smtp.from,
            to: customer.email,
            subject: mail.subject,
            text: mail.text,
            html: mail.html,
        });
        this.logger.log(`Security alert "${mail.subject}" sent to ${customer.email}`);
    }
}
