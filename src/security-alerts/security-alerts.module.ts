import { Logger, Module } from "@nestjs/common";
import nodemailer from "nodemailer";
import { APP_CONFIG, type AppConfig } from "../config/env";
import { CustomersModule } from "../customers/customers.module";
import { AlertDispatcher } from "./alert-dispatcher.service";
import { MAIL_TRANSPORT, MailSecurityAlertSink, type MailTransport } from "./mail-security-alert.sink";
import { SECURITY_ALERT_SINK } from "./security-alert.sink";

function createTransport(config: AppConfig): MailTransport {
    const { host, port, user, pass } = config.smtp;
    if (!host) {
        // no SMTP configured: render the message and log it instead
        const logger = new Logger("MailTransport");
        const transporter = nodemailer.createTransport({ jsonTransport: true });
        return {
            async sendMail(options) {
                const info = await transporter.sendMail(options);
                logger.warn(`SMTP_HOST not set, mail not delivered: ${String(info.message)}`);
                return info;
            },
        };
    }
    return nodemailer.createTransport({
        host,
        port,
        secure: port === 465,
        auth: user ? { user, pass } : undefined,
    });
}

@Module({
  imports: [CustomersModule],
  providers: [
    AlertDispatcher,
    { provide: MAIL_TRANSPORT, inject: [APP_CONFIG], useFactory: createTransport },
    { provide: SECURITY_ALERT_SINK, useClass: MailSecurityAlertSink },
  ],
  exports: [AlertDispatcher, SECURITY_ALERT_SINK],
})
export class SecurityAlertsModule { }
