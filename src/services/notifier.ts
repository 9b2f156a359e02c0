/**
 * src/services/notifier.ts
 *
 * Best-effort delivery of "new posting" messages.
 *
 *   EmailNotifier → SMTP via nodemailer (Gmail SSL on 465 by default).
 *   LogNotifier   → writes the message to the log; used when no SMTP
 *                   credentials are configured.
 *
 * send() never throws. An empty recipient list is a no-op. A failed send
 * is logged and reported back so the pipeline can count it, but it never
 * stops the posting from being persisted and marked seen.
 */

import nodemailer from 'nodemailer';
import { log } from 'crawlee';
import type { JobPosting } from '../sources/types.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface NotificationMessage {
    subject: string;
    body: string;
}

export type NotifyResult =
    | { ok: true; skipped: boolean }
    | { ok: false; error: string };

export interface Notifier {
    readonly name: string;
    send(message: NotificationMessage, recipients: readonly string[]): Promise<NotifyResult>;
}

export interface MailMessage {
    from: string;
    to: string[];
    subject: string;
    text: string;
}

/** The slice of a nodemailer Transporter the notifier uses. */
export interface MailTransport {
    sendMail(mail: MailMessage): Promise<unknown>;
}

export interface SmtpSettings {
    host: string;
    port: number;
    user: string;
    pass: string;
    from: string;
}

// ─── Formatting ───────────────────────────────────────────────────────────────

export function formatPostingMessage(posting: JobPosting): NotificationMessage {
    return {
        subject: `🔔 New ${posting.category} Job 🔔`,
        body: `${posting.title} at ${posting.company} — ${posting.location}\n${posting.url}`,
    };
}

// ─── Email ────────────────────────────────────────────────────────────────────

export class EmailNotifier implements Notifier {
    readonly name = 'email';

    constructor(
        private readonly transport: MailTransport,
        private readonly from: string,
    ) {}

    static fromSmtp(settings: SmtpSettings): EmailNotifier {
        const transporter = nodemailer.createTransport({
            host: settings.host,
            port: settings.port,
            secure: settings.port === 465,
            auth: { user: settings.user, pass: settings.pass },
        });
        return new EmailNotifier(transporter, settings.from);
    }

    async send(message: NotificationMessage, recipients: readonly string[]): Promise<NotifyResult> {
        if (recipients.length === 0) return { ok: true, skipped: true };

        try {
            await this.transport.sendMail({
                from: this.from,
                to: [...recipients],
                subject: message.subject,
                text: message.body,
            });
            log.debug(`[Notifier] Email sent to ${recipients.length} recipient(s): ${message.subject}`);
            return { ok: true, skipped: false };
        } catch (err) {
            const error = err instanceof Error ? err.message : String(err);
            log.warning(`[Notifier] Email send failed: ${error}`);
            return { ok: false, error };
        }
    }
}

// ─── Log-only ─────────────────────────────────────────────────────────────────

export class LogNotifier implements Notifier {
    readonly name = 'log';

    async send(message: NotificationMessage, recipients: readonly string[]): Promise<NotifyResult> {
        if (recipients.length === 0) return { ok: true, skipped: true };
        log.info(`[Notifier] (no SMTP) ${message.subject} → ${recipients.join(', ')}\n${message.body}`);
        return { ok: true, skipped: false };
    }
}

export function createNotifier(smtp: SmtpSettings | null): Notifier {
    if (!smtp) {
        log.warning('[Notifier] EMAIL_SENDER / EMAIL_PASSWORD not set — notifications will only be logged.');
        return new LogNotifier();
    }
    return EmailNotifier.fromSmtp(smtp);
}
