import { createTransport } from "nodemailer";
import type Mail from "nodemailer/lib/mailer";
import type SMTPTransport from "nodemailer/lib/smtp-transport";
import type { AppConfig } from "./config";
import { DeliveryError } from "./errors";
import type { ReportMessage } from "./types";

export interface ReportDelivery {
  deliver(message: ReportMessage): Promise<void>;
}

export interface EmailDeliveryOptions {
  host: string;
  port: number;
  user: string;
  password: string;
  from: string;
  recipients: string[];
}

/** The slice of a nodemailer transporter the delivery uses. */
export interface MailTransport {
  sendMail(mail: Mail.Options): Promise<unknown>;
  close(): void;
}

export type TransportFactory = (options: SMTPTransport.Options) => MailTransport;

const smtpTransport: TransportFactory = (options) => createTransport(options);

// ─── Email ────────────────────────────────────────────────────────────────────

/**
 * Sends the report over SMTP, upgrading the connection with STARTTLS before
 * authenticating. A message with both `text` and `html` goes out as
 * multipart/alternative.
 */
export class EmailDelivery implements ReportDelivery {
  constructor(
    private readonly options: EmailDeliveryOptions,
    private readonly transportFactory: TransportFactory = smtpTransport
  ) {}

  async deliver(message: ReportMessage): Promise<void> {
    const { host, port, user, password, from, recipients } = this.options;

    const transporter = this.transportFactory({
      host,
      port,
      secure: false,
      requireTLS: true,
      auth: { user, pass: password },
    });

    try {
      await transporter.sendMail({
        from,
        to: recipients.join(", "),
        subject: message.subject,
        text: message.text,
        html: message.html,
      });
    } catch (err) {
      throw new DeliveryError(`EmailDelivery: failed to send via ${host}:${port}`, {
        cause: err,
      });
    } finally {
      transporter.close();
    }

    console.log("Email sent to:");
    for (const recipient of recipients) console.log(` - ${recipient}`);
  }
}

// ─── Console ──────────────────────────────────────────────────────────────────

export class ConsoleDelivery implements ReportDelivery {
  async deliver(message: ReportMessage): Promise<void> {
    console.log(`Subject: ${message.subject}\n`);
    console.log(message.text);
    if (message.html) console.log(message.html);
  }
}

export function createDelivery(config: AppConfig): ReportDelivery {
  if (config.delivery === "console") return new ConsoleDelivery();
  return new EmailDelivery({
    host: config.smtp.host,
    port: config.smtp.port,
    user: config.smtp.user,
    password: config.smtp.password,
    from: config.senderEmail,
    recipients: config.recipients,
  });
}
