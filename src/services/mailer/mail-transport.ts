import { createTransport } from 'nodemailer';
import Mail from 'nodemailer/lib/mailer';
import { MailConfig } from '../../models/report-config';

export const MAIL_TRANSPORT_FACTORY = 'MAIL_TRANSPORT_FACTORY';

export interface SentMail {
  messageId: string;
  rejected?: Array<string | Mail.Address>;
}

/**
 * The part of a nodemailer transporter the mailer relies on.
 */
export interface MailTransport {
  verify(): Promise<true>;
  sendMail(mail: Mail.Options): Promise<SentMail>;
  close(): void;
}

export type MailTransportFactory = (config: MailConfig) => MailTransport;

export const createSmtpTransport: MailTransportFactory = ({ smtpHost, smtpPort, secure, sender, password, timeoutMs }) =>
  createTransport({
    host: smtpHost,
    port: smtpPort,
    secure,
    auth: {
      user: sender,
      pass: password,
    },
    connectionTimeout: timeoutMs,
    greetingTimeout: timeoutMs,
    socketTimeout: timeoutMs,
  });
