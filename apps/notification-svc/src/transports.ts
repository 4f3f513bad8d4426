import axios, { AxiosInstance } from 'axios';
import nodemailer from 'nodemailer';
import Mail from 'nodemailer/lib/mailer';
import { errorMessage } from '@tripplanner/shared';

export interface EmailMessage {
  from: { email: string; name: string };
  to: string;
  subject: string;
  html: string;
  text: string;
}

export interface DeliveryReport {
  delivered: boolean;
  detail: string;
  providerStatus?: number;
}

/**
 * Hands one message to a mail provider. Attempts once; never retries.
 */
export interface EmailTransport {
  readonly name: string;
  send(message: EmailMessage): Promise<DeliveryReport>;
}

export interface MailjetOptions {
  apiKey: string;
  apiSecret: string;
  baseUrl?: string;
  timeoutMs?: number;
}

/**
 * Mailjet Send API v3.1 over HTTPS with basic auth. Only HTTP 200 counts as sent.
 */
export class MailjetTransport implements EmailTransport {
  readonly name = 'mailjet';
  private client: AxiosInstance;

  constructor(options: MailjetOptions) {
    this.client = axios.create({
      baseURL: options.baseUrl ?? 'https://api.mailjet.com',
      timeout: options.timeoutMs ?? 30000,
      auth: { username: options.apiKey, password: options.apiSecret },
      headers: { 'Content-Type': 'application/json' },
      validateStatus: () => true
    });
  }

  async send(message: EmailMessage): Promise<DeliveryReport> {
    const payload = {
      Messages: [
        {
          From: { Email: message.from.email, Name: message.from.name },
          To: [{ Email: message.to }],
          Subject: message.subject,
          TextPart: message.text,
          HTMLPart: message.html
        }
      ]
    };

    try {
      const response = await this.client.post('/v3.1/send', payload);
      if (response.status === 200) {
        return { delivered: true, detail: `Email sent successfully to ${message.to}`, providerStatus: 200 };
      }
      return {
        delivered: false,
        detail: `Failed to send email. Status: ${response.status}`,
        providerStatus: response.status
      };
    } catch (error) {
      return { delivered: false, detail: `Network error occurred: ${errorMessage(error)}` };
    }
  }
}

export interface SmtpOptions {
  host: string;
  port: number;
  user: string;
  pass: string;
  secure?: boolean;
}

/**
 * The part of a nodemailer transporter this module calls.
 */
export interface MailSender {
  sendMail(mail: Mail.Options): Promise<{ accepted?: unknown[]; rejected?: unknown[] }>;
}

export class SmtpTransport implements EmailTransport {
  readonly name = 'smtp';
  private transporter: MailSender;

  constructor(options: SmtpOptions | MailSender) {
    this.transporter =
      'sendMail' in options
        ? options
        : nodemailer.createTransport({
            host: options.host,
            port: options.port,
            secure: options.secure ?? false,
            auth: { user: options.user, pass: options.pass }
          });
  }

  async send(message: EmailMessage): Promise<DeliveryReport> {
    try {
      const info = await this.transporter.sendMail({
        from: { address: message.from.email, name: message.from.name },
        to: message.to,
        subject: message.subject,
        text: message.text,
        html: message.html
      });
      const rejected = info.rejected ?? [];
      const accepted = (info.accepted ?? []).length > 0 && rejected.length === 0;
      return accepted
        ? { delivered: true, detail: `Email sent successfully to ${message.to}` }
        : { delivered: false, detail: `SMTP server rejected ${message.to}` };
    } catch (error) {
      return { delivered: false, detail: `SMTP delivery failed: ${errorMessage(error)}` };
    }
  }
}
