import { Recommendation, validateEmail } from '@tripplanner/shared';
import { buildRecommendationHtml, buildRecommendationText, emailSubject } from './formatting';
import { EmailTransport, MailjetTransport, SmtpTransport } from './transports';

export interface NotificationOutcome {
  status: 'sent' | 'failed';
  message: string;
  transport?: string;
  providerStatus?: number;
}

export interface NotificationSenderOptions {
  transport: EmailTransport | null;
  senderEmail?: string;
  senderName?: string;
}

/**
 * Picks Mailjet when its keys are set, SMTP when the SMTP settings are, else nothing.
 */
export function transportFromEnv(env: NodeJS.ProcessEnv = process.env): EmailTransport | null {
  if (env.MAILJET_API_KEY && env.MAILJET_API_SECRET) {
    return new MailjetTransport({
      apiKey: env.MAILJET_API_KEY,
      apiSecret: env.MAILJET_API_SECRET,
      baseUrl: env.MAILJET_BASE_URL
    });
  }
  if (env.SMTP_HOST && env.SMTP_PORT && env.SMTP_USER && env.SMTP_PASS) {
    return new SmtpTransport({
      host: env.SMTP_HOST,
      port: Number(env.SMTP_PORT),
      user: env.SMTP_USER,
      pass: env.SMTP_PASS
    });
  }
  return null;
}

export class NotificationSender {
  private transport: EmailTransport | null;
  private senderEmail: string;
  private defaultSenderName: string;

  constructor(options: NotificationSenderOptions) {
    this.transport = options.transport;
    this.senderEmail = options.senderEmail ?? '';
    this.defaultSenderName = options.senderName ?? 'Travel Agent App';
  }

  static fromEnv(env: NodeJS.ProcessEnv = process.env): NotificationSender {
    return new NotificationSender({
      transport: transportFromEnv(env),
      senderEmail: env.SHARE_SENDER_EMAIL,
      senderName: env.SHARE_SENDER_NAME
    });
  }

  get isConfigured(): boolean {
    return this.transport !== null && this.senderEmail !== '';
  }

  /**
   * Emails a recommendation. Delivery problems come back as a failed outcome;
   * only a malformed recipient throws.
   */
  async send(recipient: string, recommendation: Recommendation, senderName?: string): Promise<NotificationOutcome> {
    validateEmail(recipient);
    const sharedBy = senderName?.trim() || 'Travel Enthusiast';

    if (!this.transport) {
      return { status: 'failed', message: 'Email is not configured: set Mailjet keys or SMTP settings' };
    }
    if (this.senderEmail === '') {
      return { status: 'failed', message: 'Email is not configured: SHARE_SENDER_EMAIL is not set' };
    }

    const report = await this.transport.send({
      from: { email: this.senderEmail, name: this.defaultSenderName },
      to: recipient,
      subject: emailSubject(sharedBy),
      html: buildRecommendationHtml(recommendation, sharedBy),
      text: buildRecommendationText(recommendation, sharedBy)
    });

    if (report.delivered) {
      console.log(`📧 Recommendation emailed to ${recipient} via ${this.transport.name}`);
    } else {
      console.error(`❌ Recommendation email to ${recipient} failed: ${report.detail}`);
    }

    return {
      status: report.delivered ? 'sent' : 'failed',
      message: report.detail,
      transport: this.transport.name,
      providerStatus: report.providerStatus
    };
  }
}
