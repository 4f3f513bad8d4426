/**
 * Notification Service - email delivery of shared trip recommendations
 */

import { config } from 'dotenv';
import { NotificationService } from './server';

export { escapeHtml, formatTextForHtml, formatBudget, emailSubject, buildRecommendationHtml, buildRecommendationText } from './formatting';
export { EmailMessage, DeliveryReport, EmailTransport, MailjetTransport, MailjetOptions, SmtpTransport, SmtpOptions, MailSender } from './transports';
export { NotificationSender, NotificationSenderOptions, NotificationOutcome, transportFromEnv } from './sender';
export { NotificationService, parseRecommendation } from './server';

if (require.main === module) {
  config();
  new NotificationService().start();
}
