import { describe, it, expect } from '@jest/globals';
import request from 'supertest';
import { NotificationSender } from '../sender';
import { MailSender, SmtpTransport } from '../transports';
import { NotificationService } from '../server';

function service(accept: boolean): NotificationService {
  const transporter: MailSender = {
    async sendMail(mail) {
      return accept ? { accepted: [mail.to], rejected: [] } : { accepted: [], rejected: [mail.to] };
    }
  };
  return new NotificationService(
    new NotificationSender({ transport: new SmtpTransport(transporter), senderEmail: 'planner@example.com' })
  );
}

const recommendation = {
  title: 'AI-Powered Travel Plan for Rome',
  destination: 'Rome',
  dates: '2030-09-01 to 2030-09-04',
  budget: 4000,
  full_recommendation: 'Day 1: Colosseum',
  api_sources: ['Amadeus Flight API']
};

describe('Notification Service', () => {
  it('should email a recommendation', async () => {
    const response = await request(service(true).app)
      .post('/notifications/recommendation')
      .send({ recipient_email: 'friend@example.com', sender_name: 'Ana', recommendation })
      .expect(200);

    expect(response.body.success).toBe(true);
    expect(response.body.data).toEqual({
      status: 'sent',
      message: 'Email sent successfully to friend@example.com',
      transport: 'smtp'
    });
  });

  it('should answer 502 when the provider refuses the message', async () => {
    const response = await request(service(false).app)
      .post('/notifications/recommendation')
      .send({ recipient_email: 'friend@example.com', recommendation })
      .expect(502);

    expect(response.body.error).toEqual({ code: 'UPSTREAM_ERROR', message: 'SMTP server rejected friend@example.com' });
  });

  it('should validate the request body', async () => {
    const response = await request(service(true).app).post('/notifications/recommendation').send({}).expect(400);
    expect(response.body.error.details).toEqual({
      recipient_email: 'Recipient email is required',
      recommendation: 'Recommendation text is required'
    });
  });

  it('should reject a malformed recipient', async () => {
    const response = await request(service(true).app)
      .post('/notifications/recommendation')
      .send({ recipient_email: 'nobody', recommendation })
      .expect(400);
    expect(response.body.error.details).toEqual({ email: 'Invalid email format' });
  });
});
