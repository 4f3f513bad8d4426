/**
 * Notification Service - emails shared trip recommendations
 */

import express, { NextFunction, Request, Response } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import {
  ApiResponse,
  AppError,
  ErrorCodes,
  FieldErrors,
  Recommendation,
  TRAVEL_STYLES,
  generateTraceId,
  isFormInput,
  readChoice,
  readList,
  readNumber,
  readString
} from '@tripplanner/shared';
import { NotificationSender } from './sender';

function traceIdOf(res: Response): string {
  const traceId: unknown = res.locals.traceId;
  return typeof traceId === 'string' ? traceId : '';
}

/**
 * Accepts the recommendation in the same snake_case shape the trip service returns from polling.
 */
export function parseRecommendation(body: unknown, errors: FieldErrors): Recommendation {
  const input = isFormInput(body) ? body : {};
  const title = readString(input, 'title') ?? 'Travel Recommendation';
  const text = readString(input, 'full_recommendation', 'body', 'description') ?? '';
  if (text === '') {
    errors.add('recommendation', 'Recommendation text is required');
  }
  return {
    title,
    destination: readString(input, 'destination') ?? 'Unknown Destination',
    dates: readString(input, 'dates') ?? 'Dates not specified',
    budget: readNumber(input, errors, 'budget', { min: 0, max: Number.MAX_SAFE_INTEGER }, 0),
    interests: readList(input, 'interests'),
    travelStyle: readChoice(input, errors, 'travel_style', TRAVEL_STYLES, 'economy', (raw) => raw.toLowerCase()),
    body: text,
    steps: readList(input, 'tasks'),
    sources: readList(input, 'api_sources'),
    generatedBy: readString(input, 'generated_by') === 'llm' ? 'llm' : 'template',
    generatedAt: readString(input, 'generated_at') ?? new Date().toISOString()
  };
}

export class NotificationService {
  public app: express.Application;
  private sender: NotificationSender;
  private port: number;

  constructor(sender: NotificationSender = NotificationSender.fromEnv()) {
    this.app = express();
    this.sender = sender;
    this.port = Number(process.env.NOTIFICATION_PORT ?? 8009);
    this.setupMiddleware();
    this.setupRoutes();
  }

  private setupMiddleware() {
    this.app.use(helmet());
    this.app.use(cors());
    this.app.use(express.json({ limit: '1mb' }));
    this.app.use(express.urlencoded({ extended: true }));

    // Request tracing
    this.app.use((req, res, next) => {
      const traceId = req.header('x-trace-id') || generateTraceId();
      res.locals.traceId = traceId;
      res.setHeader('X-Trace-Id', traceId);
      next();
    });
  }

  private setupRoutes() {
    // Health check
    this.app.get('/health', (req, res) => {
      res.json({
        success: true,
        data: {
          status: 'healthy',
          service: 'notification-svc',
          timestamp: new Date().toISOString(),
          email: this.sender.isConfigured ? 'configured' : 'disabled'
        }
      });
    });

    this.app.post('/notifications/recommendation', this.sendRecommendation.bind(this));

    this.app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
      const traceId = traceIdOf(res);
      if (err instanceof AppError) {
        const response: ApiResponse = {
          success: false,
          error: { code: err.code, message: err.message, details: err.details },
          traceId
        };
        res.status(err.statusCode).json(response);
        return;
      }
      console.error('Notification service error:', err);
      const response: ApiResponse = {
        success: false,
        error: { code: ErrorCodes.INTERNAL_ERROR, message: 'Internal server error' },
        traceId
      };
      res.status(500).json(response);
    });
  }

  private async sendRecommendation(req: Request, res: Response, next: NextFunction) {
    try {
      const input = isFormInput(req.body) ? req.body : {};
      const errors = new FieldErrors();
      const recipient = readString(input, 'recipient_email', 'recipient') ?? '';
      if (recipient === '') {
        errors.add('recipient_email', 'Recipient email is required');
      }
      const recommendation = parseRecommendation(input.recommendation, errors);
      errors.throwIfAny();

      const outcome = await this.sender.send(recipient, recommendation, readString(input, 'sender_name'));
      const response: ApiResponse = {
        success: outcome.status === 'sent',
        data: outcome,
        traceId: traceIdOf(res)
      };
      if (outcome.status === 'failed') {
        response.error = { code: ErrorCodes.UPSTREAM_ERROR, message: outcome.message };
      }
      res.status(outcome.status === 'sent' ? 200 : 502).json(response);
    } catch (error) {
      next(error);
    }
  }

  public start() {
    this.app.listen(this.port, () => {
      console.log(`🚀 Notification Service listening on port ${this.port}`);
      console.log('📧 Email:', this.sender.isConfigured ? '✅ Configured' : '⚠️ Disabled');
    });
  }
}
