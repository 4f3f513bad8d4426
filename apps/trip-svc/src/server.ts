/**
 * Trip Service - auth, asynchronous trip search and itinerary sharing
 */

import express, { NextFunction, Request, Response } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import {
  ConflictError,
  FieldErrors,
  FormInput,
  HealthCheck,
  SearchAcceptedPayload,
  UpstreamError,
  ValidationError,
  isFormInput,
  readInteger,
  readString,
  toSearchStatusPayload,
  toSearchSummaryPayload,
  toTokenPayload,
  toUserPayload
} from '@tripplanner/shared';
import { NotificationSender } from '@tripplanner/notification-svc';
import { AppConfig } from './config';
import { TripMetrics } from './metrics';
import { requireUser, sessionOf } from './middleware/auth';
import { errorHandler, notFound, sendData, traceRequests } from './middleware/errorHandler';
import { UserRepository } from './repositories/userRepository';
import { KeyValueStore } from './store/keyValueStore';
import { AccountService, toPublicUser } from './services/accountService';
import { TaskRunner } from './services/backgroundTasks';
import { Composer, FlightSearcher, HotelSearcher, SearchOrchestrator } from './services/searchOrchestrator';
import { TokenIssuer } from './services/tokenIssuer';

export interface TripComponents {
  users: UserRepository;
  store: KeyValueStore;
  flights: FlightSearcher;
  hotels: HotelSearcher;
  composer: Composer & { readonly usesLlm: boolean };
  sender: NotificationSender;
  tasks?: TaskRunner;
  metrics?: TripMetrics;
  clock?: () => Date;
}

const STORE_LABELS: Record<UserRepository['kind'], string> = {
  mysql: '✅ MySQL',
  sqlite: '✅ SQLite file',
  memory: '⚠️ In-memory'
};

function formOf(body: unknown): FormInput {
  return isFormInput(body) ? body : {};
}

// Passwords are compared as sent, without trimming.
function rawString(input: FormInput, name: string): string {
  const value = input[name];
  return typeof value === 'string' ? value : '';
}

export class TripService {
  public app: express.Application;
  public readonly tasks: TaskRunner;
  public readonly metrics: TripMetrics;
  private config: AppConfig;
  private components: TripComponents;
  private accounts: AccountService;
  private searches: SearchOrchestrator;

  constructor(config: AppConfig, components: TripComponents) {
    this.app = express();
    this.config = config;
    this.components = components;
    this.tasks = components.tasks ?? new TaskRunner();
    this.metrics = components.metrics ?? new TripMetrics();

    const clock = components.clock ?? (() => new Date());
    const tokens = new TokenIssuer({
      secret: config.jwtSecret,
      store: components.store,
      accessTtlSeconds: config.accessTokenTtlSeconds,
      refreshTtlSeconds: config.refreshTokenTtlSeconds,
      clock: () => clock().getTime()
    });
    this.accounts = new AccountService(components.users, tokens, config.bcryptRounds);
    this.searches = new SearchOrchestrator({
      store: components.store,
      flights: components.flights,
      hotels: components.hotels,
      composer: components.composer,
      tasks: this.tasks,
      ttlSeconds: config.searchResultTtlSeconds,
      clock,
      onFinished: (status) => this.metrics.recordSearch(status)
    });

    this.setupMiddleware();
    this.setupRoutes();
  }

  private setupMiddleware() {
    this.app.use(helmet());
    this.app.use(cors());
    this.app.use(express.json({ limit: '1mb' }));
    this.app.use(express.urlencoded({ extended: true }));
    this.app.use(traceRequests);
    this.app.use(this.metrics.middleware());
  }

  private setupRoutes() {
    const authenticated = requireUser(this.accounts);

    this.app.get('/health', this.health.bind(this));
    this.app.get('/metrics', this.renderMetrics.bind(this));

    // Auth routes
    this.app.post('/register', this.register.bind(this));
    this.app.post('/login', this.login.bind(this));
    this.app.post('/refresh', this.refresh.bind(this));
    this.app.post('/logout', authenticated, this.logout.bind(this));

    // Account
    this.app.delete('/user', authenticated, this.deleteUser.bind(this));
    this.app.get('/user/profile', authenticated, this.profile.bind(this));
    this.app.get('/user/searches', authenticated, this.listSearches.bind(this));

    // Trip search
    this.app.post('/search', authenticated, this.submitSearch.bind(this));
    this.app.get('/search/:searchId', authenticated, this.getSearch.bind(this));
    this.app.post('/search/:searchId/share', authenticated, this.shareSearch.bind(this));

    this.app.use(notFound);
    this.app.use(errorHandler('Trip Service'));
  }

  private async health(req: Request, res: Response, next: NextFunction) {
    try {
      const { users, store, composer } = this.components;
      const database = users.kind === 'memory' ? 'in-memory' : (await users.ping()) ? 'healthy' : 'unhealthy';
      const cache = store.kind === 'memory' ? 'in-memory' : (await store.ping()) ? 'healthy' : 'unhealthy';
      const health: HealthCheck = {
        status: database === 'unhealthy' || cache === 'unhealthy' ? 'unhealthy' : 'healthy',
        timestamp: new Date().toISOString(),
        service: 'trip-svc',
        version: '1.0.0',
        checks: { database, cache, llm: composer.usesLlm ? 'configured' : 'template-only' }
      };
      sendData(res, health, health.status === 'healthy' ? 200 : 503);
    } catch (error) {
      next(error);
    }
  }

  private async renderMetrics(req: Request, res: Response, next: NextFunction) {
    try {
      const { contentType, body } = await this.metrics.render();
      res.set('Content-Type', contentType);
      res.end(body);
    } catch (error) {
      next(error);
    }
  }

  private async register(req: Request, res: Response, next: NextFunction) {
    try {
      const input = formOf(req.body);
      const errors = new FieldErrors();
      const email = readString(input, 'email') ?? '';
      const username = readString(input, 'username') ?? '';
      const password = rawString(input, 'password');
      if (email === '') errors.add('email', 'Email is required');
      if (username === '') errors.add('username', 'Username is required');
      if (password === '') errors.add('password', 'Password is required');
      errors.throwIfAny();

      const user = await this.accounts.register({
        email,
        username,
        password,
        fullName: readString(input, 'full_name', 'fullName')
      });
      sendData(res, toUserPayload(user), 201);
    } catch (error) {
      next(error);
    }
  }

  private async login(req: Request, res: Response, next: NextFunction) {
    try {
      const input = formOf(req.body);
      const login = readString(input, 'username', 'email') ?? '';
      const pair = await this.accounts.login(login, rawString(input, 'password'));
      sendData(res, toTokenPayload(pair));
    } catch (error) {
      next(error);
    }
  }

  private async refresh(req: Request, res: Response, next: NextFunction) {
    try {
      const refreshToken = readString(formOf(req.body), 'refresh_token', 'refreshToken');
      if (!refreshToken) {
        throw ValidationError.forField('refresh_token', 'Refresh token is required');
      }
      const pair = await this.accounts.refresh(refreshToken);
      sendData(res, toTokenPayload(pair));
    } catch (error) {
      next(error);
    }
  }

  private async logout(req: Request, res: Response, next: NextFunction) {
    try {
      const { token } = sessionOf(req);
      await this.accounts.logout(token, readString(formOf(req.body), 'refresh_token', 'refreshToken'));
      sendData(res, { message: 'Successfully logged out' });
    } catch (error) {
      next(error);
    }
  }

  private async deleteUser(req: Request, res: Response, next: NextFunction) {
    try {
      const { user, token } = sessionOf(req);
      await this.accounts.deleteAccount(user, token);
      sendData(res, { message: 'User account successfully deleted' });
    } catch (error) {
      next(error);
    }
  }

  private async profile(req: Request, res: Response, next: NextFunction) {
    try {
      sendData(res, toUserPayload(toPublicUser(sessionOf(req).user)));
    } catch (error) {
      next(error);
    }
  }

  private async listSearches(req: Request, res: Response, next: NextFunction) {
    try {
      const query = formOf(req.query);
      const errors = new FieldErrors();
      const skip = readInteger(query, errors, 'skip', { min: 0, max: Number.MAX_SAFE_INTEGER }, 0);
      const limit = readInteger(query, errors, 'limit', { min: 1, max: 100 }, 20);
      errors.throwIfAny();

      const page = await this.searches.listForOwner(sessionOf(req).user.id, skip, limit);
      sendData(res, {
        searches: page.records.map(toSearchSummaryPayload),
        skip,
        limit,
        total: page.total
      });
    } catch (error) {
      next(error);
    }
  }

  private async submitSearch(req: Request, res: Response, next: NextFunction) {
    try {
      const record = await this.searches.submit(req.body, sessionOf(req).user);
      const accepted: SearchAcceptedPayload = {
        search_id: record.searchId,
        status: 'processing',
        created_at: record.createdAt,
        poll_url: `${this.config.publicBaseUrl}/search/${record.searchId}`
      };
      sendData(res, accepted, 202);
    } catch (error) {
      next(error);
    }
  }

  private async getSearch(req: Request, res: Response, next: NextFunction) {
    try {
      const record = await this.searches.get(req.params.searchId, sessionOf(req).user);
      sendData(res, toSearchStatusPayload(record));
    } catch (error) {
      next(error);
    }
  }

  private async shareSearch(req: Request, res: Response, next: NextFunction) {
    try {
      const { user } = sessionOf(req);
      const input = formOf(req.body);
      const recipient = readString(input, 'recipient_email');
      if (!recipient) {
        throw ValidationError.forField('recipient_email', 'Recipient email is required');
      }

      const record = await this.searches.get(req.params.searchId, user);
      if (record.status !== 'completed' || !record.result) {
        throw new ConflictError(`Search is ${record.status}; only completed searches can be shared`);
      }

      const senderName = readString(input, 'sender_name') ?? user.fullName ?? user.username;
      const outcome = await this.components.sender.send(recipient, record.result, senderName);
      if (outcome.status === 'failed') {
        throw new UpstreamError('email', outcome.message);
      }
      sendData(res, outcome);
    } catch (error) {
      next(error);
    }
  }

  /** Waits for in-flight searches, then releases the stores. */
  public async close(): Promise<void> {
    await this.tasks.drain();
    await this.components.store.close();
    await this.components.users.close();
  }

  public start() {
    const server = this.app.listen(this.config.port, () => {
      console.log(`🚀 Trip Service listening on port ${this.config.port}`);
      console.log(`📍 Health check: http://localhost:${this.config.port}/health`);
      console.log('🗄️ Credential store:', STORE_LABELS[this.components.users.kind]);
      console.log('🧠 Key-value store:', this.components.store.kind === 'redis' ? '✅ Redis' : '⚠️ In-memory');
      console.log('🤖 Recommendations:', this.components.composer.usesLlm ? '✅ Anthropic' : '⚠️ Template only');
    });
    return server;
  }
}
