/**
 * Trip Service entry point
 */

import { config } from 'dotenv';
import { AmadeusAdapter, BookingComAdapter } from '@tripplanner/external-adapters';
import { NotificationSender } from '@tripplanner/notification-svc';
import { AppConfig, loadConfig } from './config';
import { TripMetrics } from './metrics';
import { MySqlUserRepository } from './repositories/mysqlUserRepository';
import { SqliteUserRepository } from './repositories/sqliteUserRepository';
import { UserRepository } from './repositories/userRepository';
import { RecommendationComposer } from './services/recommendationComposer';
import { KeyValueStore, MemoryKeyValueStore } from './store/keyValueStore';
import { RedisKeyValueStore } from './store/redisStore';
import { TripComponents, TripService } from './server';

export { AppConfig, loadConfig } from './config';
export { TripMetrics } from './metrics';
export { KeyValueStore, MemoryKeyValueStore } from './store/keyValueStore';
export { RedisKeyValueStore } from './store/redisStore';
export { UserRepository, MemoryUserRepository } from './repositories/userRepository';
export { MySqlUserRepository } from './repositories/mysqlUserRepository';
export { SqliteUserRepository } from './repositories/sqliteUserRepository';
export { TokenIssuer } from './services/tokenIssuer';
export { AccountService } from './services/accountService';
export { TaskRunner } from './services/backgroundTasks';
export { RecommendationComposer, FlightStage } from './services/recommendationComposer';
export { SearchOrchestrator, FlightSearcher, HotelSearcher, Composer } from './services/searchOrchestrator';
export { TripService, TripComponents } from './server';

async function connectStore(appConfig: AppConfig): Promise<KeyValueStore> {
  if (!appConfig.redisUrl) {
    console.warn('⚠️ REDIS_URL not set, keeping searches and revocations in memory');
    return new MemoryKeyValueStore();
  }
  try {
    return await RedisKeyValueStore.connect(appConfig.redisUrl);
  } catch (error) {
    console.error('❌ Redis connection failed, falling back to memory:', error);
    return new MemoryKeyValueStore();
  }
}

function connectUsers(appConfig: AppConfig): UserRepository {
  if (!appConfig.databaseUrl) {
    console.warn(`⚠️ DATABASE_URL not set, keeping users in ${appConfig.sqlitePath}`);
    return SqliteUserRepository.open(appConfig.sqlitePath);
  }
  return MySqlUserRepository.connect(appConfig.databaseUrl);
}

/**
 * Wires the production components from configuration and the environment.
 */
export async function createComponents(appConfig: AppConfig): Promise<TripComponents> {
  return {
    users: connectUsers(appConfig),
    store: await connectStore(appConfig),
    flights: new AmadeusAdapter(),
    hotels: new BookingComAdapter(),
    composer: new RecommendationComposer({
      apiKey: appConfig.anthropic.apiKey,
      model: appConfig.anthropic.model,
      baseUrl: appConfig.anthropic.baseUrl
    }),
    sender: NotificationSender.fromEnv(),
    metrics: new TripMetrics({ collectDefaults: true })
  };
}

async function main(): Promise<void> {
  config();
  const appConfig = loadConfig();
  const service = new TripService(appConfig, await createComponents(appConfig));
  const server = service.start();

  const shutdown = (signal: string) => {
    console.log(`🛑 ${signal} received, shutting down`);
    server.close();
    service
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('❌ Shutdown failed:', error);
        process.exit(1);
      });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

// Start the service
if (require.main === module) {
  main().catch((error: unknown) => {
    console.error('❌ Failed to start Trip Service:', error);
    process.exit(1);
  });
}
