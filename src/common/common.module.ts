import {
  Global,
  Inject,
  Logger,
  Module,
  OnApplicationShutdown,
  Optional,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import type { AppConfig } from '../config/configuration';
import { errorMessage } from './errors';
import { metricsProviders } from './metrics.providers';
import { CircuitBreakerFactory } from './resilience/circuit-breaker.factory';
import { RETRY_POLICY, RetryPolicy } from './resilience/retry-policy';

export const REDIS_CLIENT = 'REDIS_CLIENT';

@Global()
@Module({
  providers: [
    CircuitBreakerFactory,
    ...metricsProviders,
    {
      provide: RETRY_POLICY,
      useFactory: (configService: ConfigService<AppConfig, true>) =>
        new RetryPolicy(configService.get('retry', { infer: true })),
      inject: [ConfigService],
    },
    // Optional: null when REDIS_URL is not configured
    {
      provide: REDIS_CLIENT,
      useFactory: (configService: ConfigService<AppConfig, true>) => {
        const { url } = configService.get('redis', { infer: true });
        return url ? new Redis(url, { maxRetriesPerRequest: 2 }) : null;
      },
      inject: [ConfigService],
    },
  ],
  exports: [CircuitBreakerFactory, RETRY_POLICY, REDIS_CLIENT, ...metricsProviders],
})
export class CommonModule implements OnApplicationShutdown {
  private readonly logger = new Logger(CommonModule.name);

  constructor(
    @Optional() @Inject(REDIS_CLIENT) private readonly redis: Redis | null,
  ) {}

  async onApplicationShutdown(): Promise<void> {
    if (!this.redis) return;
    try {
      await this.redis.quit();
    } catch (error: unknown) {
      this.logger.warn(`Redis shutdown failed: ${errorMessage(error)}`);
    }
  }
}
