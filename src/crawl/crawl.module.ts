import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig } from '../config/configuration';
import { RETRY_POLICY, RetryPolicy } from '../common/resilience/retry-policy';
import { CrawlController } from './crawl-controller';
import { PAGE_FETCHER } from './interfaces/page-fetcher.interface';
import type { PageFetcher } from './interfaces/page-fetcher.interface';
import { HttpPageFetcher } from './providers/http-page.fetcher';

@Module({
  providers: [
    {
      provide: PAGE_FETCHER,
      useFactory: (configService: ConfigService<AppConfig, true>) =>
        new HttpPageFetcher(configService.get('crawl', { infer: true }).timeoutMs),
      inject: [ConfigService],
    },
    {
      provide: CrawlController,
      useFactory: (
        fetcher: PageFetcher,
        retryPolicy: RetryPolicy,
        configService: ConfigService<AppConfig, true>,
      ) => {
        const crawl = configService.get('crawl', { infer: true });
        return new CrawlController(fetcher, retryPolicy, {
          failureBudget: crawl.failureBudget,
          requestDelayMs: crawl.requestDelayMs,
        });
      },
      inject: [PAGE_FETCHER, RETRY_POLICY, ConfigService],
    },
  ],
  exports: [CrawlController, PAGE_FETCHER],
})
export class CrawlModule {}
