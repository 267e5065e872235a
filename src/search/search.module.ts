import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig } from '../config/configuration';
import { SEARCH_PROVIDER } from './interfaces/search-provider.interface';
import { BraveSearchProvider } from './providers/brave.provider';
import { NoopSearchProvider } from './providers/noop.provider';
import { SearchService } from './search.service';

@Module({
  providers: [
    SearchService,
    {
      provide: SEARCH_PROVIDER,
      useFactory: (configService: ConfigService<AppConfig, true>) => {
        const search = configService.get('search', { infer: true });

        switch (search.provider) {
          case 'brave':
            return new BraveSearchProvider(search.braveApiKey ?? '');
          case 'none':
          default:
            return new NoopSearchProvider();
        }
      },
      inject: [ConfigService],
    },
  ],
  exports: [SearchService],
})
export class SearchModule {}
