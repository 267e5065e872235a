import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig } from '../config/configuration';
import { SearchModule } from '../search/search.module';
import { CandidateScorer } from './candidate-scorer';
import { DomainResolver } from './domain-resolver.service';
import { PatternGenerator } from './pattern-generator';
import { SignalExtractor } from './signal-extractor';

@Module({
  imports: [SearchModule],
  providers: [
    DomainResolver,
    {
      provide: PatternGenerator,
      useFactory: () => new PatternGenerator(),
    },
    {
      provide: SignalExtractor,
      useFactory: (configService: ConfigService<AppConfig, true>) => {
        const discovery = configService.get('discovery', { infer: true });
        return new SignalExtractor({
          roleKeywords: discovery.roleKeywords,
          recruitingKeywords: discovery.recruitingKeywords,
          nameWindow: discovery.nameWindow,
        });
      },
      inject: [ConfigService],
    },
    {
      provide: CandidateScorer,
      useFactory: (
        configService: ConfigService<AppConfig, true>,
        extractor: SignalExtractor,
      ) =>
        new CandidateScorer({
          weights: configService.get('scoring', { infer: true }),
          roleRelevance: (text) => extractor.roleRelevance(text),
        }),
      inject: [ConfigService, SignalExtractor],
    },
  ],
  exports: [DomainResolver, PatternGenerator, SignalExtractor, CandidateScorer, SearchModule],
})
export class DiscoveryModule {}
