import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig } from '../config/configuration';
import { DedupModule } from '../dedup/dedup.module';
import { SEND_TRANSPORT } from './interfaces/send-transport.interface';
import type { SendTransport } from './interfaces/send-transport.interface';
import { TEXT_GENERATOR } from './interfaces/text-generator.interface';
import type { TextGenerator } from './interfaces/text-generator.interface';
import { MessageComposer } from './message-composer.service';
import { OutreachService } from './outreach.service';
import { GeminiTextGenerator } from './providers/gemini.provider';
import { LogTransport } from './providers/log.transport';
import { SmtpTransport } from './providers/smtp.transport';
import { SendThrottle } from './send-throttle.service';

@Module({
  imports: [DedupModule],
  providers: [
    OutreachService,
    MessageComposer,
    SendThrottle,
    {
      provide: SEND_TRANSPORT,
      useFactory: (configService: ConfigService<AppConfig, true>): SendTransport => {
        const outreach = configService.get('outreach', { infer: true });
        switch (outreach.transport) {
          case 'smtp':
            return SmtpTransport.fromConfig(outreach);
          case 'log':
          default:
            return new LogTransport();
        }
      },
      inject: [ConfigService],
    },
    {
      provide: TEXT_GENERATOR,
      useFactory: (configService: ConfigService<AppConfig, true>): TextGenerator | null => {
        const outreach = configService.get('outreach', { infer: true });
        if (outreach.textGenerator === 'gemini' && outreach.geminiApiKey) {
          return new GeminiTextGenerator(outreach.geminiApiKey);
        }
        return null;
      },
      inject: [ConfigService],
    },
  ],
  exports: [OutreachService],
})
export class OutreachModule {}
