import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig } from '../config/configuration';
import { EMAIL_VERIFIER } from './interfaces/email-verifier.interface';
import { HunterVerifier } from './providers/hunter.provider';
import { VerificationService } from './verification.service';

@Module({
  providers: [
    VerificationService,
    // Optional: null when no verifier is configured
    {
      provide: EMAIL_VERIFIER,
      useFactory: (configService: ConfigService<AppConfig, true>) => {
        const verification = configService.get('verification', { infer: true });
        switch (verification.provider) {
          case 'hunter':
            return new HunterVerifier(verification.hunterApiKey ?? '');
          case 'none':
          default:
            return null;
        }
      },
      inject: [ConfigService],
    },
  ],
  exports: [VerificationService],
})
export class VerificationModule {}
