import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import type CircuitBreaker from 'opossum';
import { errorMessage } from '../common/errors';
import { CircuitBreakerFactory } from '../common/resilience/circuit-breaker.factory';
import { RETRY_POLICY, RetryPolicy } from '../common/resilience/retry-policy';
import type { VerificationStatus } from '../discovery/interfaces/discovery.types';
import { EMAIL_VERIFIER } from './interfaces/email-verifier.interface';
import type { EmailVerifier } from './interfaces/email-verifier.interface';

@Injectable()
export class VerificationService {
  private readonly logger = new Logger(VerificationService.name);
  private readonly breaker: CircuitBreaker<[string], VerificationStatus> | null;

  constructor(
    @Inject(RETRY_POLICY) private readonly retryPolicy: RetryPolicy,
    circuitBreakerFactory: CircuitBreakerFactory,
    @Optional()
    @Inject(EMAIL_VERIFIER)
    private readonly verifier: EmailVerifier | null = null,
  ) {
    const active = this.verifier;
    this.breaker = active
      ? circuitBreakerFactory.createBreaker(
          `verifier:${active.name}`,
          (address: string) =>
            this.retryPolicy.execute(() => active.verify(address), {
              operation: `verify ${address}`,
            }),
          { timeout: 60000 },
        )
      : null;
  }

  get enabled(): boolean {
    return this.breaker !== null;
  }

  /** `unknown` when no verifier is configured or the verifier keeps failing. */
  async verify(address: string): Promise<VerificationStatus> {
    if (!this.breaker) return 'unknown';
    try {
      return await this.breaker.fire(address);
    } catch (error: unknown) {
      this.logger.warn(`Verification unavailable for ${address}: ${errorMessage(error)}`);
      return 'unknown';
    }
  }
}
