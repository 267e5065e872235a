import type { VerificationStatus } from '../../discovery/interfaces/discovery.types';

export interface EmailVerifier {
  readonly name: string;
  verify(address: string): Promise<VerificationStatus>;
}

export const EMAIL_VERIFIER = 'EMAIL_VERIFIER';
