import axios from 'axios';
import { z } from 'zod';
import { toProviderError } from '../../common/http-errors';
import type { VerificationStatus } from '../../discovery/interfaces/discovery.types';
import type { EmailVerifier } from '../interfaces/email-verifier.interface';

const HUNTER_ENDPOINT = 'https://api.hunter.io/v2/email-verifier';

const HunterResponseSchema = z.object({
  data: z.object({
    status: z.string().optional(),
    result: z.string().optional(),
  }),
});

export class HunterVerifier implements EmailVerifier {
  readonly name = 'hunter';

  constructor(
    private readonly apiKey: string,
    private readonly timeoutMs = 15000,
  ) {}

  async verify(address: string): Promise<VerificationStatus> {
    let data: unknown;
    try {
      const response = await axios.get<unknown>(HUNTER_ENDPOINT, {
        params: { email: address, api_key: this.apiKey },
        timeout: this.timeoutMs,
      });
      data = response.data;
    } catch (error: unknown) {
      throw toProviderError(this.name, error);
    }

    const { status, result } = HunterResponseSchema.parse(data).data;
    if (status === 'valid' || result === 'deliverable') return 'valid';
    if (status === 'invalid' || result === 'undeliverable') return 'invalid';
    // accept_all, webmail, disposable, risky and unknown carry no verdict
    return 'unknown';
  }
}
