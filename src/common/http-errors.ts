import axios from 'axios';
import { TransientProviderError, errorMessage } from './errors';

export function isRetryableStatus(status: number): boolean {
  return status === 429 || (status >= 500 && status < 600);
}

/**
 * Maps an HTTP client failure to the pipeline's error taxonomy: network
 * errors, 429 and 5xx become TransientProviderError, anything else keeps
 * its status on a plain Error and is not retried.
 */
export function toProviderError(provider: string, error: unknown): Error {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status === undefined || isRetryableStatus(status)) {
      return new TransientProviderError(provider, error.message, status);
    }
    return new Error(`${provider}: HTTP ${status}`);
  }
  return error instanceof Error ? error : new Error(errorMessage(error));
}
