/**
 * Error taxonomy shared by every stage of the pipeline.
 *
 * Only ConfigurationError is fatal. The others are recovered per
 * organization or per recipient and end up as a status in the batch summary.
 */

export class InvalidInputError extends Error {
  constructor(
    message: string,
    readonly field?: string,
  ) {
    super(message);
    this.name = InvalidInputError.name;
  }
}

export class TransientProviderError extends Error {
  constructor(
    readonly provider: string,
    message: string,
    readonly statusCode?: number,
  ) {
    super(`${provider}: ${message}`);
    this.name = TransientProviderError.name;
  }
}

export type BudgetKind = 'pages' | 'failures';

export class BudgetExceededError extends Error {
  constructor(
    readonly kind: BudgetKind,
    readonly limit: number,
  ) {
    super(`${kind} budget of ${limit} exhausted`);
    this.name = BudgetExceededError.name;
  }
}

/**
 * Raised by the dedup gate. Callers treat it as a successful no-op.
 */
export class DuplicateSendError extends Error {
  constructor(
    readonly organizationKey: string,
    readonly address: string,
  ) {
    super(`Already sent to ${address} for ${organizationKey}`);
    this.name = DuplicateSendError.name;
  }
}

export class ConfigurationError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = ConfigurationError.name;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

export function isTransient(error: unknown): boolean {
  return error instanceof TransientProviderError;
}
