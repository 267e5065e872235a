import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectMetric } from '@willsoto/nestjs-prometheus';
import type CircuitBreaker from 'opossum';
import { Counter } from 'prom-client';
import { DuplicateSendError, errorMessage } from '../common/errors';
import { OUTREACH_SENDS_TOTAL } from '../common/metrics.providers';
import { CircuitBreakerFactory } from '../common/resilience/circuit-breaker.factory';
import { RETRY_POLICY, RetryPolicy } from '../common/resilience/retry-policy';
import { DedupStore } from '../dedup/dedup-store.service';
import type { OutreachResult } from '../pipeline/interfaces/outreach-result.interface';
import { SEND_TRANSPORT } from './interfaces/send-transport.interface';
import type {
  OutgoingMessage,
  SendReceipt,
  SendTransport,
} from './interfaces/send-transport.interface';
import { MessageComposer } from './message-composer.service';
import { SendThrottle } from './send-throttle.service';

export interface SendOptions {
  /** Upper bound on send attempts for this call. */
  sendLimit?: number;
  dryRun?: boolean;
  signal?: AbortSignal;
}

export interface MessagePreview {
  organizationKey: string;
  to: string;
  subject: string;
  body: string;
  generatedBy: string;
}

export interface OutreachReport {
  attempted: number;
  sent: number;
  failed: number;
  skippedDuplicate: number;
  dryRun: boolean;
  previews: MessagePreview[];
  /** Input results, with `skipped_duplicate` applied where the gate fired. */
  results: OutreachResult[];
}

@Injectable()
export class OutreachService {
  private readonly logger = new Logger(OutreachService.name);
  private readonly breaker: CircuitBreaker<[OutgoingMessage], SendReceipt>;

  constructor(
    @Inject(SEND_TRANSPORT) private readonly transport: SendTransport,
    @Inject(RETRY_POLICY) private readonly retryPolicy: RetryPolicy,
    private readonly dedupStore: DedupStore,
    private readonly composer: MessageComposer,
    private readonly throttle: SendThrottle,
    @InjectMetric(OUTREACH_SENDS_TOTAL)
    private readonly sendsCounter: Counter<string>,
    circuitBreakerFactory: CircuitBreakerFactory,
  ) {
    this.breaker = circuitBreakerFactory.createBreaker(
      `send:${transport.name}`,
      (message: OutgoingMessage) =>
        this.retryPolicy.execute(() => this.transport.send(message), {
          operation: `send to ${message.to}`,
        }),
      { timeout: 120000 },
    );
  }

  async sendAll(results: OutreachResult[], options: SendOptions = {}): Promise<OutreachReport> {
    const dryRun = options.dryRun ?? false;
    const report: OutreachReport = {
      attempted: 0,
      sent: 0,
      failed: 0,
      skippedDuplicate: 0,
      dryRun,
      previews: [],
      results: [...results],
    };

    for (let i = 0; i < report.results.length; i++) {
      const result = report.results[i];
      if (result.status !== 'found' || !result.bestEmail) continue;

      if (options.signal?.aborted) {
        this.logger.warn('Outreach cancelled, remaining recipients left unsent');
        break;
      }
      if (options.sendLimit !== undefined && report.attempted >= options.sendLimit) {
        this.logger.log(`Send limit of ${options.sendLimit} reached`);
        break;
      }

      try {
        await this.dedupStore.assertNotSent(result.organizationKey, result.bestEmail);
      } catch (error: unknown) {
        if (!(error instanceof DuplicateSendError)) throw error;
        this.logger.log(error.message);
        report.results[i] = { ...result, status: 'skipped_duplicate', reason: 'already sent' };
        report.skippedDuplicate++;
        this.sendsCounter.inc({ status: 'skipped_duplicate' });
        continue;
      }

      report.attempted++;
      const message = await this.composer.compose(result);

      if (dryRun) {
        report.previews.push({
          organizationKey: result.organizationKey,
          to: result.bestEmail,
          ...message,
        });
        this.sendsCounter.inc({ status: 'dry_run' });
        continue;
      }

      const delivered = await this.deliver(result.organizationKey, {
        to: result.bestEmail,
        subject: message.subject,
        body: message.body,
      });
      if (delivered) {
        report.sent++;
      } else {
        report.failed++;
      }
    }

    this.logger.log(
      `Outreach ${dryRun ? 'dry run' : 'run'}: ${report.attempted} attempted, ${report.sent} sent, ${report.failed} failed, ${report.skippedDuplicate} duplicates skipped`,
    );
    return report;
  }

  private async deliver(organizationKey: string, message: OutgoingMessage): Promise<boolean> {
    await this.throttle.acquire();

    let receipt: SendReceipt;
    try {
      receipt = await this.breaker.fire(message);
    } catch (error: unknown) {
      receipt = { success: false, error: errorMessage(error) };
    }

    const status = receipt.success ? 'sent' : 'failed';
    this.sendsCounter.inc({ status });

    try {
      await this.dedupStore.recordSent(organizationKey, message.to, status, {
        messageId: receipt.messageId,
        error: receipt.error,
      });
    } catch (error: unknown) {
      this.logger.error(
        `Could not record ${status} send to ${message.to}: ${errorMessage(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
    }

    if (receipt.success) {
      this.logger.log(`Sent to ${message.to} via ${this.transport.name}`);
    } else {
      this.logger.warn(`Send to ${message.to} failed: ${receipt.error ?? 'unknown error'}`);
    }
    return receipt.success;
  }
}
