import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { QueryFailedError, Repository } from 'typeorm';
import { DuplicateSendError } from '../common/errors';
import type { OutreachResult } from '../pipeline/interfaces/outreach-result.interface';
import { ProcessedOrganization } from './entities/processed-organization.entity';
import { SentRecord } from './entities/sent-record.entity';
import type { SendStatus } from './entities/sent-record.entity';

export interface RecordSentDetails {
  messageId?: string;
  error?: string;
}

/**
 * Durable record of what was sent to whom and which organizations were
 * already searched. The only shared mutable state in a batch; writes to the
 * same key are serialised in-process, writes to distinct keys run freely.
 */
@Injectable()
export class DedupStore {
  private readonly logger = new Logger(DedupStore.name);
  private readonly locks = new Map<string, Promise<void>>();

  constructor(
    @InjectRepository(SentRecord)
    private readonly sentRepository: Repository<SentRecord>,
    @InjectRepository(ProcessedOrganization)
    private readonly processedRepository: Repository<ProcessedOrganization>,
  ) {}

  async hasSent(organizationKey: string, address: string): Promise<boolean> {
    const count = await this.sentRepository.count({
      where: { organizationKey, address: address.toLowerCase(), status: 'sent' },
    });
    return count > 0;
  }

  async assertNotSent(organizationKey: string, address: string): Promise<void> {
    if (await this.hasSent(organizationKey, address)) {
      throw new DuplicateSendError(organizationKey, address.toLowerCase());
    }
  }

  /**
   * Idempotent upsert on (organizationKey, address). A `sent` record is never
   * downgraded by a later failure.
   *
   * `attempts` counts calls, not deliveries: recording `sent` twice for the
   * same pair leaves one `sent` record with `attempts` at 2.
   */
  async recordSent(
    organizationKey: string,
    address: string,
    status: SendStatus,
    details: RecordSentDetails = {},
  ): Promise<SentRecord> {
    const normalized = address.toLowerCase();
    return this.withLock(`sent:${organizationKey}:${normalized}`, async () => {
      const existing = await this.sentRepository.findOne({
        where: { organizationKey, address: normalized },
      });
      if (existing) {
        return this.sentRepository.save(this.applyAttempt(existing, status, details));
      }

      try {
        return await this.sentRepository.save(
          this.sentRepository.create({
            organizationKey,
            address: normalized,
            status,
            attempts: 1,
            messageId: details.messageId ?? null,
            lastError: details.error ?? null,
          }),
        );
      } catch (error: unknown) {
        // Another process inserted the pair first
        if (!(error instanceof QueryFailedError)) throw error;
        const winner = await this.sentRepository.findOneOrFail({
          where: { organizationKey, address: normalized },
        });
        return this.sentRepository.save(this.applyAttempt(winner, status, details));
      }
    });
  }

  findSentByAddress(address: string): Promise<SentRecord[]> {
    return this.sentRepository.find({
      where: { address: address.toLowerCase() },
      order: { createdAt: 'ASC', id: 'ASC' },
    });
  }

  findSentByOrganization(organizationKey: string): Promise<SentRecord[]> {
    return this.sentRepository.find({
      where: { organizationKey },
      order: { createdAt: 'ASC', id: 'ASC' },
    });
  }

  async hasProcessed(organizationKey: string): Promise<boolean> {
    const count = await this.processedRepository.count({ where: { organizationKey } });
    return count > 0;
  }

  findProcessed(organizationKey: string): Promise<ProcessedOrganization | null> {
    return this.processedRepository.findOne({ where: { organizationKey } });
  }

  async markProcessed(result: OutreachResult): Promise<void> {
    await this.withLock(`processed:${result.organizationKey}`, async () => {
      await this.processedRepository.save(
        this.processedRepository.create({
          organizationKey: result.organizationKey,
          name: result.organization.name,
          domain: result.domain,
          status: result.status,
          contactName: result.bestContact?.fullName ?? null,
          contactTitle: result.bestContact?.title ?? null,
          contactSource: result.bestContact?.source ?? null,
          bestEmail: result.bestEmail,
          score: result.score,
          confidence: result.confidence,
          backupEmails: result.backups,
        }),
      );
    });
    this.logger.debug(`Marked ${result.organizationKey} as ${result.status}`);
  }

  private applyAttempt(
    record: SentRecord,
    status: SendStatus,
    details: RecordSentDetails,
  ): SentRecord {
    record.attempts += 1;
    if (record.status !== 'sent') {
      record.status = status;
    }
    if (details.messageId) record.messageId = details.messageId;
    record.lastError = status === 'failed' ? (details.error ?? null) : record.lastError;
    return record;
  }

  private async withLock<T>(key: string, work: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(key) ?? Promise.resolve();
    const run = previous.then(work);
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.locks.set(key, tail);
    try {
      return await run;
    } finally {
      if (this.locks.get(key) === tail) {
        this.locks.delete(key);
      }
    }
  }
}
