import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { REDIS_CLIENT } from '../common/common.module';
import { errorMessage } from '../common/errors';
import { sleep } from '../common/resilience/retry-policy';
import type { AppConfig } from '../config/configuration';

const SLOT_KEY = 'outreach:send-slot';
const MIN_POLL_MS = 50;

/**
 * Enforces a minimum gap between sends across the whole batch, whatever
 * worker asks. With Redis configured the gap also holds across processes.
 */
@Injectable()
export class SendThrottle {
  private readonly logger = new Logger(SendThrottle.name);
  private readonly minDelayMs: number;
  private tail: Promise<void> = Promise.resolve();
  private lastSlotAt: number | null = null;

  constructor(
    configService: ConfigService<AppConfig, true>,
    @Optional() @Inject(REDIS_CLIENT) private readonly redis: Redis | null = null,
  ) {
    this.minDelayMs = configService.get('outreach', { infer: true }).minDelayMs;
  }

  /** Resolves when the caller may send. Callers are served in arrival order. */
  acquire(): Promise<void> {
    const turn = this.tail.then(() => this.waitForSlot());
    this.tail = turn.catch(() => undefined);
    return turn;
  }

  private async waitForSlot(): Promise<void> {
    if (this.minDelayMs <= 0) return;

    if (this.lastSlotAt !== null) {
      const wait = this.lastSlotAt + this.minDelayMs - Date.now();
      if (wait > 0) await sleep(wait);
    }
    if (this.redis) {
      await this.claimSharedSlot(this.redis);
    }
    this.lastSlotAt = Date.now();
  }

  private async claimSharedSlot(redis: Redis): Promise<void> {
    try {
      for (;;) {
        const claimed = await redis.set(SLOT_KEY, String(process.pid), 'PX', this.minDelayMs, 'NX');
        if (claimed === 'OK') return;
        const ttl = await redis.pttl(SLOT_KEY);
        await sleep(Math.max(ttl, MIN_POLL_MS));
      }
    } catch (error: unknown) {
      // Fail open to the local clock if Redis is down
      this.logger.warn(`Shared send slot unavailable: ${errorMessage(error)}`);
    }
  }
}
