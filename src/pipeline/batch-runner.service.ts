import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import pLimit from 'p-limit';
import { Pushgateway, register } from 'prom-client';
import { v4 as uuidv4 } from 'uuid';
import { errorMessage } from '../common/errors';
import { CircuitBreakerFactory } from '../common/resilience/circuit-breaker.factory';
import type { AppConfig } from '../config/configuration';
import { OutreachService } from '../outreach/outreach.service';
import type { OutreachReport } from '../outreach/outreach.service';
import { readOrganizationsCsv, writeResultsCsv } from './csv/organization-csv';
import type { OrganizationInput } from './dto/organization-record.dto';
import type { OutreachResult, OutreachStatus } from './interfaces/outreach-result.interface';
import { PipelineOrchestrator } from './pipeline-orchestrator.service';

export interface BatchOptions {
  /** Stops new organizations from starting; in-flight ones finish. */
  signal?: AbortSignal;
  send?: boolean;
  dryRun?: boolean;
  sendLimit?: number;
  maxPages?: number;
}

export interface BatchSummary {
  runId: string;
  total: number;
  byStatus: Record<OutreachStatus, number>;
  cancelled: number;
  outreach?: Omit<OutreachReport, 'previews' | 'results'>;
}

export interface BatchRun {
  summary: BatchSummary;
  /** One entry per organization that was processed, in input order. */
  results: OutreachResult[];
  previews: OutreachReport['previews'];
}

@Injectable()
export class BatchRunner {
  private readonly logger = new Logger(BatchRunner.name);

  constructor(
    private readonly configService: ConfigService<AppConfig, true>,
    private readonly orchestrator: PipelineOrchestrator,
    private readonly outreachService: OutreachService,
    private readonly circuitBreakerFactory: CircuitBreakerFactory,
  ) {}

  async run(records: OrganizationInput[], options: BatchOptions = {}): Promise<BatchRun> {
    const runId = uuidv4();
    const { concurrency } = this.configService.get('app', { infer: true });
    const outreachConfig = this.configService.get('outreach', { infer: true });
    const limit = pLimit(concurrency);
    let cancelled = 0;

    this.logger.log(`Run ${runId}: ${records.length} organizations, concurrency ${concurrency}`);

    const processed = await Promise.all(
      records.map((record) =>
        limit(async (): Promise<OutreachResult | null> => {
          if (options.signal?.aborted) {
            cancelled++;
            return null;
          }
          return this.orchestrator.process(record, { maxPages: options.maxPages });
        }),
      ),
    );
    let results = processed.filter((result): result is OutreachResult => result !== null);

    let report: OutreachReport | undefined;
    if ((options.send ?? outreachConfig.enabled) && !options.signal?.aborted) {
      report = await this.outreachService.sendAll(results, {
        sendLimit: options.sendLimit ?? outreachConfig.sendLimit,
        dryRun: options.dryRun ?? outreachConfig.dryRun,
        signal: options.signal,
      });
      results = report.results;
    }

    const summary = this.summarize(runId, results, cancelled, report);
    this.logger.log(`Run ${runId} finished: ${JSON.stringify(summary)}`);
    if (this.circuitBreakerFactory.hasOpenCircuits()) {
      this.logger.warn(
        `Run ${runId} ended with open circuits: ${JSON.stringify(this.circuitBreakerFactory.health())}`,
      );
    }
    await this.pushMetrics(runId);

    return { summary, results, previews: report?.previews ?? [] };
  }

  async runFromFiles(
    inputCsv?: string,
    outputCsv?: string,
    options: BatchOptions = {},
  ): Promise<BatchRun> {
    const app = this.configService.get('app', { infer: true });
    const input = inputCsv ?? app.inputCsv;
    const output = outputCsv ?? app.outputCsv;

    const records = await readOrganizationsCsv(input);
    this.logger.log(`Loaded ${records.length} organizations from ${input}`);

    const run = await this.run(records, options);
    await writeResultsCsv(output, run.results);
    this.logger.log(`Wrote ${run.results.length} rows to ${output}`);

    for (const preview of run.previews) {
      this.logger.log(`[dry run] To: ${preview.to} | Subject: ${preview.subject}\n${preview.body}`);
    }
    return run;
  }

  private summarize(
    runId: string,
    results: OutreachResult[],
    cancelled: number,
    report?: OutreachReport,
  ): BatchSummary {
    const byStatus: Record<OutreachStatus, number> = {
      found: 0,
      no_contact_found: 0,
      no_domain_resolved: 0,
      skipped_duplicate: 0,
      error: 0,
    };
    for (const result of results) {
      byStatus[result.status]++;
    }

    const summary: BatchSummary = { runId, total: results.length + cancelled, byStatus, cancelled };
    if (report) {
      summary.outreach = {
        attempted: report.attempted,
        sent: report.sent,
        failed: report.failed,
        skippedDuplicate: report.skippedDuplicate,
        dryRun: report.dryRun,
      };
    }
    return summary;
  }

  private async pushMetrics(runId: string): Promise<void> {
    const { pushgatewayUrl } = this.configService.get('metrics', { infer: true });
    if (!pushgatewayUrl) return;

    try {
      const gateway = new Pushgateway(pushgatewayUrl, {}, register);
      await gateway.pushAdd({ jobName: 'contact-discovery', groupings: { run: runId } });
    } catch (error: unknown) {
      this.logger.warn(`Metrics push failed: ${errorMessage(error)}`);
    }
  }
}
