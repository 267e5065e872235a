import { Module } from '@nestjs/common';
import { CrawlModule } from '../crawl/crawl.module';
import { DedupModule } from '../dedup/dedup.module';
import { DiscoveryModule } from '../discovery/discovery.module';
import { OutreachModule } from '../outreach/outreach.module';
import { VerificationModule } from '../verification/verification.module';
import { BatchRunner } from './batch-runner.service';
import { PipelineOrchestrator } from './pipeline-orchestrator.service';

@Module({
  imports: [DiscoveryModule, CrawlModule, VerificationModule, DedupModule, OutreachModule],
  providers: [PipelineOrchestrator, BatchRunner],
  exports: [PipelineOrchestrator, BatchRunner],
})
export class PipelineModule {}
