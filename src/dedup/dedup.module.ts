import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DedupStore } from './dedup-store.service';
import { ProcessedOrganization } from './entities/processed-organization.entity';
import { SentRecord } from './entities/sent-record.entity';

@Module({
  imports: [TypeOrmModule.forFeature([SentRecord, ProcessedOrganization])],
  providers: [DedupStore],
  exports: [DedupStore],
})
export class DedupModule {}
