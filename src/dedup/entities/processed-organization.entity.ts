import { Entity, Column, PrimaryColumn, UpdateDateColumn } from 'typeorm';
import type { ContactSource } from '../../discovery/interfaces/discovery.types';
import type { OutreachStatus } from '../../pipeline/interfaces/outreach-result.interface';

@Entity('processed_organizations')
export class ProcessedOrganization {
  @PrimaryColumn({ type: 'varchar', length: 255 })
  organizationKey!: string;

  @Column({ type: 'varchar', length: 255 })
  name!: string;

  @Column({ type: 'varchar', length: 255, nullable: true })
  domain!: string | null;

  @Column({ type: 'varchar', length: 32 })
  status!: OutreachStatus;

  @Column({ type: 'varchar', length: 255, nullable: true })
  contactName!: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  contactTitle!: string | null;

  @Column({ type: 'varchar', length: 32, nullable: true })
  contactSource!: ContactSource | null;

  @Column({ type: 'varchar', length: 320, nullable: true })
  bestEmail!: string | null;

  @Column({ type: 'real', default: 0 })
  score!: number;

  @Column({ type: 'real', default: 0 })
  confidence!: number;

  @Column({ type: 'simple-json' })
  backupEmails!: string[];

  @UpdateDateColumn()
  processedAt!: Date;
}
