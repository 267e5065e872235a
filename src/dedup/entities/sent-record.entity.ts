import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';

export type SendStatus = 'sent' | 'failed';

/**
 * One row per (organization, address) pair. A row with status `sent` is the
 * active record that gates any further send to the pair.
 */
@Entity('sent_records')
@Index(['organizationKey', 'address'], { unique: true })
@Index(['address'])
export class SentRecord {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 255 })
  organizationKey!: string;

  @Column({ type: 'varchar', length: 320 })
  address!: string;

  @Column({ type: 'varchar', length: 16 })
  status!: SendStatus;

  /** Recorded send attempts of any outcome, not deliveries. */
  @Column({ type: 'integer', default: 1 })
  attempts!: number;

  @Column({ type: 'varchar', length: 255, nullable: true })
  messageId!: string | null;

  @Column({ type: 'text', nullable: true })
  lastError!: string | null;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
