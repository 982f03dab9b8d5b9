import { Entity, Column, PrimaryGeneratedColumn, CreateDateColumn, Index } from 'typeorm';
import type { DeliveryAttemptRecord } from '../../leads/lead.entity';

/**
 * Delivery job that exhausted its retries (or could never succeed), kept with
 * the lead's full attempt history until `expires_at`.
 */
@Entity('delivery_dead_letters')
@Index(['leadId'])
@Index(['expiresAt'])
export class DeliveryDeadLetter {
    @PrimaryGeneratedColumn('uuid')
    id!: string;

    @Column({ name: 'lead_id' })
    leadId!: number;

    @Column({ name: 'original_job_id', length: 64 })
    originalJobId!: string;

    @Column({ type: 'text' })
    error!: string;

    @Column({ name: 'attempts_made' })
    attemptsMade!: number;

    @Column({ name: 'attempt_history', type: 'jsonb', default: () => "'[]'" })
    attemptHistory!: DeliveryAttemptRecord[];

    @Column({ name: 'failed_at', type: 'timestamptz' })
    failedAt!: Date;

    @Column({ name: 'expires_at', type: 'timestamptz' })
    expiresAt!: Date;

    @Column({ name: 'reprocessed_at', type: 'timestamptz', nullable: true })
    reprocessedAt!: Date | null;

    @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
    createdAt!: Date;
}
