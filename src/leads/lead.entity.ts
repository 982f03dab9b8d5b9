import { Entity, Column, PrimaryGeneratedColumn, CreateDateColumn, UpdateDateColumn, Index, Check } from 'typeorm';
import { decimalTransformer } from '../common/decimal.transformer';

export const LEAD_STATUSES = ['received', 'validated', 'delivered', 'accepted', 'rejected'] as const;
export type LeadStatus = (typeof LEAD_STATUSES)[number];

export const BILLING_STATUSES = ['pending', 'billed', 'paid', 'disputed', 'refunded'] as const;
export type BillingStatus = (typeof BILLING_STATUSES)[number];

export type DeliveryChannelName = 'webhook' | 'email' | 'sms';

/** One channel try inside one delivery attempt */
export interface DeliveryAttemptRecord {
    attemptNumber: number;
    channel: DeliveryChannelName;
    timestamp: string;
    httpStatus: number | null;
    success: boolean;
    errorMessage: string | null;
}

export interface ValidationRecord {
    policyId: number;
    policyVersion: number;
    rulesEvaluated: number;
    failedRule: string | null;
    reason: string | null;
}

@Entity('leads')
@Index(['sourceId', 'idempotencyKey'], { unique: true })
@Index(['offerId', 'createdAt'])
@Index(['offerId', 'normalizedPhone'])
@Index(['offerId', 'normalizedEmail'])
@Index(['buyerId', 'offerId', 'deliveredAt'])
@Check('"normalized_phone" IS NULL OR LENGTH("normalized_phone") BETWEEN 7 AND 32')
export class Lead {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({ name: 'source_id' })
    sourceId!: number;

    @Column({ name: 'offer_id' })
    offerId!: number;

    @Column({ name: 'market_id' })
    marketId!: number;

    @Column({ name: 'vertical_id' })
    verticalId!: number;

    @Column({ name: 'idempotency_key', length: 128 })
    idempotencyKey!: string;

    @Column({ length: 100, default: 'landing_page' })
    source!: string;

    @Column({ type: 'varchar', length: 200, nullable: true })
    name!: string | null;

    @Column({ type: 'varchar', length: 200, nullable: true })
    email!: string | null;

    @Column({ type: 'varchar', length: 32, nullable: true })
    phone!: string | null;

    @Column({ name: 'country_code', type: 'char', length: 2, default: 'US' })
    countryCode!: string;

    @Column({ name: 'postal_code', type: 'varchar', length: 16, nullable: true })
    postalCode!: string | null;

    @Column({ type: 'varchar', length: 128, nullable: true })
    city!: string | null;

    @Column({ name: 'region_code', type: 'varchar', length: 20, nullable: true })
    regionCode!: string | null;

    @Column({ type: 'text', nullable: true })
    message!: string | null;

    @Column({ name: 'utm_source', type: 'varchar', length: 100, nullable: true })
    utmSource!: string | null;

    @Column({ name: 'utm_medium', type: 'varchar', length: 100, nullable: true })
    utmMedium!: string | null;

    @Column({ name: 'utm_campaign', type: 'varchar', length: 100, nullable: true })
    utmCampaign!: string | null;

    @Column({ name: 'ip_address', type: 'varchar', length: 45, nullable: true })
    ipAddress!: string | null;

    @Column({ name: 'user_agent', type: 'text', nullable: true })
    userAgent!: string | null;

    @Column({ name: 'normalized_email', type: 'varchar', length: 320, nullable: true })
    normalizedEmail!: string | null;

    @Column({ name: 'normalized_phone', type: 'varchar', length: 32, nullable: true })
    normalizedPhone!: string | null;

    @Column({ type: 'varchar', length: 16, default: 'received' })
    status!: LeadStatus;

    @Column({ name: 'validation_reason', type: 'varchar', length: 500, nullable: true })
    validationReason!: string | null;

    @Column({ name: 'validation_result', type: 'jsonb', nullable: true })
    validationResult!: ValidationRecord | null;

    @Column({ name: 'is_duplicate', default: false })
    isDuplicate!: boolean;

    @Column({ name: 'duplicate_of_lead_id', type: 'int', nullable: true })
    duplicateOfLeadId!: number | null;

    @Column({ name: 'buyer_id', type: 'int', nullable: true })
    buyerId!: number | null;

    @Column({ name: 'routed_at', type: 'timestamptz', nullable: true })
    routedAt!: Date | null;

    @Column({ name: 'delivery_attempts', default: 0 })
    deliveryAttempts!: number;

    @Column({ name: 'delivery_result', type: 'jsonb', nullable: true })
    deliveryResult!: DeliveryAttemptRecord[] | null;

    @Column({ name: 'delivered_at', type: 'timestamptz', nullable: true })
    deliveredAt!: Date | null;

    @Column({ name: 'billing_status', type: 'varchar', length: 16, default: 'pending' })
    billingStatus!: BillingStatus;

    @Column({ type: 'decimal', precision: 10, scale: 2, nullable: true, transformer: decimalTransformer })
    price!: number | null;

    @Column({ name: 'billed_at', type: 'timestamptz', nullable: true })
    billedAt!: Date | null;

    @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
    createdAt!: Date;

    @UpdateDateColumn({ name: 'updated_at', type: 'timestamptz' })
    updatedAt!: Date;
}
