import { Entity, Column, PrimaryGeneratedColumn, CreateDateColumn, UpdateDateColumn, Index, ManyToOne, JoinColumn } from 'typeorm';
import { decimalTransformer } from '../../common/decimal.transformer';
import { Buyer } from './buyer.entity';

/**
 * Buyer enrollment on an offer, with per-offer routing caps and delivery and
 * price overrides. Null caps mean unlimited.
 */
@Entity('buyer_offers')
@Index(['buyerId', 'offerId'], { unique: true })
export class BuyerOffer {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({ name: 'buyer_id' })
    buyerId!: number;

    @ManyToOne(() => Buyer, { onDelete: 'CASCADE' })
    @JoinColumn({ name: 'buyer_id' })
    buyer!: Buyer;

    @Column({ name: 'offer_id' })
    offerId!: number;

    @Column({ name: 'is_active', default: true })
    isActive!: boolean;

    @Column({ name: 'routing_priority', default: 1 })
    routingPriority!: number;

    @Column({ name: 'capacity_per_day', type: 'int', nullable: true })
    capacityPerDay!: number | null;

    @Column({ name: 'capacity_per_hour', type: 'int', nullable: true })
    capacityPerHour!: number | null;

    @Column({ name: 'price_per_lead', type: 'decimal', precision: 10, scale: 2, nullable: true, transformer: decimalTransformer })
    pricePerLead!: number | null;

    @Column({ name: 'webhook_url_override', type: 'varchar', length: 500, nullable: true })
    webhookUrlOverride!: string | null;

    @Column({ name: 'webhook_secret_override', type: 'varchar', length: 200, nullable: true })
    webhookSecretOverride!: string | null;

    @Column({ name: 'email_override', type: 'varchar', length: 200, nullable: true })
    emailOverride!: string | null;

    @Column({ name: 'sms_override', type: 'varchar', length: 20, nullable: true })
    smsOverride!: string | null;

    @Column({ name: 'min_balance_required', type: 'decimal', precision: 10, scale: 2, nullable: true, transformer: decimalTransformer })
    minBalanceRequired!: number | null;

    @Column({ name: 'pause_until', type: 'timestamptz', nullable: true })
    pauseUntil!: Date | null;

    @CreateDateColumn({ name: 'created_at' })
    createdAt!: Date;

    @UpdateDateColumn({ name: 'updated_at' })
    updatedAt!: Date;
}
