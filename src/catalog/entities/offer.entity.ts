import { Entity, Column, PrimaryGeneratedColumn, CreateDateColumn, UpdateDateColumn, Index } from 'typeorm';
import { decimalTransformer } from '../../common/decimal.transformer';

@Entity('offers')
@Index(['marketId', 'verticalId', 'name'], { unique: true })
export class Offer {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({ name: 'market_id' })
    marketId!: number;

    @Column({ name: 'vertical_id' })
    verticalId!: number;

    @Column({ length: 200 })
    name!: string;

    @Column({ name: 'is_active', default: true })
    isActive!: boolean;

    @Column({ name: 'default_price_per_lead', type: 'decimal', precision: 10, scale: 2, transformer: decimalTransformer })
    defaultPricePerLead!: number;

    @Column({ name: 'validation_policy_id' })
    validationPolicyId!: number;

    @Column({ name: 'routing_policy_id' })
    routingPolicyId!: number;

    @CreateDateColumn({ name: 'created_at' })
    createdAt!: Date;

    @UpdateDateColumn({ name: 'updated_at' })
    updatedAt!: Date;
}
