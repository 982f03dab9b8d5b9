import { Entity, Column, PrimaryGeneratedColumn, CreateDateColumn, UpdateDateColumn, Index } from 'typeorm';

export type ScopeType = 'postal_code' | 'city';

@Entity('buyer_service_areas')
@Index(['buyerId', 'marketId', 'scopeType', 'scopeValue'], { unique: true })
export class BuyerServiceArea {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({ name: 'buyer_id' })
    buyerId!: number;

    @Column({ name: 'market_id' })
    marketId!: number;

    @Column({ name: 'scope_type', type: 'varchar', length: 16 })
    scopeType!: ScopeType;

    @Column({ name: 'scope_value', length: 64 })
    scopeValue!: string;

    @Column({ name: 'is_active', default: true })
    isActive!: boolean;

    @CreateDateColumn({ name: 'created_at' })
    createdAt!: Date;

    @UpdateDateColumn({ name: 'updated_at' })
    updatedAt!: Date;
}

/** Sole routing rights for one buyer over a postal code or city of an offer */
@Entity('offer_exclusivities')
@Index(['offerId', 'scopeType', 'scopeValue'], { unique: true })
export class OfferExclusivity {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({ name: 'offer_id' })
    offerId!: number;

    @Column({ name: 'scope_type', type: 'varchar', length: 16 })
    scopeType!: ScopeType;

    @Column({ name: 'scope_value', length: 64 })
    scopeValue!: string;

    @Column({ name: 'buyer_id' })
    buyerId!: number;

    @Column({ name: 'is_active', default: true })
    isActive!: boolean;

    @CreateDateColumn({ name: 'created_at' })
    createdAt!: Date;

    @UpdateDateColumn({ name: 'updated_at' })
    updatedAt!: Date;
}
