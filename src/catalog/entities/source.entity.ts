import { Entity, Column, PrimaryGeneratedColumn, CreateDateColumn, UpdateDateColumn, Index, ManyToOne, JoinColumn } from 'typeorm';
import { Offer } from './offer.entity';

export type SourceKind = 'landing_page' | 'partner_api' | 'embed_form';

@Entity('sources')
@Index(['hostname'])
export class Source {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({ name: 'offer_id' })
    offerId!: number;

    @ManyToOne(() => Offer, { onDelete: 'RESTRICT' })
    @JoinColumn({ name: 'offer_id' })
    offer!: Offer;

    @Column({ name: 'source_key', length: 128, unique: true })
    sourceKey!: string;

    @Column({ type: 'varchar', length: 32 })
    kind!: SourceKind;

    @Column({ length: 200 })
    name!: string;

    /** Lowercased host used for HTTP mapping when no source id/key is sent */
    @Column({ type: 'varchar', length: 255, nullable: true })
    hostname!: string | null;

    /** Starts with "/"; null maps every path on the host */
    @Column({ name: 'path_prefix', type: 'varchar', length: 255, nullable: true })
    pathPrefix!: string | null;

    @Column({ name: 'is_active', default: true })
    isActive!: boolean;

    @CreateDateColumn({ name: 'created_at' })
    createdAt!: Date;

    @UpdateDateColumn({ name: 'updated_at' })
    updatedAt!: Date;
}
