import { Entity, Column, PrimaryGeneratedColumn, CreateDateColumn, UpdateDateColumn } from 'typeorm';

@Entity('markets')
export class Market {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({ length: 200 })
    name!: string;

    @Column({ name: 'country_code', type: 'char', length: 2, default: 'US' })
    countryCode!: string;

    @Column({ name: 'region_code', type: 'varchar', length: 20, nullable: true })
    regionCode!: string | null;

    @Column({ length: 64 })
    timezone!: string;

    @Column({ type: 'char', length: 3, default: 'USD' })
    currency!: string;

    @Column({ name: 'is_active', default: true })
    isActive!: boolean;

    @CreateDateColumn({ name: 'created_at' })
    createdAt!: Date;

    @UpdateDateColumn({ name: 'updated_at' })
    updatedAt!: Date;
}
