import { Entity, Column, PrimaryGeneratedColumn, CreateDateColumn, UpdateDateColumn, Check } from 'typeorm';
import { decimalTransformer } from '../../common/decimal.transformer';

@Entity('buyers')
@Check('"balance" >= 0')
export class Buyer {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({ length: 200 })
    name!: string;

    @Column({ length: 200, unique: true })
    email!: string;

    @Column({ length: 20 })
    phone!: string;

    @Column({ type: 'varchar', length: 200, nullable: true })
    company!: string | null;

    @Column({ name: 'webhook_url', type: 'varchar', length: 500, nullable: true })
    webhookUrl!: string | null;

    @Column({ name: 'webhook_secret', type: 'varchar', length: 200, nullable: true })
    webhookSecret!: string | null;

    @Column({ name: 'email_notifications', default: true })
    emailNotifications!: boolean;

    @Column({ name: 'sms_notifications', default: false })
    smsNotifications!: boolean;

    @Column({ name: 'is_active', default: true })
    isActive!: boolean;

    @Column({ type: 'decimal', precision: 10, scale: 2, default: 0, transformer: decimalTransformer })
    balance!: number;

    /** Falls between the enrollment price and the offer default */
    @Column({ name: 'default_price_per_lead', type: 'decimal', precision: 10, scale: 2, nullable: true, transformer: decimalTransformer })
    defaultPricePerLead!: number | null;

    @CreateDateColumn({ name: 'created_at' })
    createdAt!: Date;

    @UpdateDateColumn({ name: 'updated_at' })
    updatedAt!: Date;
}
