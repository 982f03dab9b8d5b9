import { Entity, Column, PrimaryGeneratedColumn, CreateDateColumn, UpdateDateColumn } from 'typeorm';

/**
 * Versioned, offer-scoped configuration documents. The JSON body is parsed by
 * the consuming stage (see validation-policy.schema.ts and
 * routing-policy.schema.ts); the store never interprets it.
 */
abstract class PolicyDocument {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({ length: 200 })
    name!: string;

    @Column({ default: 1 })
    version!: number;

    @Column({ name: 'is_active', default: true })
    isActive!: boolean;

    @CreateDateColumn({ name: 'created_at' })
    createdAt!: Date;

    @UpdateDateColumn({ name: 'updated_at' })
    updatedAt!: Date;
}

@Entity('validation_policies')
export class ValidationPolicy extends PolicyDocument {
    @Column({ type: 'jsonb' })
    rules!: Record<string, unknown>;
}

@Entity('routing_policies')
export class RoutingPolicy extends PolicyDocument {
    @Column({ type: 'jsonb' })
    config!: Record<string, unknown>;
}
