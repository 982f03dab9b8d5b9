import { Entity, Column, PrimaryGeneratedColumn, CreateDateColumn, UpdateDateColumn } from 'typeorm';

@Entity('verticals')
export class Vertical {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({ length: 64, unique: true })
    slug!: string;

    @Column({ length: 200 })
    name!: string;

    @Column({ name: 'is_active', default: true })
    isActive!: boolean;

    @CreateDateColumn({ name: 'created_at' })
    createdAt!: Date;

    @UpdateDateColumn({ name: 'updated_at' })
    updatedAt!: Date;
}
