import { Column, CreateDateColumn, Entity, Index, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from 'typeorm';
import type { ParamType } from '../types/domain.types';
import { Dictionary } from './Dictionary';
import { Interface } from './Interface';

@Entity({ name: 'parameters' })
export class Parameter {
    @PrimaryGeneratedColumn()
    id!: number;

    @Index()
    @Column({ type: 'integer' })
    interface_id!: number;

    @ManyToOne(() => Interface, { onDelete: 'CASCADE' })
    @JoinColumn({ name: 'interface_id' })
    interface?: Interface;

    @Column({ type: 'varchar', length: 10 })
    param_type!: ParamType;

    @Column({ type: 'varchar', length: 100 })
    field_name!: string;

    @Column({ type: 'varchar', length: 200 })
    name!: string;

    @Column({ type: 'varchar', length: 50 })
    data_type!: string;

    @Column({ type: 'boolean', default: false })
    required!: boolean;

    @Column({ type: 'varchar', length: 500, nullable: true })
    default_value!: string | null;

    @Column({ type: 'text', nullable: true })
    description!: string | null;

    @Column({ type: 'varchar', length: 500, nullable: true })
    example!: string | null;

    @Column({ type: 'integer', default: 0 })
    order_index!: number;

    @Column({ type: 'integer', nullable: true })
    dictionary_id!: number | null;

    @ManyToOne(() => Dictionary, { onDelete: 'SET NULL', nullable: true })
    @JoinColumn({ name: 'dictionary_id' })
    dictionary?: Dictionary | null;

    @CreateDateColumn({ type: 'datetime' })
    created_at!: Date;
}
