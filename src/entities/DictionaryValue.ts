import { Column, CreateDateColumn, Entity, Index, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from 'typeorm';
import { Dictionary } from './Dictionary';

@Entity({ name: 'dictionary_values' })
export class DictionaryValue {
    @PrimaryGeneratedColumn()
    id!: number;

    @Index()
    @Column({ type: 'integer' })
    dictionary_id!: number;

    @ManyToOne(() => Dictionary, { onDelete: 'CASCADE' })
    @JoinColumn({ name: 'dictionary_id' })
    dictionary?: Dictionary;

    @Column({ type: 'varchar', length: 100 })
    key!: string;

    @Column({ type: 'varchar', length: 500 })
    value!: string;

    @Column({ type: 'text', nullable: true })
    description!: string | null;

    @Column({ type: 'integer', default: 0 })
    order_index!: number;

    @CreateDateColumn({ type: 'datetime' })
    created_at!: Date;
}
