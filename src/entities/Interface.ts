import {
    Column,
    CreateDateColumn,
    Entity,
    Index,
    JoinColumn,
    ManyToOne,
    PrimaryGeneratedColumn,
    UpdateDateColumn
} from 'typeorm';
import type { InterfaceStatus, InterfaceType } from '../types/domain.types';
import { Project } from './Project';
import { User } from './User';

@Entity({ name: 'interfaces' })
export class Interface {
    @PrimaryGeneratedColumn()
    id!: number;

    @Index()
    @Column({ type: 'integer' })
    project_id!: number;

    @ManyToOne(() => Project, { onDelete: 'CASCADE' })
    @JoinColumn({ name: 'project_id' })
    project?: Project;

    @Column({ type: 'varchar', length: 200 })
    name!: string;

    @Index({ unique: true })
    @Column({ type: 'varchar', length: 100 })
    code!: string;

    @Column({ type: 'text', nullable: true })
    description!: string | null;

    @Column({ type: 'varchar', length: 10 })
    interface_type!: InterfaceType;

    @Column({ type: 'varchar', length: 500, nullable: true })
    url!: string | null;

    @Column({ type: 'varchar', length: 10, nullable: true })
    method!: string | null;

    @Column({ type: 'varchar', length: 100, nullable: true })
    category!: string | null;

    @Column({ type: 'varchar', length: 500, nullable: true })
    tags!: string | null;

    @Column({ type: 'varchar', length: 20, default: 'active' })
    status!: InterfaceStatus;

    @Column({ type: 'text', nullable: true })
    input_example!: string | null;

    @Column({ type: 'text', nullable: true })
    output_example!: string | null;

    // SQL text of a database view
    @Column({ type: 'text', nullable: true })
    view_definition!: string | null;

    // HTML
    @Column({ type: 'text', nullable: true })
    notes!: string | null;

    @Column({ type: 'integer', nullable: true })
    creator_id!: number | null;

    @ManyToOne(() => User, { onDelete: 'SET NULL', nullable: true })
    @JoinColumn({ name: 'creator_id' })
    creator?: User | null;

    @CreateDateColumn({ type: 'datetime' })
    created_at!: Date;

    @UpdateDateColumn({ type: 'datetime' })
    updated_at!: Date;
}
