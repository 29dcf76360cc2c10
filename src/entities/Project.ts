import {
    Column,
    CreateDateColumn,
    Entity,
    Index,
    JoinColumn,
    ManyToOne,
    PrimaryGeneratedColumn,
    UpdateDateColumn,
    VersionColumn
} from 'typeorm';
import { User } from './User';

/**
 * Top-level grouping for interfaces and dictionaries.
 *
 * `documents` and `attachments` hold JSON arrays as text; `version` guards
 * read-modify-write updates of the attachment list.
 */
@Entity({ name: 'projects' })
export class Project {
    @PrimaryGeneratedColumn()
    id!: number;

    @Index()
    @Column({ type: 'varchar', length: 200 })
    name!: string;

    @Column({ type: 'varchar', length: 100 })
    manager!: string;

    @Column({ type: 'text' })
    contact_info!: string;

    @Column({ type: 'text', nullable: true })
    description!: string | null;

    @Column({ type: 'text', nullable: true })
    documents!: string | null;

    @Column({ type: 'text', nullable: true })
    attachments!: string | null;

    @Index()
    @Column({ type: 'integer', nullable: true })
    creator_id!: number | null;

    @ManyToOne(() => User, { onDelete: 'SET NULL', nullable: true })
    @JoinColumn({ name: 'creator_id' })
    creator?: User | null;

    @VersionColumn()
    version!: number;

    @CreateDateColumn({ type: 'datetime' })
    created_at!: Date;

    @UpdateDateColumn({ type: 'datetime' })
    updated_at!: Date;
}
