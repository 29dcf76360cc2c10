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
import type { DocumentType, FaqContentType } from '../types/domain.types';
import { User } from './User';

@Entity({ name: 'faqs' })
export class Faq {
    @PrimaryGeneratedColumn()
    id!: number;

    @Index()
    @Column({ type: 'varchar', length: 200 })
    title!: string;

    @Column({ type: 'text', nullable: true })
    description!: string | null;

    // Key of a FAQ_MODULE dictionary value
    @Index()
    @Column({ type: 'varchar', length: 100, nullable: true })
    module!: string | null;

    @Index()
    @Column({ type: 'varchar', length: 100, nullable: true })
    person!: string | null;

    @Column({ type: 'varchar', length: 20, default: 'pdf' })
    document_type!: DocumentType;

    @Column({ type: 'varchar', length: 20, default: 'attachment' })
    content_type!: FaqContentType;

    @Column({ type: 'text', nullable: true })
    rich_content!: string | null;

    @Column({ type: 'text', nullable: true })
    attachments!: string | null;

    @Column({ type: 'varchar', length: 500, nullable: true })
    file_path!: string | null;

    @Column({ type: 'varchar', length: 255, nullable: true })
    file_name!: string | null;

    @Column({ type: 'integer', nullable: true })
    file_size!: number | null;

    @Column({ type: 'varchar', length: 100, nullable: true })
    mime_type!: string | null;

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
