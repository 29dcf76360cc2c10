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
import { Interface } from './Interface';
import { Project } from './Project';
import { User } from './User';

@Entity({ name: 'dictionaries' })
export class Dictionary {
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

    // Older rows tie a dictionary to a single interface
    @Column({ type: 'integer', nullable: true })
    interface_id!: number | null;

    @ManyToOne(() => Interface, { onDelete: 'SET NULL', nullable: true })
    @JoinColumn({ name: 'interface_id' })
    interface?: Interface | null;

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
