import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';
import {
  MentionDirection,
  MentionStatus,
  MentionType,
} from '../../../../core/domain/enums';

/**
 * TypeORM entity for Webmention
 */
@Entity('webmentions')
@Index(['source', 'target', 'direction'], { unique: true })
@Index(['target', 'direction', 'status'])
@Index(['source', 'direction', 'status'])
@Index(['createdAt'])
export class WebmentionEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 2048 })
  source!: string;

  @Column({ type: 'varchar', length: 2048 })
  target!: string;

  @Column({ type: 'simple-enum', enum: MentionDirection })
  direction!: MentionDirection;

  @Column({
    type: 'simple-enum',
    enum: MentionStatus,
    default: MentionStatus.CONFIRMED,
  })
  status!: MentionStatus;

  @Column({
    name: 'mention_type',
    type: 'simple-enum',
    enum: MentionType,
    default: MentionType.UNKNOWN,
  })
  mentionType!: MentionType;

  @Column({ type: 'varchar', length: 16, nullable: true })
  rsvp!: string | null;

  @Column({ type: 'text', nullable: true })
  title!: string | null;

  @Column({ type: 'text', nullable: true })
  excerpt!: string | null;

  @Column({ type: 'text', nullable: true })
  content!: string | null;

  @Column({ name: 'author_name', type: 'varchar', length: 512, nullable: true })
  authorName!: string | null;

  @Column({ name: 'author_url', type: 'varchar', length: 2048, nullable: true })
  authorUrl!: string | null;

  @Column({ name: 'author_photo', type: 'varchar', length: 2048, nullable: true })
  authorPhoto!: string | null;

  /**
   * ISO 8601 timestamp as published by the source
   */
  @Column({ type: 'varchar', length: 64, nullable: true })
  published!: string | null;

  @Column({ type: 'simple-json' })
  metadata!: Record<string, unknown>;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
