import {
  Entity,
  PrimaryColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  OneToMany,
  Index,
} from 'typeorm';
import { VideoRecord } from '../types/dataset';
import { VideoSnapshot } from './VideoSnapshot';
import { bigintTransformer } from './transformers';

@Entity('videos')
@Index('idx_videos_creator_id__video_created_at', ['creatorId', 'videoCreatedAt'])
export class Video implements VideoRecord {
  @PrimaryColumn({ type: 'text' })
  id!: string;

  @Column({ name: 'creator_id', type: 'text' })
  creatorId!: string;

  @Column({
    name: 'video_created_at',
    type: 'timestamptz',
    comment: 'Publish instant (UTC)'
  })
  videoCreatedAt!: Date;

  // Final totals, refreshed by periodic measurement
  @Column({ name: 'views_count', type: 'bigint', default: 0, transformer: bigintTransformer })
  viewsCount!: number;

  @Column({ name: 'likes_count', type: 'bigint', default: 0, transformer: bigintTransformer })
  likesCount!: number;

  @Column({ name: 'comments_count', type: 'bigint', default: 0, transformer: bigintTransformer })
  commentsCount!: number;

  @Column({ name: 'reports_count', type: 'bigint', default: 0, transformer: bigintTransformer })
  reportsCount!: number;

  @OneToMany(() => VideoSnapshot, (snapshot) => snapshot.video)
  snapshots?: VideoSnapshot[];

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at', type: 'timestamptz' })
  updatedAt!: Date;
}
