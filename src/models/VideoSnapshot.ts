import {
  Entity,
  PrimaryColumn,
  Column,
  UpdateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { SnapshotRecord } from '../types/dataset';
import { Video } from './Video';
import { bigintTransformer } from './transformers';

@Entity('video_snapshots')
@Index('idx_video_snapshots_video_id__created_at', ['videoId', 'createdAt'])
@Index('idx_video_snapshots_created_at', ['createdAt'])
export class VideoSnapshot implements SnapshotRecord {
  @PrimaryColumn({ type: 'text' })
  id!: string;

  @Column({ name: 'video_id', type: 'text' })
  videoId!: string;

  @ManyToOne(() => Video, (video) => video.snapshots, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'video_id' })
  video?: Video;

  @Column({
    name: 'created_at',
    type: 'timestamptz',
    comment: 'Measurement instant (UTC)'
  })
  createdAt!: Date;

  // Totals as observed at createdAt
  @Column({ name: 'views_count', type: 'bigint', default: 0, transformer: bigintTransformer })
  viewsCount!: number;

  @Column({ name: 'likes_count', type: 'bigint', default: 0, transformer: bigintTransformer })
  likesCount!: number;

  @Column({ name: 'comments_count', type: 'bigint', default: 0, transformer: bigintTransformer })
  commentsCount!: number;

  @Column({ name: 'reports_count', type: 'bigint', default: 0, transformer: bigintTransformer })
  reportsCount!: number;

  // Change since the previous snapshot of the same video
  @Column({ name: 'delta_views_count', type: 'bigint', default: 0, transformer: bigintTransformer })
  deltaViewsCount!: number;

  @Column({ name: 'delta_likes_count', type: 'bigint', default: 0, transformer: bigintTransformer })
  deltaLikesCount!: number;

  @Column({ name: 'delta_comments_count', type: 'bigint', default: 0, transformer: bigintTransformer })
  deltaCommentsCount!: number;

  @Column({ name: 'delta_reports_count', type: 'bigint', default: 0, transformer: bigintTransformer })
  deltaReportsCount!: number;

  @UpdateDateColumn({ name: 'updated_at', type: 'timestamptz' })
  updatedAt!: Date;
}
