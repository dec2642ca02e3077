import { MigrationInterface, QueryRunner, Table, TableForeignKey, TableIndex } from 'typeorm';

const totalColumns = (prefix = '') =>
  ['views_count', 'likes_count', 'comments_count', 'reports_count'].map((name) => ({
    name: `${prefix}${name}`,
    type: 'bigint',
    isNullable: false,
    default: 0,
  }));

export class CreateVideoMetricsTables1730000000000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.createTable(
      new Table({
        name: 'videos',
        columns: [
          { name: 'id', type: 'text', isPrimary: true },
          { name: 'creator_id', type: 'text', isNullable: false },
          {
            name: 'video_created_at',
            type: 'timestamptz',
            isNullable: false,
            comment: 'Publish instant (UTC)',
          },
          ...totalColumns(),
          { name: 'created_at', type: 'timestamptz', default: 'now()' },
          { name: 'updated_at', type: 'timestamptz', default: 'now()' },
        ],
      }),
      true
    );

    await queryRunner.createTable(
      new Table({
        name: 'video_snapshots',
        columns: [
          { name: 'id', type: 'text', isPrimary: true },
          { name: 'video_id', type: 'text', isNullable: false },
          {
            name: 'created_at',
            type: 'timestamptz',
            isNullable: false,
            comment: 'Measurement instant (UTC)',
          },
          ...totalColumns(),
          ...totalColumns('delta_'),
          { name: 'updated_at', type: 'timestamptz', default: 'now()' },
        ],
      }),
      true
    );

    await queryRunner.createForeignKey(
      'video_snapshots',
      new TableForeignKey({
        columnNames: ['video_id'],
        referencedTableName: 'videos',
        referencedColumnNames: ['id'],
        onDelete: 'CASCADE',
      })
    );

    // Indexes backing the per-creator and date-scoped aggregations
    await queryRunner.createIndex(
      'videos',
      new TableIndex({
        name: 'idx_videos_creator_id__video_created_at',
        columnNames: ['creator_id', 'video_created_at'],
      })
    );
    await queryRunner.createIndex(
      'video_snapshots',
      new TableIndex({
        name: 'idx_video_snapshots_video_id__created_at',
        columnNames: ['video_id', 'created_at'],
      })
    );
    await queryRunner.createIndex(
      'video_snapshots',
      new TableIndex({
        name: 'idx_video_snapshots_created_at',
        columnNames: ['created_at'],
      })
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.dropTable('video_snapshots', true);
    await queryRunner.dropTable('videos', true);
  }
}
