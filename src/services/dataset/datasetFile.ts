import fs from 'fs';
import Joi from 'joi';
import { DateTime } from 'luxon';
import { Dataset, SnapshotRecord, VideoRecord } from '../../types/dataset';

// Dataset dump: { "videos": [ { ...video columns, "snapshots": [ ...snapshot columns ] } ] }

interface RawSnapshot {
  id: string | number;
  video_id?: string | number;
  created_at: Date;
  views_count: number;
  likes_count: number;
  comments_count: number;
  reports_count: number;
  delta_views_count: number;
  delta_likes_count: number;
  delta_comments_count: number;
  delta_reports_count: number;
}

interface RawVideo {
  id: string | number;
  creator_id: string | number;
  video_created_at: Date;
  views_count: number;
  likes_count: number;
  comments_count: number;
  reports_count: number;
  snapshots: RawSnapshot[];
}

interface RawDataset {
  videos: RawVideo[];
}

// Timestamps without an offset are UTC, like the database session they were dumped from
const utcInstant = Joi.string().custom((value: string, helpers) => {
  const instant = DateTime.fromISO(value, { zone: 'utc' });
  return instant.isValid ? instant.toJSDate() : helpers.error('any.invalid');
});

const identifier = Joi.alternatives().try(Joi.string().min(1), Joi.number().integer());
const total = Joi.number().integer().min(0).required();
const delta = Joi.number().integer().required();

const snapshotSchema = Joi.object({
  id: identifier.required(),
  video_id: identifier,
  created_at: utcInstant.required(),
  views_count: total,
  likes_count: total,
  comments_count: total,
  reports_count: total,
  delta_views_count: delta,
  delta_likes_count: delta,
  delta_comments_count: delta,
  delta_reports_count: delta,
}).unknown();

const videoSchema = Joi.object({
  id: identifier.required(),
  creator_id: identifier.required(),
  video_created_at: utcInstant.required(),
  views_count: total,
  likes_count: total,
  comments_count: total,
  reports_count: total,
  snapshots: Joi.array().items(snapshotSchema).default([]),
}).unknown();

const datasetSchema = Joi.object<RawDataset>({
  videos: Joi.array().items(videoSchema).required(),
}).unknown();

const toSnapshot = (videoId: string, raw: RawSnapshot): SnapshotRecord => ({
  id: String(raw.id),
  videoId,
  createdAt: raw.created_at,
  viewsCount: raw.views_count,
  likesCount: raw.likes_count,
  commentsCount: raw.comments_count,
  reportsCount: raw.reports_count,
  deltaViewsCount: raw.delta_views_count,
  deltaLikesCount: raw.delta_likes_count,
  deltaCommentsCount: raw.delta_comments_count,
  deltaReportsCount: raw.delta_reports_count,
});

/** Validates a parsed dataset dump as a whole; any malformed record rejects the file. */
export function parseDataset(payload: unknown): Dataset {
  const { error, value } = datasetSchema.validate(payload, { abortEarly: true });
  if (error) {
    throw new Error(`Invalid dataset: ${error.message}`);
  }

  const videos: VideoRecord[] = [];
  const snapshots: SnapshotRecord[] = [];
  const seen = new Set<string>();

  for (const raw of value.videos) {
    const id = String(raw.id);
    if (seen.has(id)) {
      throw new Error(`Invalid dataset: duplicate video id "${id}"`);
    }
    seen.add(id);

    videos.push({
      id,
      creatorId: String(raw.creator_id),
      videoCreatedAt: raw.video_created_at,
      viewsCount: raw.views_count,
      likesCount: raw.likes_count,
      commentsCount: raw.comments_count,
      reportsCount: raw.reports_count,
    });

    for (const snapshot of raw.snapshots) {
      if (snapshot.video_id !== undefined && String(snapshot.video_id) !== id) {
        throw new Error(`Invalid dataset: snapshot "${snapshot.id}" is nested under video "${id}" but names "${snapshot.video_id}"`);
      }
      snapshots.push(toSnapshot(id, snapshot));
    }
  }

  return { videos, snapshots };
}

export async function loadDatasetFile(filePath: string): Promise<Dataset> {
  const content = await fs.promises.readFile(filePath, 'utf-8');
  return parseDataset(JSON.parse(content));
}
