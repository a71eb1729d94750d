import { z } from 'zod';
import { MediaTableSchema } from '../../lib/media-types';

export const QUEUE_STATUSES = ['Pending', 'Processing', 'Completed', 'Skipped', 'Duplicate', 'Error'] as const;
export type QueueStatus = (typeof QUEUE_STATUSES)[number];

/** Destination folder under the media root, chosen by extension. */
export const FILE_CATEGORIES = ['videos', 'images', 'other'] as const;
export type FileCategory = (typeof FILE_CATEGORIES)[number];

const FieldValuesSchema = z.record(z.string());

export const QueueItemSchema = z.object({
  sourcePath: z.string(),
  destPath: z.string(),
  category: z.enum(FILE_CATEGORIES),
  status: z.enum(QUEUE_STATUSES),
  errorMessage: z.string().nullable().default(null),
  metadataCache: FieldValuesSchema.nullable().default(null),
  fileId: z.string().nullable().default(null),
  thumbnailPath: z.string().nullable().default(null),
  /** Progress id of the latest copy, pollable while the record lasts. */
  copyId: z.string().nullable().default(null),
  addedAt: z.string(),
});
export type QueueItem = z.infer<typeof QueueItemSchema>;

export const UndoRecordSchema = z.object({
  fileId: z.string(),
  table: MediaTableSchema,
  sourcePath: z.string(),
  destPath: z.string(),
  thumbnailPath: z.string().nullable(),
});
export type UndoRecord = z.infer<typeof UndoRecordSchema>;

const TemplateSchema = z.object({
  file_format: z.string().optional(),
  file_duration: z.string().optional(),
  shot_size: z.string().optional(),
  shot_type: z.string().optional(),
  source: z.string().optional(),
  source_id: z.string().optional(),
  genre: z.string().optional(),
  subject: z.string().optional(),
  category: z.string().optional(),
  lighting: z.string().optional(),
  setting: z.string().optional(),
  tags: z.string().optional(),
  captions: z.string().optional(),
});
export type IngestTemplate = z.infer<typeof TemplateSchema>;

export const TemplateSetSchema = z.object({
  videos: TemplateSchema.default({}),
  images: TemplateSchema.default({}),
  other: TemplateSchema.default({}),
});
export type TemplateSet = z.infer<typeof TemplateSetSchema>;

export const QueueStateSchema = z.object({
  items: z.array(QueueItemSchema).default([]),
  cursor: z.number().int().default(-1),
  undoStack: z.array(UndoRecordSchema).default([]),
  templates: TemplateSetSchema.default({}),
});
export type QueueState = z.infer<typeof QueueStateSchema>;

export function emptyQueueState(): QueueState {
  return { items: [], cursor: -1, undoStack: [], templates: { videos: {}, images: {}, other: {} } };
}

export interface QueueStats {
  total: number;
  pending: number;
  processing: number;
  completed: number;
  skipped: number;
  duplicate: number;
  error: number;
}
