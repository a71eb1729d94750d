/**
 * Catalog types: media tables, asset rows and the identifier allow-lists
 * that are allowed to reach generated SQL.
 */

import { z } from 'zod';

/**
 * Known media tables. `media_proj` holds active assets, `media_arch` the archive.
 */
export const MEDIA_TABLES = ['media_proj', 'media_arch'] as const;
export type MediaTable = (typeof MEDIA_TABLES)[number];
export const MediaTableSchema = z.enum(MEDIA_TABLES);

export const ACTIVE_TABLE: MediaTable = 'media_proj';
export const ARCHIVE_TABLE: MediaTable = 'media_arch';

export function isMediaTable(value: string): value is MediaTable {
  return MEDIA_TABLES.some(table => table === value);
}

export function otherTable(table: MediaTable): MediaTable {
  return table === ACTIVE_TABLE ? ARCHIVE_TABLE : ACTIVE_TABLE;
}

/**
 * Every column of a media row, in schema order.
 */
export const ASSET_FIELDS = [
  'file_id',
  'file_name',
  'file_path',
  'file_type',
  'file_format',
  'file_resolution',
  'file_duration',
  'shot_size',
  'shot_type',
  'source',
  'source_id',
  'genre',
  'subject',
  'category',
  'lighting',
  'setting',
  'tags',
  'captions',
] as const;
export type AssetField = (typeof ASSET_FIELDS)[number];

export type MediaAsset = Record<AssetField, string>;

/** Value stored for any field an insert leaves out. */
export const UNKNOWN_VALUE = 'unknown';

/** Fields a cart edit may change. */
export const EDITABLE_METADATA_FIELDS = [
  'subject',
  'genre',
  'setting',
  'captions',
  'tags',
  'lighting',
  'category',
] as const;
export type EditableMetadataField = (typeof EDITABLE_METADATA_FIELDS)[number];

/** Fields the grouped counts may be computed over. */
export const CATEGORY_FIELDS = [
  'file_type',
  'genre',
  'subject',
  'category',
  'lighting',
  'setting',
  'tags',
] as const;
export type CategoryField = (typeof CATEGORY_FIELDS)[number];
export const CategoryFieldSchema = z.enum(CATEGORY_FIELDS);

/** Fields a single-field search may target. */
export const SEARCH_FIELDS = [
  'subject',
  'captions',
  'setting',
  'lighting',
  'file_type',
  'genre',
  'category',
] as const;
export type SearchField = (typeof SEARCH_FIELDS)[number];
export const SearchFieldSchema = z.enum(SEARCH_FIELDS);

/** Fields matched by the search-all mode. */
export const SEARCH_ALL_FIELDS = ['genre', 'category', 'subject', 'tags'] as const satisfies readonly AssetField[];

/** Fields filled from the file itself during ingestion; never taken from templates. */
export const READONLY_INGEST_FIELDS = [
  'file_id',
  'file_name',
  'file_path',
  'file_type',
  'file_resolution',
] as const satisfies readonly AssetField[];

/** Fields the operator fills in during ingestion. All are required on submit. */
export const INGEST_EDIT_FIELDS = [
  'file_format',
  'file_duration',
  'shot_size',
  'shot_type',
  'source',
  'source_id',
  'genre',
  'subject',
  'category',
  'lighting',
  'setting',
  'tags',
  'captions',
] as const satisfies readonly AssetField[];
export type IngestEditField = (typeof INGEST_EDIT_FIELDS)[number];

/** Template fields that describe one specific file and so are not carried forward. */
export const TEMPLATE_SKIP_FIELDS: readonly AssetField[] = ['file_format', 'file_duration'];

export function isAssetField(value: string): value is AssetField {
  return ASSET_FIELDS.some(field => field === value);
}

export function isEditableMetadataField(value: string): value is EditableMetadataField {
  return EDITABLE_METADATA_FIELDS.some(field => field === value);
}

export function isCategoryField(value: string): value is CategoryField {
  return CATEGORY_FIELDS.some(field => field === value);
}

/**
 * File extension, lowercased, without the dot.
 */
export function extensionOf(fileName: string): string {
  const dot = fileName.lastIndexOf('.');
  if (dot < 0 || dot === fileName.length - 1) return '';
  return fileName.slice(dot + 1).toLowerCase();
}

/**
 * Asset row decorated with servable paths.
 */
export interface DecoratedAsset extends MediaAsset {
  absolutePath: string;
  relativePath: string;
  thumbnailPath: string;
  viewable: boolean;
}
