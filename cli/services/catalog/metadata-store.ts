import { Connection, WhereClause, escapeLike, whereSql, withConnection } from '../../lib/database';
import { Failure, ValidationError } from '../../lib/errors';
import {
  ACTIVE_TABLE,
  ARCHIVE_TABLE,
  ASSET_FIELDS,
  AssetField,
  CategoryField,
  MEDIA_TABLES,
  MediaAsset,
  MediaTable,
  UNKNOWN_VALUE,
  isCategoryField,
  isEditableMetadataField,
} from '../../lib/media-types';
import { TokenGenerator, generateToken, uniqueToken } from '../../lib/unique-id';
import { logger as rootLogger } from '../../utils/logger';

const logger = rootLogger.child('catalog');

type AssetRow = { [K in AssetField]: string | null };

export type MediaIdColumn = 'file_id';

export type DeleteListener = (table: MediaTable, fileId: string) => void;

export interface MetadataStoreOptions {
  dbPath: string;
  generateToken?: TokenGenerator;
}

export interface FileStatus {
  fileId: string;
  inActive: boolean;
  inArchive: boolean;
  inBoth: boolean;
}

export type CopyToArchiveResult =
  | { success: true; message: string; copied: boolean }
  | Failure;

const COLUMNS_SQL = ASSET_FIELDS.map(field => (field === 'file_id' ? 'file_id TEXT NOT NULL UNIQUE' : `${field} TEXT`)).join(', ');
const FIELD_LIST = ASSET_FIELDS.join(', ');
const PLACEHOLDERS = ASSET_FIELDS.map(() => '?').join(', ');

/**
 * Media rows in the active and archive tables of the catalog database.
 * Table, field and category names are checked against the allow-lists in
 * media-types before they are written into SQL text.
 */
export class MetadataStore {
  private readonly dbPath: string;
  private readonly generate: TokenGenerator;
  private readonly deleteListeners: DeleteListener[] = [];

  constructor(options: MetadataStoreOptions) {
    this.dbPath = options.dbPath;
    this.generate = options.generateToken ?? (() => generateToken());
  }

  ensureSchema(): void {
    this.run(db => {
      for (const table of MEDIA_TABLES) {
        db.exec(`CREATE TABLE IF NOT EXISTS ${table} (${COLUMNS_SQL})`);
      }
    });
  }

  /**
   * Insert a row, filling every missing field with the `unknown` sentinel.
   */
  insert(table: MediaTable, fields: Partial<MediaAsset>): MediaAsset {
    const record = withDefaults(fields);
    this.run(db => {
      db.prepare(`INSERT INTO ${table} (${FIELD_LIST}) VALUES (${PLACEHOLDERS})`).run(
        ...ASSET_FIELDS.map(field => record[field])
      );
    });
    logger.debug('Inserted asset', { table, fileId: record.file_id });
    return record;
  }

  /**
   * Update one editable field. Fields outside the edit allow-list are ignored (returns 0).
   */
  updateField(table: MediaTable, fileId: string, field: string, value: string): number {
    if (!isEditableMetadataField(field)) {
      logger.warn('Ignoring update of non-editable field', { table, field });
      return 0;
    }
    return this.run(db => db.prepare(`UPDATE ${table} SET ${field} = ? WHERE file_id = ?`).run(value, fileId).changes);
  }

  delete(table: MediaTable, fileId: string): number {
    const removed = this.run(db => db.prepare(`DELETE FROM ${table} WHERE file_id = ?`).run(fileId).changes);
    for (const listener of this.deleteListeners) {
      listener(table, fileId);
    }
    return removed;
  }

  /**
   * Register a callback run after every delete. Returns an unsubscribe function.
   */
  onDelete(listener: DeleteListener): () => void {
    this.deleteListeners.push(listener);
    return () => {
      const index = this.deleteListeners.indexOf(listener);
      if (index >= 0) this.deleteListeners.splice(index, 1);
    };
  }

  /**
   * Most frequent non-empty values of a category column, highest count first.
   */
  countByCategory(table: MediaTable, category: string, topN: number): Map<string, number> {
    if (!isCategoryField(category)) {
      throw new ValidationError(`Invalid category: ${category}`, 'category');
    }
    const column: CategoryField = category;
    const rows = this.run(db =>
      db
        .prepare<[number], { value: string; count: number }>(
          `SELECT ${column} AS value, COUNT(*) AS count FROM ${table}
           WHERE ${column} IS NOT NULL AND ${column} != ''
           GROUP BY ${column}
           ORDER BY count DESC, value ASC
           LIMIT ?`
        )
        .all(topN)
    );
    return new Map(rows.map(row => [row.value, row.count]));
  }

  generateUniqueId(table: MediaTable, idColumn: MediaIdColumn = 'file_id'): string {
    return this.run(db => {
      const lookup = db.prepare<[string], { found: number }>(`SELECT 1 AS found FROM ${table} WHERE ${idColumn} = ? LIMIT 1`);
      return uniqueToken(token => lookup.get(token) !== undefined, this.generate);
    });
  }

  get(table: MediaTable, fileId: string): MediaAsset | null {
    const row = this.run(db => db.prepare<[string], AssetRow>(`SELECT ${FIELD_LIST} FROM ${table} WHERE file_id = ?`).get(fileId));
    return row ? mapAssetRow(row) : null;
  }

  /**
   * Rows for the given ids, in the order the ids were given. Missing ids are skipped.
   */
  getMany(table: MediaTable, fileIds: string[]): MediaAsset[] {
    if (fileIds.length === 0) return [];
    const placeholders = fileIds.map(() => '?').join(', ');
    const rows = this.run(db =>
      db.prepare<string[], AssetRow>(`SELECT ${FIELD_LIST} FROM ${table} WHERE file_id IN (${placeholders})`).all(...fileIds)
    );
    const byId = new Map(rows.map(row => [row.file_id, mapAssetRow(row)]));
    return fileIds.flatMap(id => {
      const asset = byId.get(id);
      return asset ? [asset] : [];
    });
  }

  all(table: MediaTable): MediaAsset[] {
    return this.select(table, { sql: '', params: [] });
  }

  exists(table: MediaTable, fileId: string): boolean {
    return this.run(db => existsIn(db, table, fileId));
  }

  /**
   * Rows whose stored path ends in `/<fileName>`.
   */
  findByFileName(table: MediaTable, fileName: string): MediaAsset[] {
    return this.select(table, { sql: `file_path LIKE ? ESCAPE '\\'`, params: [`%/${escapeLike(fileName)}`] });
  }

  /**
   * Rows matching `where`, ordered by file_id. `limit`/`offset` page the result when given.
   */
  select(table: MediaTable, where: WhereClause, page?: { limit: number; offset: number }): MediaAsset[] {
    const paging = page ? ' LIMIT ? OFFSET ?' : '';
    const params: Array<string | number> = page ? [...where.params, page.limit, page.offset] : [...where.params];
    const rows = this.run(db =>
      db.prepare<Array<string | number>, AssetRow>(`SELECT ${FIELD_LIST} FROM ${table}${whereSql(where)} ORDER BY file_id ASC${paging}`).all(...params)
    );
    return rows.map(mapAssetRow);
  }

  count(table: MediaTable, where: WhereClause): number {
    const row = this.run(db => db.prepare<string[], { total: number }>(`SELECT COUNT(*) AS total FROM ${table}${whereSql(where)}`).get(...where.params));
    return row ? row.total : 0;
  }

  fileStatus(fileId: string): FileStatus {
    return this.run(db => {
      const inActive = existsIn(db, ACTIVE_TABLE, fileId);
      const inArchive = existsIn(db, ARCHIVE_TABLE, fileId);
      return { fileId, inActive, inArchive, inBoth: inActive && inArchive };
    });
  }

  /**
   * Copy an active row into the archive table unchanged.
   */
  copyToArchive(fileId: string): CopyToArchiveResult {
    return this.run((db): CopyToArchiveResult => {
      if (existsIn(db, ARCHIVE_TABLE, fileId)) {
        return { success: true, message: 'Already in archive', copied: false };
      }
      const result = db
        .prepare(`INSERT INTO ${ARCHIVE_TABLE} (${FIELD_LIST}) SELECT ${FIELD_LIST} FROM ${ACTIVE_TABLE} WHERE file_id = ?`)
        .run(fileId);
      if (result.changes === 0) {
        return { success: false, error: `Asset ${fileId} not found in ${ACTIVE_TABLE}`, kind: 'not-found' };
      }
      logger.info('Copied asset to archive', { fileId });
      return { success: true, message: 'Copied to archive', copied: true };
    });
  }

  private run<T>(fn: (db: Connection) => T): T {
    return withConnection(this.dbPath, fn);
  }
}

export function withDefaults(fields: Partial<MediaAsset>): MediaAsset {
  const record = emptyAsset();
  for (const field of ASSET_FIELDS) {
    const value = fields[field];
    if (value !== undefined && value !== null) record[field] = value;
  }
  return record;
}

function emptyAsset(): MediaAsset {
  return {
    file_id: UNKNOWN_VALUE,
    file_name: UNKNOWN_VALUE,
    file_path: UNKNOWN_VALUE,
    file_type: UNKNOWN_VALUE,
    file_format: UNKNOWN_VALUE,
    file_resolution: UNKNOWN_VALUE,
    file_duration: UNKNOWN_VALUE,
    shot_size: UNKNOWN_VALUE,
    shot_type: UNKNOWN_VALUE,
    source: UNKNOWN_VALUE,
    source_id: UNKNOWN_VALUE,
    genre: UNKNOWN_VALUE,
    subject: UNKNOWN_VALUE,
    category: UNKNOWN_VALUE,
    lighting: UNKNOWN_VALUE,
    setting: UNKNOWN_VALUE,
    tags: UNKNOWN_VALUE,
    captions: UNKNOWN_VALUE,
  };
}

function mapAssetRow(row: AssetRow): MediaAsset {
  const asset = emptyAsset();
  for (const field of ASSET_FIELDS) {
    asset[field] = row[field] ?? '';
  }
  return asset;
}

function existsIn(db: Connection, table: MediaTable, fileId: string): boolean {
  return db.prepare<[string], { found: number }>(`SELECT 1 AS found FROM ${table} WHERE file_id = ? LIMIT 1`).get(fileId) !== undefined;
}
