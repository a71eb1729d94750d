import fs from 'fs-extra';
import path from 'path';
import { PathResolver } from '../../../src/lib/paths';
import { CatalogSettings } from '../../lib/config';
import { Failure, ValidationError, errorMessage } from '../../lib/errors';
import {
  ARCHIVE_TABLE,
  AssetField,
  INGEST_EDIT_FIELDS,
  MediaAsset,
  MediaTable,
  READONLY_INGEST_FIELDS,
  TEMPLATE_SKIP_FIELDS,
  extensionOf,
  isAssetField,
} from '../../lib/media-types';
import { logger as rootLogger } from '../../utils/logger';
import { MetadataStore } from '../catalog/metadata-store';
import { MediaToolkit, thumbnailOffset } from '../media/media-toolkit';
import { SessionState, SessionStore } from '../session/session-store';
import { CopyProgressRegistry, copyWithProgress } from './copy-progress';
import { FileCategory, IngestTemplate, QueueItem, QueueState, QueueStats, UndoRecord } from './queue-types';

const logger = rootLogger.child('ingest');

export const REQUIRED_FIELDS: readonly AssetField[] = [...READONLY_INGEST_FIELDS.filter(field => field !== 'file_resolution'), ...INGEST_EDIT_FIELDS];

const DURATION_SECONDS_KEY = 'duration_seconds';

export interface IngestionDeps {
  store: MetadataStore;
  toolkit: MediaToolkit;
  resolver: PathResolver;
  progress: CopyProgressRegistry;
  /** Root under which the videos/images/other folders live. */
  mediaRoot: string;
  categories: CatalogSettings['ingestCategories'];
  /** Table submissions are written to. Defaults to the archive table. */
  table?: MediaTable;
}

export interface AddFilesResult {
  added: number;
  alreadyQueued: number;
  duplicates: number;
  missing: string[];
}

export type SubmitResult =
  | { success: true; fileId: string; record: MediaAsset; nextIndex: number }
  | (Failure & { missing?: string[] });

export type UndoResult =
  | { success: true; fileId: string; table: MediaTable; removedFiles: string[]; warnings?: string[] }
  | Failure;

export interface ProcessOptions {
  operationId?: string;
}

/**
 * Session-scoped ingestion backlog.
 *
 * Items move Pending -> Processing (copied and probed, awaiting metadata)
 * -> Completed on submit. Add-time duplicates and I/O errors are recorded on
 * the item. Every mutation is written back through the session store.
 */
export class IngestionQueue {
  private readonly table: MediaTable;

  constructor(
    private readonly sessions: SessionStore,
    private readonly sessionId: string,
    private readonly deps: IngestionDeps
  ) {
    this.table = deps.table ?? ARCHIVE_TABLE;
  }

  get state(): QueueState {
    return this.session().queue;
  }

  items(): QueueItem[] {
    return this.state.items;
  }

  item(index: number): QueueItem {
    const item = this.state.items[index];
    if (!item) throw new ValidationError(`No queue item at index ${index}`, 'index');
    return item;
  }

  stats(): QueueStats {
    const stats: QueueStats = { total: 0, pending: 0, processing: 0, completed: 0, skipped: 0, duplicate: 0, error: 0 };
    for (const item of this.state.items) {
      stats.total++;
      switch (item.status) {
        case 'Pending':
          stats.pending++;
          break;
        case 'Processing':
          stats.processing++;
          break;
        case 'Completed':
          stats.completed++;
          break;
        case 'Skipped':
          stats.skipped++;
          break;
        case 'Duplicate':
          stats.duplicate++;
          break;
        case 'Error':
          stats.error++;
          break;
      }
    }
    return stats;
  }

  categoryFor(fileName: string): FileCategory {
    const extension = extensionOf(fileName);
    if (this.deps.categories.videos.includes(extension)) return 'videos';
    if (this.deps.categories.images.includes(extension)) return 'images';
    return 'other';
  }

  destinationFor(sourcePath: string): { category: FileCategory; destPath: string } {
    const fileName = path.basename(sourcePath).replace(/ /g, '_');
    const category = this.categoryFor(fileName);
    return { category, destPath: path.join(this.deps.mediaRoot, category, fileName) };
  }

  async addFiles(sourcePaths: string[]): Promise<AddFilesResult> {
    const state = this.state;
    const queued = new Set(state.items.map(item => item.sourcePath));
    const result: AddFilesResult = { added: 0, alreadyQueued: 0, duplicates: 0, missing: [] };

    for (const raw of sourcePaths) {
      const sourcePath = path.resolve(this.deps.resolver.expand(raw));
      if (queued.has(sourcePath)) {
        result.alreadyQueued++;
        continue;
      }
      const stat = await fs.stat(sourcePath).catch(() => null);
      if (!stat || !stat.isFile()) {
        result.missing.push(sourcePath);
        continue;
      }

      const { category, destPath } = this.destinationFor(sourcePath);
      const duplicate = await this.isDuplicate(destPath);
      state.items.push({
        sourcePath,
        destPath,
        category,
        status: duplicate ? 'Duplicate' : 'Pending',
        errorMessage: null,
        metadataCache: null,
        fileId: null,
        thumbnailPath: null,
        copyId: null,
        addedAt: new Date().toISOString(),
      });
      queued.add(sourcePath);
      result.added++;
      if (duplicate) result.duplicates++;
    }

    if (state.cursor < 0) state.cursor = nextPendingIndex(state.items, -1);
    this.persist();
    logger.info('Queued files for ingestion', { sessionId: this.sessionId, ...result, missing: result.missing.length });
    return result;
  }

  async addFolder(folder: string): Promise<AddFilesResult> {
    const root = path.resolve(this.deps.resolver.expand(folder));
    const stat = await fs.stat(root).catch(() => null);
    if (!stat || !stat.isDirectory()) {
      throw new ValidationError(`Not a directory: ${root}`, 'folder');
    }
    return this.addFiles(await listFilesRecursive(root));
  }

  /**
   * Copy the item into the media root, probe it and assign a file id.
   * Failures land on the item as Error; nothing is thrown for I/O problems.
   * Files written by a failed attempt are removed so a retry lands on the same name.
   */
  async process(index: number, options: ProcessOptions = {}): Promise<QueueItem> {
    const item = this.item(index);
    if (item.status !== 'Pending' && item.status !== 'Duplicate') {
      throw new ValidationError(`Item ${index} is ${item.status} and cannot be processed`, 'status');
    }

    item.status = 'Processing';
    item.errorMessage = null;
    item.copyId = options.operationId ?? this.deps.progress.nextId();
    this.persist();

    const written: string[] = [];
    try {
      if (await fs.pathExists(item.destPath)) {
        item.destPath = await uniqueDestination(item.destPath);
      }
      await copyWithProgress(this.deps.progress, item.sourcePath, item.destPath, { operationId: item.copyId });
      written.push(item.destPath);

      if (!item.metadataCache) {
        item.metadataCache = await this.extract(item);
      }
      if (item.category === 'videos') {
        item.thumbnailPath = await this.captureThumbnail(item);
        if (item.thumbnailPath) written.push(item.thumbnailPath);
      }
      if (!item.fileId) {
        item.fileId = this.deps.store.generateUniqueId(this.table);
      }
    } catch (error) {
      item.status = 'Error';
      item.errorMessage = errorMessage(error);
      item.thumbnailPath = null;
      item.destPath = this.destinationFor(item.sourcePath).destPath;
      await removeQuietly(written);
      logger.warn('Ingestion processing failed', { sourcePath: item.sourcePath, error: item.errorMessage });
    }

    this.persist();
    return item;
  }

  /**
   * Process every Pending item. One failure does not stop the others.
   */
  async processAll(): Promise<QueueStats> {
    const pending = this.state.items.flatMap((item, index) => (item.status === 'Pending' ? [index] : []));
    for (const [position, index] of pending.entries()) {
      await this.process(index);
      logger.debug('Processed queue item', { position: position + 1, total: pending.length });
    }
    return this.stats();
  }

  /**
   * Form values for a processed item: category template, then extracted metadata,
   * then the read-only file fields.
   */
  draft(index: number): Partial<MediaAsset> {
    const item = this.item(index);
    if (!item.fileId) {
      throw new ValidationError(`Item ${index} has not been processed`, 'status');
    }

    const draft: Partial<MediaAsset> = {};
    const template = this.state.templates[item.category];
    for (const field of INGEST_EDIT_FIELDS) {
      const value = template[field];
      if (value !== undefined && !TEMPLATE_SKIP_FIELDS.includes(field)) draft[field] = value;
    }
    for (const [key, value] of Object.entries(item.metadataCache ?? {})) {
      if (isAssetField(key)) draft[key] = value;
    }

    const fileName = path.basename(item.destPath);
    draft.file_id = item.fileId;
    draft.file_name = fileName;
    draft.file_path = this.deps.resolver.toSymbolic(item.destPath);
    draft.file_type = extensionOf(fileName);
    return draft;
  }

  submit(index: number, edits: Record<string, string>): SubmitResult {
    const item = this.item(index);
    if (item.status !== 'Processing' || !item.fileId) {
      return { success: false, error: `Item ${index} is ${item.status} and cannot be submitted`, kind: 'validation' };
    }

    const record = this.draft(index);
    for (const field of INGEST_EDIT_FIELDS) {
      const value = edits[field];
      if (value !== undefined) record[field] = value;
    }

    const missing = REQUIRED_FIELDS.filter(field => !(record[field] ?? '').trim());
    if (missing.length > 0) {
      return { success: false, error: `Missing required fields: ${missing.join(', ')}`, kind: 'validation', missing };
    }

    let inserted: MediaAsset;
    try {
      inserted = this.deps.store.insert(this.table, record);
    } catch (error) {
      item.status = 'Error';
      item.errorMessage = errorMessage(error);
      this.persist();
      return { success: false, error: item.errorMessage };
    }

    const state = this.state;
    item.status = 'Completed';
    state.templates[item.category] = templateFrom(inserted);
    state.undoStack.push({
      fileId: inserted.file_id,
      table: this.table,
      sourcePath: item.sourcePath,
      destPath: item.destPath,
      thumbnailPath: item.thumbnailPath,
    });
    state.cursor = nextPendingIndex(state.items, index);
    this.persist();

    logger.info('Submitted asset', { fileId: inserted.file_id, table: this.table });
    return { success: true, fileId: inserted.file_id, record: inserted, nextIndex: state.cursor };
  }

  skip(index: number): QueueItem {
    return this.transition(index, ['Pending', 'Duplicate'], 'Skipped');
  }

  retry(index: number): QueueItem {
    return this.transition(index, ['Error'], 'Pending');
  }

  /**
   * Roll back the most recent submit: delete the row, the copied file and its thumbnail.
   */
  async undo(): Promise<UndoResult> {
    const state = this.state;
    const record: UndoRecord | undefined = state.undoStack.pop();
    if (!record) return { success: false, error: 'Nothing to undo', kind: 'not-found' };

    const warnings: string[] = [];
    this.deps.store.delete(record.table, record.fileId);

    const removedFiles: string[] = [];
    for (const filePath of [record.destPath, record.thumbnailPath]) {
      if (!filePath) continue;
      try {
        if (await fs.pathExists(filePath)) {
          await fs.remove(filePath);
          removedFiles.push(filePath);
        }
      } catch (error) {
        warnings.push(`Could not remove ${filePath}: ${errorMessage(error)}`);
      }
    }

    const item = state.items.find(candidate => candidate.fileId === record.fileId && candidate.status === 'Completed');
    if (item) {
      item.status = 'Pending';
      item.fileId = null;
      item.thumbnailPath = null;
      item.destPath = this.destinationFor(item.sourcePath).destPath;
    }
    state.cursor = nextPendingIndex(state.items, -1);
    this.persist();

    logger.info('Undid asset submission', { fileId: record.fileId, table: record.table });
    return warnings.length > 0
      ? { success: true, fileId: record.fileId, table: record.table, removedFiles, warnings }
      : { success: true, fileId: record.fileId, table: record.table, removedFiles };
  }

  remove(index: number): QueueItem {
    const item = this.item(index);
    const state = this.state;
    state.items.splice(index, 1);
    state.cursor = nextPendingIndex(state.items, -1);
    this.persist();
    return item;
  }

  clearCompleted(): number {
    const state = this.state;
    const before = state.items.length;
    state.items = state.items.filter(item => item.status !== 'Completed');
    state.cursor = nextPendingIndex(state.items, -1);
    this.persist();
    return before - state.items.length;
  }

  clear(): number {
    const state = this.state;
    const removed = state.items.length;
    state.items = [];
    state.cursor = -1;
    this.persist();
    return removed;
  }

  private transition(index: number, from: QueueItem['status'][], to: QueueItem['status']): QueueItem {
    const item = this.item(index);
    if (!from.includes(item.status)) {
      throw new ValidationError(`Item ${index} is ${item.status}; expected ${from.join(' or ')}`, 'status');
    }
    item.status = to;
    if (to === 'Pending') item.errorMessage = null;
    const state = this.state;
    state.cursor = nextPendingIndex(state.items, -1);
    this.persist();
    return item;
  }

  private async isDuplicate(destPath: string): Promise<boolean> {
    if (await fs.pathExists(destPath)) return true;
    return this.deps.store.findByFileName(this.table, path.basename(destPath)).length > 0;
  }

  private async extract(item: QueueItem): Promise<Record<string, string>> {
    if (item.category === 'videos') {
      const meta = await this.deps.toolkit.extractVideo(item.destPath);
      return {
        file_resolution: meta.resolution,
        file_duration: meta.duration,
        file_format: meta.codec,
        [DURATION_SECONDS_KEY]: String(meta.durationSeconds),
      };
    }
    if (item.category === 'images' && extensionOf(item.destPath) !== 'psd') {
      const meta = await this.deps.toolkit.extractImage(item.destPath);
      return { file_resolution: meta.resolution, file_format: meta.format };
    }
    return { file_format: extensionOf(item.destPath).toUpperCase() };
  }

  private async captureThumbnail(item: QueueItem): Promise<string | null> {
    const parsed = path.parse(item.destPath);
    const thumbPath = path.join(parsed.dir, `${parsed.name}.jpg`);
    const seconds = Number(item.metadataCache?.[DURATION_SECONDS_KEY] ?? 0);
    try {
      await this.deps.toolkit.captureFrame(item.destPath, thumbnailOffset(Number.isFinite(seconds) ? seconds : 0), thumbPath);
      return thumbPath;
    } catch (error) {
      logger.warn('Thumbnail capture failed', { destPath: item.destPath, error: errorMessage(error) });
      return null;
    }
  }

  private session(): SessionState {
    return this.sessions.get(this.sessionId);
  }

  private persist(): void {
    this.sessions.put(this.sessionId, this.session());
  }
}

function templateFrom(record: MediaAsset): IngestTemplate {
  const template: IngestTemplate = {};
  for (const field of INGEST_EDIT_FIELDS) {
    template[field] = record[field];
  }
  return template;
}

/**
 * First Pending item after `from`, wrapping to the start. -1 when none remain.
 */
export function nextPendingIndex(items: QueueItem[], from: number): number {
  for (let offset = 1; offset <= items.length; offset++) {
    const index = (from + offset + items.length) % items.length;
    if (items[index].status === 'Pending') return index;
  }
  return -1;
}

async function removeQuietly(filePaths: string[]): Promise<void> {
  for (const filePath of filePaths) {
    try {
      await fs.remove(filePath);
    } catch (error) {
      logger.warn('Could not remove partial ingest file', { filePath, error: errorMessage(error) });
    }
  }
}

async function uniqueDestination(destPath: string): Promise<string> {
  const parsed = path.parse(destPath);
  for (let counter = 1; ; counter++) {
    const candidate = path.join(parsed.dir, `${parsed.name}_${counter}${parsed.ext}`);
    if (!(await fs.pathExists(candidate))) return candidate;
  }
}

async function listFilesRecursive(root: string): Promise<string[]> {
  const files: string[] = [];
  const entries = await fs.readdir(root, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));
  for (const entry of entries) {
    if (entry.name.startsWith('.')) continue;
    const fullPath = path.join(root, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFilesRecursive(fullPath)));
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }
  return files;
}
