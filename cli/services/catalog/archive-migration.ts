import fs from 'fs-extra';
import path from 'path';
import { PathResolver } from '../../../src/lib/paths';
import { CatalogSettings } from '../../lib/config';
import { errorMessage } from '../../lib/errors';
import { ACTIVE_TABLE, ARCHIVE_TABLE, MediaAsset, MediaTable, extensionOf } from '../../lib/media-types';
import { logger as rootLogger } from '../../utils/logger';
import { MediaToolkit, thumbnailOffset } from '../media/media-toolkit';
import { MetadataStore } from './metadata-store';

const logger = rootLogger.child('archive');

export interface ArchiveMigrationDeps {
  store: MetadataStore;
  toolkit: MediaToolkit;
  resolver: PathResolver;
  archiveRoot: string;
  groups: CatalogSettings['archiveGroups'];
  transcodeFormats: string[];
  sourceTable?: MediaTable;
  targetTable?: MediaTable;
}

export interface MigrationOptions {
  dryRun?: boolean;
  /** Only migrate these extensions. */
  extensions?: string[];
  onProgress?: (current: number, total: number, fileId: string) => void;
}

export interface MigrationStats {
  totalRecords: number;
  skippedExisting: number;
  skippedExtension: number;
  copiedRecords: number;
  copiedFiles: number;
  failedCopies: number;
  thumbnailsCreated: number;
  errors: string[];
}

/**
 * Moves catalog rows from the active table into the archive: copies (or
 * transcodes) each file into the archive tree by extension group, captures a
 * thumbnail for videos and inserts the row with its new path. A failing row is
 * recorded in the stats and the batch carries on.
 */
export class ArchiveMigrator {
  private readonly sourceTable: MediaTable;
  private readonly targetTable: MediaTable;
  private readonly groupByExtension: Map<string, string>;

  constructor(private readonly deps: ArchiveMigrationDeps) {
    this.sourceTable = deps.sourceTable ?? ACTIVE_TABLE;
    this.targetTable = deps.targetTable ?? ARCHIVE_TABLE;
    this.groupByExtension = new Map();
    for (const [group, extensions] of Object.entries(deps.groups)) {
      for (const extension of extensions) this.groupByExtension.set(extension.toLowerCase(), group);
    }
  }

  groupFor(extension: string): string | null {
    return this.groupByExtension.get(extension.toLowerCase()) ?? null;
  }

  async migrate(options: MigrationOptions = {}): Promise<MigrationStats> {
    const stats: MigrationStats = {
      totalRecords: 0,
      skippedExisting: 0,
      skippedExtension: 0,
      copiedRecords: 0,
      copiedFiles: 0,
      failedCopies: 0,
      thumbnailsCreated: 0,
      errors: [],
    };
    const only = options.extensions?.map(extension => extension.toLowerCase());
    const rows = this.deps.store.all(this.sourceTable);

    for (const [index, row] of rows.entries()) {
      stats.totalRecords++;
      options.onProgress?.(index + 1, rows.length, row.file_id);

      if (this.deps.store.exists(this.targetTable, row.file_id)) {
        stats.skippedExisting++;
        continue;
      }

      const extension = extensionOf(row.file_path) || row.file_type.toLowerCase();
      const group = this.groupFor(extension);
      if (!group || (only && !only.includes(extension))) {
        stats.skippedExtension++;
        continue;
      }

      try {
        await this.migrateRow(row, extension, group, stats, options.dryRun ?? false);
      } catch (error) {
        stats.failedCopies++;
        stats.errors.push(`${row.file_id}: ${errorMessage(error)}`);
      }
    }

    logger.info('Archive migration finished', { ...stats, errors: stats.errors.length, dryRun: options.dryRun ?? false });
    return stats;
  }

  private async migrateRow(row: MediaAsset, extension: string, group: string, stats: MigrationStats, dryRun: boolean): Promise<void> {
    const sourcePath = this.deps.resolver.expand(row.file_path);
    if (!(await fs.pathExists(sourcePath))) {
      throw new Error(`Source file missing: ${sourcePath}`);
    }

    const transcode = this.deps.transcodeFormats.includes(extension);
    const baseName = path.basename(sourcePath).replace(/ /g, '_');
    const destName = transcode ? `${path.parse(baseName).name}.mp4` : baseName;
    const destPath = path.join(this.deps.archiveRoot, group, destName);

    if (dryRun) {
      stats.copiedRecords++;
      return;
    }

    if (!(await fs.pathExists(destPath))) {
      if (transcode) {
        const ok = await this.deps.toolkit.transcode(sourcePath, destPath);
        if (!ok) throw new Error(`Transcode failed for ${sourcePath}`);
      } else {
        await fs.copy(sourcePath, destPath, { overwrite: false, errorOnExist: true });
      }
      stats.copiedFiles++;
    }

    if (extensionOf(destName) === 'mp4') {
      await this.ensureThumbnail(destPath, stats);
    }

    this.deps.store.insert(this.targetTable, {
      ...row,
      file_name: destName,
      file_path: this.deps.resolver.toSymbolic(destPath),
      file_type: extensionOf(destName),
    });
    stats.copiedRecords++;
  }

  private async ensureThumbnail(videoPath: string, stats: MigrationStats): Promise<void> {
    const parsed = path.parse(videoPath);
    const thumbPath = path.join(parsed.dir, `${parsed.name}.jpg`);
    if (await fs.pathExists(thumbPath)) return;

    try {
      const meta = await this.deps.toolkit.extractVideo(videoPath);
      await this.deps.toolkit.captureFrame(videoPath, thumbnailOffset(meta.durationSeconds), thumbPath);
      stats.thumbnailsCreated++;
    } catch (error) {
      stats.errors.push(`thumbnail ${videoPath}: ${errorMessage(error)}`);
    }
  }
}
