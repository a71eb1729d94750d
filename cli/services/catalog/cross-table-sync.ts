import { errorMessage } from '../../lib/errors';
import { MediaTable, isEditableMetadataField, otherTable } from '../../lib/media-types';
import { logger as rootLogger } from '../../utils/logger';
import { MetadataStore } from './metadata-store';

const logger = rootLogger.child('sync');

export interface SyncUpdateResult {
  success: boolean;
  updated: number;
  synced: boolean;
  source: MediaTable;
  target: MediaTable | null;
  error?: string;
  warning?: string;
}

/**
 * Applies a field edit to one table and mirrors it onto the row with the same
 * file_id in the other table. The two updates are separate statements; a
 * failure on the mirror is reported as a warning and nothing is rolled back.
 */
export class CrossTableSync {
  constructor(private readonly store: MetadataStore) {}

  syncUpdate(sourceTable: MediaTable, fileId: string, field: string, value: string): SyncUpdateResult {
    if (!isEditableMetadataField(field)) {
      return { success: false, updated: 0, synced: false, source: sourceTable, target: null, error: `Field not editable: ${field}` };
    }

    let updated: number;
    try {
      updated = this.store.updateField(sourceTable, fileId, field, value);
    } catch (error) {
      return { success: false, updated: 0, synced: false, source: sourceTable, target: null, error: errorMessage(error) };
    }

    const target = otherTable(sourceTable);
    try {
      if (!this.store.exists(target, fileId)) {
        return { success: true, updated, synced: false, source: sourceTable, target: null };
      }
      const mirrored = this.store.updateField(target, fileId, field, value);
      return { success: true, updated, synced: mirrored > 0, source: sourceTable, target };
    } catch (error) {
      const warning = `Sync to ${target} failed: ${errorMessage(error)}`;
      logger.warn(warning, { fileId, field });
      return { success: true, updated, synced: false, source: sourceTable, target, warning };
    }
  }
}
