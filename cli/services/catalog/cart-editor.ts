import { timingSafeEqual } from 'crypto';
import { AuthorizationError, Failure, ValidationError, failure } from '../../lib/errors';
import { MediaTable, isEditableMetadataField } from '../../lib/media-types';
import { logger as rootLogger } from '../../utils/logger';
import { CrossTableSync, SyncUpdateResult } from './cross-table-sync';
import { MetadataStore } from './metadata-store';

const logger = rootLogger.child('cart');

export interface FieldChange {
  fileId: string;
  field: string;
  value: string;
}

export interface ChangeDetail {
  fileId: string;
  field: string;
  updated: number;
  synced: boolean;
  skipped?: string;
  warning?: string;
}

export type UpdateItemsResult =
  | { success: true; updated: number; synced: number; details: ChangeDetail[]; warnings?: string[] }
  | Failure;

export type PruneItemsResult =
  | { success: true; deleted: number; missing: string[] }
  | Failure;

export const SECRET_NOT_CONFIGURED = 'Database password not configured on server';
export const SECRET_INCORRECT = 'Incorrect password';

/**
 * Bulk edits and deletes over cart selections. Both operations check the shared
 * secret once for the whole batch before touching any row.
 */
export class CartEditor {
  constructor(
    private readonly store: MetadataStore,
    private readonly sync: CrossTableSync,
    private readonly secret: string | null
  ) {}

  updateItems(table: MediaTable, changes: FieldChange[], suppliedSecret: string | undefined): UpdateItemsResult {
    try {
      this.authorize(suppliedSecret);
      if (changes.length === 0) throw new ValidationError('No changes provided');
    } catch (error) {
      return failure(error);
    }

    const details: ChangeDetail[] = [];
    const warnings: string[] = [];
    let updated = 0;
    let synced = 0;

    for (const change of changes) {
      if (!isEditableMetadataField(change.field)) {
        details.push({ fileId: change.fileId, field: change.field, updated: 0, synced: false, skipped: 'field not editable' });
        continue;
      }

      const result: SyncUpdateResult = this.sync.syncUpdate(table, change.fileId, change.field, change.value);
      if (!result.success) {
        details.push({ fileId: change.fileId, field: change.field, updated: 0, synced: false, skipped: result.error });
        warnings.push(`${change.fileId}.${change.field}: ${result.error ?? 'update failed'}`);
        continue;
      }

      updated += result.updated;
      if (result.synced) synced++;
      if (result.warning) warnings.push(result.warning);
      details.push({ fileId: change.fileId, field: change.field, updated: result.updated, synced: result.synced, warning: result.warning });
    }

    logger.info('Applied cart metadata changes', { table, updated, synced });
    return warnings.length > 0
      ? { success: true, updated, synced, details, warnings }
      : { success: true, updated, synced, details };
  }

  pruneItems(table: MediaTable, fileIds: string[], suppliedSecret: string | undefined): PruneItemsResult {
    try {
      this.authorize(suppliedSecret);
      if (fileIds.length === 0) throw new ValidationError('No items selected');

      let deleted = 0;
      const missing: string[] = [];
      for (const fileId of fileIds) {
        const removed = this.store.delete(table, fileId);
        if (removed === 0) missing.push(fileId);
        deleted += removed;
      }
      logger.info('Pruned catalog rows', { table, deleted, missing: missing.length });
      return { success: true, deleted, missing };
    } catch (error) {
      return failure(error);
    }
  }

  private authorize(supplied: string | undefined): void {
    if (!this.secret) throw new AuthorizationError(SECRET_NOT_CONFIGURED);
    if (!supplied || !secretsMatch(supplied, this.secret)) throw new AuthorizationError(SECRET_INCORRECT);
  }
}

function secretsMatch(supplied: string, expected: string): boolean {
  const a = Buffer.from(supplied);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}
