#!/usr/bin/env node
/**
 * Cross-table sync tests
 */

import { afterEach, beforeEach, test } from 'node:test';
import assert from 'node:assert/strict';
import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import { CrossTableSync } from '../cli/services/catalog/cross-table-sync';
import { MetadataStore } from '../cli/services/catalog/metadata-store';

let tmpDir: string;
let store: MetadataStore;
let sync: CrossTableSync;

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'cross-table-sync-test-'));
  store = new MetadataStore({ dbPath: path.join(tmpDir, 'media.db') });
  store.ensureSchema();
  sync = new CrossTableSync(store);
});

afterEach(async () => {
  await fs.remove(tmpDir);
});

test('edit is mirrored onto the same id in the other table', () => {
  store.insert('media_proj', { file_id: 'abcdef', subject: 'old' });
  store.insert('media_arch', { file_id: 'abcdef', subject: 'old' });

  const result = sync.syncUpdate('media_proj', 'abcdef', 'subject', 'new');
  assert.deepStrictEqual(result, { success: true, updated: 1, synced: true, source: 'media_proj', target: 'media_arch' });
  assert.strictEqual(store.get('media_arch', 'abcdef')?.subject, 'new');
});

test('mirror is skipped when the other table lacks the id', () => {
  store.insert('media_arch', { file_id: 'abcdef', tags: 'a' });

  const result = sync.syncUpdate('media_arch', 'abcdef', 'tags', 'a, b');
  assert.deepStrictEqual(result, { success: true, updated: 1, synced: false, source: 'media_arch', target: null });
  assert.strictEqual(store.get('media_arch', 'abcdef')?.tags, 'a, b');
  assert.strictEqual(store.exists('media_proj', 'abcdef'), false);
});

test('non-editable fields are refused without touching either table', () => {
  store.insert('media_proj', { file_id: 'abcdef', file_path: '$DEPOT_ALL/a.mp4' });
  store.insert('media_arch', { file_id: 'abcdef', file_path: '$DEPOT_ALL/a.mp4' });

  const result = sync.syncUpdate('media_proj', 'abcdef', 'file_path', '/tmp/x');
  assert.strictEqual(result.success, false);
  assert.strictEqual(result.error, 'Field not editable: file_path');
  assert.strictEqual(store.get('media_proj', 'abcdef')?.file_path, '$DEPOT_ALL/a.mp4');
  assert.strictEqual(store.get('media_arch', 'abcdef')?.file_path, '$DEPOT_ALL/a.mp4');
});

test('missing source row updates nothing but still mirrors', () => {
  store.insert('media_arch', { file_id: 'abcdef', genre: 'drama' });

  const result = sync.syncUpdate('media_proj', 'abcdef', 'genre', 'comedy');
  assert.strictEqual(result.updated, 0);
  assert.strictEqual(result.synced, true);
  assert.strictEqual(store.get('media_arch', 'abcdef')?.genre, 'comedy');
});
