#!/usr/bin/env node
/**
 * Ingestion queue tests: add, process, submit, undo and templates
 */

import { afterEach, beforeEach, test } from 'node:test';
import assert from 'node:assert/strict';
import path from 'path';
import fs from 'fs-extra';
import { ValidationError } from '../cli/lib/errors';
import { CatalogContext } from '../cli/services/context';
import { IngestionQueue, nextPendingIndex } from '../cli/services/ingest/ingestion-queue';
import { QueueItem } from '../cli/services/ingest/queue-types';
import { FakeMediaToolkit, TempDepot, createTempDepot, createTestContext, sequenceTokens, writeFile } from './helpers/depot-fixture';

const FIELDS = {
  shot_size: 'wide',
  shot_type: 'static',
  source: 'studio',
  source_id: 'S-1',
  genre: 'drama',
  subject: 'harbor',
  category: 'b-roll',
  lighting: 'night',
  setting: 'exterior',
  tags: 'boats, fog',
  captions: 'Boats in fog.',
};

let depot: TempDepot;
let toolkit: FakeMediaToolkit;
let context: CatalogContext;
let queue: IngestionQueue;
let incoming: string;
let videosRoot: string;

beforeEach(async () => {
  depot = await createTempDepot();
  toolkit = new FakeMediaToolkit();
  context = createTestContext(depot, { toolkit, generateToken: sequenceTokens(['vidaaa', 'vidbbb', 'vidccc']) });
  queue = context.ingestQueue('local');
  incoming = path.join(depot.root, 'incoming');
  videosRoot = path.join(depot.config.mediaRoot, 'videos');
});

afterEach(async () => {
  await depot.cleanup();
});

test('addFiles categorizes, dedups the queue and reports missing paths', async () => {
  const clip = await writeFile(path.join(incoming, 'my clip.mp4'));
  const photo = await writeFile(path.join(incoming, 'photo.png'));
  const missing = path.join(incoming, 'missing.mov');

  const result = await queue.addFiles([clip, photo, clip, missing]);
  assert.deepStrictEqual(result, { added: 2, alreadyQueued: 1, duplicates: 0, missing: [missing] });

  const [first, second] = queue.items();
  assert.strictEqual(first.category, 'videos');
  assert.strictEqual(first.destPath, path.join(videosRoot, 'my_clip.mp4'));
  assert.strictEqual(first.status, 'Pending');
  assert.strictEqual(second.destPath, path.join(depot.config.mediaRoot, 'images', 'photo.png'));
  assert.strictEqual(queue.state.cursor, 0);

  const again = await queue.addFiles([clip]);
  assert.deepStrictEqual(again, { added: 0, alreadyQueued: 1, duplicates: 0, missing: [] });
});

test('categoryFor falls back to other', () => {
  assert.strictEqual(queue.categoryFor('a.MOV'), 'videos');
  assert.strictEqual(queue.categoryFor('b.psd'), 'images');
  assert.strictEqual(queue.categoryFor('notes.txt'), 'other');
  assert.strictEqual(queue.categoryFor('README'), 'other');
});

test('files already at the destination or in the catalog are flagged Duplicate', async () => {
  await writeFile(path.join(videosRoot, 'a.mp4'));
  context.store.insert('media_arch', { file_id: 'zzzzzz', file_path: '$DEPOT_ALL/assetdepot/media/videos/b.mp4' });
  const a = await writeFile(path.join(incoming, 'a.mp4'));
  const b = await writeFile(path.join(incoming, 'b.mp4'));
  const c = await writeFile(path.join(incoming, 'c.mp4'));

  const result = await queue.addFiles([a, b, c]);
  assert.strictEqual(result.duplicates, 2);
  assert.deepStrictEqual(queue.items().map(item => item.status), ['Duplicate', 'Duplicate', 'Pending']);
  assert.strictEqual(queue.state.cursor, 2);
});

test('processing a duplicate copies under a numbered name', async () => {
  await writeFile(path.join(videosRoot, 'a.mp4'), 'existing');
  const a = await writeFile(path.join(incoming, 'a.mp4'), 'incoming');
  await queue.addFiles([a]);

  const item = await queue.process(0);
  assert.strictEqual(item.status, 'Processing');
  assert.strictEqual(item.destPath, path.join(videosRoot, 'a_1.mp4'));
  assert.strictEqual(await fs.readFile(item.destPath, 'utf-8'), 'incoming');
  assert.strictEqual(await fs.readFile(path.join(videosRoot, 'a.mp4'), 'utf-8'), 'existing');
});

test('processing a video copies it, probes it and captures a thumbnail', async () => {
  const clip = await writeFile(path.join(incoming, 'my clip.mp4'));
  await queue.addFiles([clip]);

  const item = await queue.process(0, { operationId: 'copy_7' });
  const dest = path.join(videosRoot, 'my_clip.mp4');

  assert.strictEqual(item.status, 'Processing');
  assert.strictEqual(item.fileId, 'vidaaa');
  assert.ok(await fs.pathExists(dest), 'file copied into the media root');
  assert.deepStrictEqual(item.metadataCache, { file_resolution: '1920x1080', file_duration: '0:40', file_format: 'h264', duration_seconds: '40' });
  assert.strictEqual(item.thumbnailPath, path.join(videosRoot, 'my_clip.jpg'));
  assert.deepStrictEqual(toolkit.frames, [{ videoPath: dest, offsetSeconds: 10, outPath: path.join(videosRoot, 'my_clip.jpg') }]);
  assert.strictEqual(context.progress.get('copy_7')?.done, true);
});

test('thumbnail failure does not fail processing', async () => {
  toolkit.failFrames = true;
  const clip = await writeFile(path.join(incoming, 'a.mp4'));
  await queue.addFiles([clip]);

  const item = await queue.process(0);
  assert.strictEqual(item.status, 'Processing');
  assert.strictEqual(item.thumbnailPath, null);
});

test('images and other files get their format from the probe or the extension', async () => {
  const png = await writeFile(path.join(incoming, 'a.png'));
  const psd = await writeFile(path.join(incoming, 'b.psd'));
  const txt = await writeFile(path.join(incoming, 'c.txt'));
  await queue.addFiles([png, psd, txt]);

  assert.deepStrictEqual((await queue.process(0)).metadataCache, { file_resolution: '800x600', file_format: 'PNG' });
  assert.deepStrictEqual((await queue.process(1)).metadataCache, { file_format: 'PSD' });
  assert.deepStrictEqual((await queue.process(2)).metadataCache, { file_format: 'TXT' });
});

test('copy failures mark the item as Error and retry resets it', async () => {
  const clip = await writeFile(path.join(incoming, 'a.mp4'));
  await queue.addFiles([clip]);
  await fs.remove(clip);

  const item = await queue.process(0);
  assert.strictEqual(item.status, 'Error');
  assert.match(item.errorMessage ?? '', /ENOENT/);

  const retried = queue.retry(0);
  assert.strictEqual(retried.status, 'Pending');
  assert.strictEqual(retried.errorMessage, null);
});

test('draft fills read-only file fields with a symbolic path', async () => {
  const clip = await writeFile(path.join(incoming, 'a.mp4'));
  await queue.addFiles([clip]);
  assert.throws(() => queue.draft(0), /has not been processed/);
  await queue.process(0);

  assert.deepStrictEqual(queue.draft(0), {
    file_resolution: '1920x1080',
    file_duration: '0:40',
    file_format: 'h264',
    file_id: 'vidaaa',
    file_name: 'a.mp4',
    file_path: '$DEPOT_ALL/assetdepot/media/videos/a.mp4',
    file_type: 'mp4',
  });
});

test('submit with missing fields is rejected and changes nothing', async () => {
  const clip = await writeFile(path.join(incoming, 'a.mp4'));
  const other = await writeFile(path.join(incoming, 'b.mp4'));
  await queue.addFiles([clip, other]);
  await queue.process(0);
  const cursorBefore = queue.state.cursor;
  assert.strictEqual(cursorBefore, 0);

  const result = queue.submit(0, { ...FIELDS, genre: '   ', captions: '' });
  assert.strictEqual(result.success, false);
  if (result.success) return;
  assert.strictEqual(result.kind, 'validation');
  assert.deepStrictEqual(result.missing, ['genre', 'captions']);
  assert.strictEqual(queue.item(0).status, 'Processing');
  assert.strictEqual(context.store.exists('media_arch', 'vidaaa'), false);
  assert.strictEqual(queue.state.cursor, cursorBefore);
  assert.strictEqual(queue.state.undoStack.length, 0);
  assert.deepStrictEqual(queue.state.templates.videos, {});
});

test('a failed process removes the files it wrote so a retry reuses the name', async () => {
  const clip = await writeFile(path.join(incoming, 'a.mp4'));
  await queue.addFiles([clip]);
  toolkit.extractFailures = 1;

  const failed = await queue.process(0);
  assert.strictEqual(failed.status, 'Error');
  assert.strictEqual(failed.errorMessage, 'metadata extraction failed');
  assert.strictEqual(failed.destPath, path.join(videosRoot, 'a.mp4'));
  assert.strictEqual(failed.thumbnailPath, null);
  assert.deepStrictEqual(await fs.readdir(videosRoot), []);

  queue.retry(0);
  const done = await queue.process(0);
  assert.strictEqual(done.status, 'Processing');
  assert.strictEqual(done.destPath, path.join(videosRoot, 'a.mp4'));
  assert.strictEqual(done.thumbnailPath, path.join(videosRoot, 'a.jpg'));
  assert.deepStrictEqual((await fs.readdir(videosRoot)).sort(), ['a.jpg', 'a.mp4']);
});

test('process records a pollable copy id', async () => {
  const clip = await writeFile(path.join(incoming, 'a.mp4'));
  const other = await writeFile(path.join(incoming, 'b.mp4'));
  await queue.addFiles([clip, other]);

  const generated = await queue.process(0);
  assert.match(generated.copyId ?? '', /^copy_\d+$/);
  assert.strictEqual(context.progress.get(generated.copyId ?? '')?.done, true);

  const named = await queue.process(1, { operationId: 'copy_upload_7' });
  assert.strictEqual(named.copyId, 'copy_upload_7');
  assert.strictEqual(context.progress.get('copy_upload_7')?.destination, path.join(videosRoot, 'b.mp4'));
});

test('submit inserts into the archive, stores a template and moves the cursor', async () => {
  const a = await writeFile(path.join(incoming, 'a.mp4'));
  const b = await writeFile(path.join(incoming, 'b.mp4'));
  await queue.addFiles([a, b]);
  await queue.process(0);

  const result = queue.submit(0, FIELDS);
  assert.ok(result.success);
  if (!result.success) return;
  assert.strictEqual(result.fileId, 'vidaaa');
  assert.strictEqual(result.nextIndex, 1);
  assert.strictEqual(result.record.file_path, '$DEPOT_ALL/assetdepot/media/videos/a.mp4');
  assert.strictEqual(result.record.file_resolution, '1920x1080');
  assert.strictEqual(context.store.get('media_arch', 'vidaaa')?.subject, 'harbor');
  assert.strictEqual(queue.item(0).status, 'Completed');
  assert.strictEqual(queue.state.templates.videos.subject, 'harbor');
  assert.strictEqual(queue.state.undoStack.length, 1);

  await queue.process(1);
  const draft = queue.draft(1);
  assert.strictEqual(draft.subject, 'harbor', 'template carried forward');
  assert.strictEqual(draft.captions, 'Boats in fog.');
  assert.strictEqual(draft.file_name, 'b.mp4');
  assert.strictEqual(draft.file_id, 'vidbbb');
});

test('submitting a completed item is refused', async () => {
  const clip = await writeFile(path.join(incoming, 'a.mp4'));
  await queue.addFiles([clip]);
  await queue.process(0);
  assert.ok(queue.submit(0, FIELDS).success);

  const again = queue.submit(0, FIELDS);
  assert.deepStrictEqual(again, { success: false, error: 'Item 0 is Completed and cannot be submitted', kind: 'validation' });
  await assert.rejects(() => queue.process(0), ValidationError);
});

test('undo removes the row, the copy and the thumbnail and requeues the item', async () => {
  const clip = await writeFile(path.join(incoming, 'a.mp4'));
  await queue.addFiles([clip]);
  await queue.process(0);
  queue.submit(0, FIELDS);
  context.sessions.get('local').cart.add('media_arch', ['vidaaa']);
  const dest = path.join(videosRoot, 'a.mp4');
  const thumb = path.join(videosRoot, 'a.jpg');

  const result = await queue.undo();
  assert.deepStrictEqual(result, { success: true, fileId: 'vidaaa', table: 'media_arch', removedFiles: [dest, thumb] });
  assert.strictEqual(context.store.exists('media_arch', 'vidaaa'), false);
  assert.strictEqual(await fs.pathExists(dest), false);
  assert.strictEqual(await fs.pathExists(thumb), false);
  assert.strictEqual(await fs.pathExists(clip), true, 'source is left alone');
  assert.strictEqual(queue.item(0).status, 'Pending');
  assert.strictEqual(queue.item(0).fileId, null);
  assert.strictEqual(queue.state.cursor, 0);
  assert.strictEqual(context.sessions.get('local').cart.has('media_arch', 'vidaaa'), false, 'deleted ids leave every cart');

  assert.deepStrictEqual(await queue.undo(), { success: false, error: 'Nothing to undo', kind: 'not-found' });
});

test('skip, remove and clear', async () => {
  const files = await Promise.all(['a.mp4', 'b.mp4', 'c.mp4'].map(name => writeFile(path.join(incoming, name))));
  await queue.addFiles(files);

  assert.strictEqual(queue.skip(0).status, 'Skipped');
  assert.strictEqual(queue.state.cursor, 1);
  assert.throws(() => queue.skip(0), /expected Pending or Duplicate/);
  assert.throws(() => queue.retry(1), ValidationError);

  assert.strictEqual(queue.remove(1).sourcePath, files[1]);
  assert.deepStrictEqual(queue.items().map(item => path.basename(item.sourcePath)), ['a.mp4', 'c.mp4']);
  assert.throws(() => queue.item(5), /No queue item at index 5/);

  assert.strictEqual(queue.clearCompleted(), 0);
  assert.strictEqual(queue.clear(), 2);
  assert.strictEqual(queue.state.cursor, -1);
});

test('processAll processes pending items and reports stats', async () => {
  const a = await writeFile(path.join(incoming, 'a.mp4'));
  const b = await writeFile(path.join(incoming, 'b.png'));
  await queue.addFiles([a, b]);

  const stats = await queue.processAll();
  assert.deepStrictEqual(stats, { total: 2, pending: 0, processing: 2, completed: 0, skipped: 0, duplicate: 0, error: 0 });
});

test('addFolder walks subdirectories in order and skips dotfiles', async () => {
  await writeFile(path.join(incoming, 'a.mp4'));
  await writeFile(path.join(incoming, '.hidden.mp4'));
  await writeFile(path.join(incoming, 'sub', 'b.png'));

  const result = await queue.addFolder(incoming);
  assert.strictEqual(result.added, 2);
  assert.deepStrictEqual(queue.items().map(item => path.relative(incoming, item.sourcePath)), ['a.mp4', path.join('sub', 'b.png')]);
  await assert.rejects(() => queue.addFolder(path.join(incoming, 'a.mp4')), /Not a directory/);
});

test('nextPendingIndex wraps around and returns -1 when nothing is pending', () => {
  const make = (status: QueueItem['status']): QueueItem => ({
    sourcePath: 's',
    destPath: 'd',
    category: 'other',
    status,
    errorMessage: null,
    metadataCache: null,
    fileId: null,
    thumbnailPath: null,
    copyId: null,
    addedAt: '2025-01-01T00:00:00.000Z',
  });
  const items = [make('Pending'), make('Completed'), make('Pending')];

  assert.strictEqual(nextPendingIndex(items, 0), 2);
  assert.strictEqual(nextPendingIndex(items, 2), 0);
  assert.strictEqual(nextPendingIndex(items, -1), 0);
  assert.strictEqual(nextPendingIndex([make('Skipped')], -1), -1);
  assert.strictEqual(nextPendingIndex([], -1), -1);
});
