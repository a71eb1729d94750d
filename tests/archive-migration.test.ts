#!/usr/bin/env node
/**
 * Archive migration tests
 */

import { afterEach, beforeEach, test } from 'node:test';
import assert from 'node:assert/strict';
import path from 'path';
import fs from 'fs-extra';
import { CatalogContext } from '../cli/services/context';
import { FakeMediaToolkit, TempDepot, createTempDepot, createTestContext, writeFile } from './helpers/depot-fixture';

let depot: TempDepot;
let toolkit: FakeMediaToolkit;
let context: CatalogContext;
let archiveRoot: string;

beforeEach(async () => {
  depot = await createTempDepot();
  toolkit = new FakeMediaToolkit();
  context = createTestContext(depot, { toolkit });
  archiveRoot = depot.config.archiveRoot;

  await writeFile(path.join(depot.root, 'src', 'clip one.mov'));
  await writeFile(path.join(depot.root, 'src', 'pic.png'), 'png-bytes');
  await writeFile(path.join(depot.root, 'src', 'file.xyz'));

  const { store } = context;
  store.insert('media_proj', { file_id: 'arch1', file_path: '$DEPOT_ALL/src/pic.png', file_type: 'png' });
  store.insert('media_arch', { file_id: 'arch1', file_path: '$DEPOT_ALL/elsewhere/pic.png', file_type: 'png' });
  store.insert('media_proj', { file_id: 'gone1', file_path: '$DEPOT_ALL/src/gone.mp4', file_type: 'mp4' });
  store.insert('media_proj', { file_id: 'img1', file_path: '$DEPOT_ALL/src/pic.png', file_type: 'png', subject: 'still' });
  store.insert('media_proj', { file_id: 'mov1', file_path: '$DEPOT_ALL/src/clip one.mov', file_type: 'mov', subject: 'harbor' });
  store.insert('media_proj', { file_id: 'xyz1', file_path: '$DEPOT_ALL/src/file.xyz', file_type: 'xyz' });
});

afterEach(async () => {
  await depot.cleanup();
});

test('groupFor maps extensions to archive folders', () => {
  assert.strictEqual(context.migrator.groupFor('MOV'), 'videos');
  assert.strictEqual(context.migrator.groupFor('exr'), 'images');
  assert.strictEqual(context.migrator.groupFor('xyz'), null);
});

test('migrate copies, transcodes and records every outcome', async () => {
  const progress: string[] = [];
  const stats = await context.migrator.migrate({ onProgress: (current, total, fileId) => progress.push(`${current}/${total}:${fileId}`) });

  assert.deepStrictEqual(progress, ['1/5:arch1', '2/5:gone1', '3/5:img1', '4/5:mov1', '5/5:xyz1']);
  assert.strictEqual(stats.totalRecords, 5);
  assert.strictEqual(stats.skippedExisting, 1);
  assert.strictEqual(stats.skippedExtension, 1);
  assert.strictEqual(stats.copiedRecords, 2);
  assert.strictEqual(stats.copiedFiles, 2);
  assert.strictEqual(stats.failedCopies, 1);
  assert.strictEqual(stats.thumbnailsCreated, 1);
  assert.deepStrictEqual(stats.errors, [`gone1: Source file missing: ${path.join(depot.root, 'src', 'gone.mp4')}`]);

  const video = context.store.get('media_arch', 'mov1');
  assert.strictEqual(video?.file_name, 'clip_one.mp4');
  assert.strictEqual(video?.file_type, 'mp4');
  assert.strictEqual(video?.file_path, '$DEPOT_ALL/assetdepot/archive/videos/clip_one.mp4');
  assert.strictEqual(video?.subject, 'harbor');
  assert.deepStrictEqual(toolkit.transcodes, [
    { sourcePath: path.join(depot.root, 'src', 'clip one.mov'), destPath: path.join(archiveRoot, 'videos', 'clip_one.mp4') },
  ]);
  assert.ok(await fs.pathExists(path.join(archiveRoot, 'videos', 'clip_one.jpg')), 'thumbnail written beside the video');

  assert.strictEqual(await fs.readFile(path.join(archiveRoot, 'images', 'pic.png'), 'utf-8'), 'png-bytes');
  assert.strictEqual(context.store.get('media_arch', 'img1')?.file_path, '$DEPOT_ALL/assetdepot/archive/images/pic.png');
  assert.strictEqual(context.store.get('media_arch', 'arch1')?.file_path, '$DEPOT_ALL/elsewhere/pic.png', 'existing archive rows are kept');
});

test('dry run counts without copying or inserting', async () => {
  const stats = await context.migrator.migrate({ dryRun: true });

  assert.strictEqual(stats.copiedRecords, 2);
  assert.strictEqual(stats.copiedFiles, 0);
  assert.strictEqual(stats.failedCopies, 1);
  assert.strictEqual(context.store.exists('media_arch', 'img1'), false);
  assert.strictEqual(await fs.pathExists(archiveRoot), false);
});

test('extension filter limits the run', async () => {
  const stats = await context.migrator.migrate({ extensions: ['PNG'] });

  assert.strictEqual(stats.copiedRecords, 1);
  assert.strictEqual(stats.skippedExtension, 3);
  assert.strictEqual(stats.failedCopies, 0);
  assert.strictEqual(context.store.exists('media_arch', 'img1'), true);
  assert.strictEqual(context.store.exists('media_arch', 'mov1'), false);
});

test('a failed transcode is counted and the batch continues', async () => {
  toolkit.failTranscodes = true;
  const stats = await context.migrator.migrate();

  assert.strictEqual(stats.failedCopies, 2);
  assert.strictEqual(stats.copiedRecords, 1);
  assert.ok(stats.errors.includes(`mov1: Transcode failed for ${path.join(depot.root, 'src', 'clip one.mov')}`));
  assert.strictEqual(context.store.exists('media_arch', 'mov1'), false);
});
