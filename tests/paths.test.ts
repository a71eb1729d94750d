#!/usr/bin/env node
/**
 * Depot path resolver tests
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { DEPOT_TOKEN, createPathResolver, hasDepotToken } from '../src/lib/paths';

const resolver = createPathResolver('/mnt/depot/');

test('expand replaces a leading depot token', () => {
  assert.strictEqual(resolver.expand('$DEPOT_ALL/assetdepot/media/videos/a.mp4'), '/mnt/depot/assetdepot/media/videos/a.mp4');
  assert.strictEqual(resolver.expand(DEPOT_TOKEN), '/mnt/depot');
});

test('expand leaves paths without the token unchanged', () => {
  assert.strictEqual(resolver.expand('/other/place/a.mp4'), '/other/place/a.mp4');
  assert.strictEqual(resolver.expand('$DEPOT_ALLX/a.mp4'), '$DEPOT_ALLX/a.mp4', 'token must be a whole segment');
});

test('toSymbolic replaces a leading depot root', () => {
  assert.strictEqual(resolver.toSymbolic('/mnt/depot/jobs/2025/25_logo_a'), '$DEPOT_ALL/jobs/2025/25_logo_a');
  assert.strictEqual(resolver.toSymbolic('/mnt/depot'), '$DEPOT_ALL');
  assert.strictEqual(resolver.toSymbolic('/mnt/depot2/a.mp4'), '/mnt/depot2/a.mp4', 'sibling directory is not inside the depot');
});

test('expand and toSymbolic round trip a stored path', () => {
  const stored = '$DEPOT_ALL/assetdepot/archive/images/b.png';
  assert.strictEqual(resolver.toSymbolic(resolver.expand(stored)), stored);
});

test('toRelative expands first and uses forward slashes', () => {
  assert.strictEqual(resolver.toRelative('$DEPOT_ALL/assetdepot/media/a.jpg', '/mnt/depot/assetdepot'), 'media/a.jpg');
  assert.strictEqual(resolver.depotRelative('/mnt/depot/assetdepot/media/a.jpg'), 'assetdepot/media/a.jpg');
});

test('hasDepotToken and empty roots', () => {
  assert.ok(hasDepotToken('$DEPOT_ALL/x'));
  assert.ok(!hasDepotToken('/x/$DEPOT_ALL'));
  assert.throws(() => createPathResolver(''), /Depot root is not configured/);
});
