#!/usr/bin/env node
/**
 * Cart selection and session store tests
 */

import { afterEach, beforeEach, test } from 'node:test';
import assert from 'node:assert/strict';
import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import { ValidationError } from '../cli/lib/errors';
import { CartSelection } from '../cli/services/session/cart';
import { InMemorySessionStore, JsonFileSessionStore, removeFromAllCarts } from '../cli/services/session/session-store';

let stateDir: string;

beforeEach(async () => {
  stateDir = await fs.mkdtemp(path.join(os.tmpdir(), 'cart-test-'));
});

afterEach(async () => {
  await fs.remove(stateDir);
});

test('add counts only new ids and tables stay separate', () => {
  const cart = new CartSelection();
  assert.strictEqual(cart.add('media_proj', ['a', 'b', 'a']), 2);
  assert.strictEqual(cart.add('media_proj', ['b', 'c']), 1);
  assert.strictEqual(cart.count('media_proj'), 3);
  assert.strictEqual(cart.count('media_arch'), 0);
  assert.ok(cart.has('media_proj', 'c'));
  assert.ok(!cart.has('media_arch', 'c'));
});

test('remove and clear', () => {
  const cart = new CartSelection({ media_arch: ['x', 'y'] });
  assert.strictEqual(cart.remove('media_arch', ['x', 'missing']), 1);
  assert.deepStrictEqual(cart.get('media_arch'), ['y']);
  cart.clear('media_arch');
  assert.deepStrictEqual(cart.get('media_arch'), []);
});

test('toJSON round trips through the constructor', () => {
  const cart = new CartSelection();
  cart.add('media_proj', ['a']);
  cart.add('media_arch', ['b', 'c']);
  assert.deepStrictEqual(new CartSelection(cart.toJSON()).toJSON(), { media_proj: ['a'], media_arch: ['b', 'c'] });
});

test('sessions are isolated from each other', () => {
  const sessions = new InMemorySessionStore();
  sessions.get('alice').cart.add('media_proj', ['a']);
  assert.strictEqual(sessions.get('bob').cart.count('media_proj'), 0);
  assert.strictEqual(sessions.get('alice').cart.count('media_proj'), 1);
  assert.deepStrictEqual(sessions.ids(), ['alice', 'bob']);
});

test('session ids are validated', () => {
  const sessions = new InMemorySessionStore();
  assert.throws(() => sessions.get('../etc'), ValidationError);
  assert.throws(() => sessions.get(''), /Invalid session id/);
});

test('json file store persists carts across instances', () => {
  const first = new JsonFileSessionStore(stateDir);
  const state = first.get('local');
  state.cart.add('media_arch', ['k1', 'k2']);
  first.put('local', state);

  const second = new JsonFileSessionStore(stateDir);
  assert.deepStrictEqual(second.ids(), ['local']);
  assert.deepStrictEqual(second.get('local').cart.get('media_arch'), ['k1', 'k2']);
});

test('json file store drops queued items whose source disappeared', async () => {
  const source = path.join(stateDir, 'incoming', 'a.mp4');
  await fs.outputFile(source, 'x');
  const first = new JsonFileSessionStore(stateDir);
  const state = first.get('local');
  const base = { destPath: '/dest/a.mp4', category: 'videos' as const, errorMessage: null, metadataCache: null, fileId: null, thumbnailPath: null, copyId: null, addedAt: '2025-01-01T00:00:00.000Z' };
  state.queue.items.push(
    { ...base, sourcePath: '/gone/b.mp4', status: 'Pending' },
    { ...base, sourcePath: source, status: 'Pending' },
    { ...base, sourcePath: '/gone/c.mp4', status: 'Completed' }
  );
  first.put('local', state);

  const reloaded = new JsonFileSessionStore(stateDir).get('local');
  assert.deepStrictEqual(reloaded.queue.items.map(item => item.sourcePath), [source, '/gone/c.mp4']);
  assert.strictEqual(reloaded.queue.cursor, 0);
});

test('unreadable session files start empty', async () => {
  await fs.outputFile(path.join(stateDir, 'session-local.json'), '{not json');
  const state = new JsonFileSessionStore(stateDir).get('local');
  assert.strictEqual(state.cart.count('media_proj'), 0);
  assert.deepStrictEqual(state.queue.items, []);
});

test('removeFromAllCarts touches only carts holding the id', () => {
  const sessions = new InMemorySessionStore();
  sessions.get('one').cart.add('media_proj', ['gone', 'kept']);
  sessions.get('two').cart.add('media_arch', ['gone']);
  sessions.get('three');

  assert.strictEqual(removeFromAllCarts(sessions, 'media_proj', 'gone'), 1);
  assert.deepStrictEqual(sessions.get('one').cart.get('media_proj'), ['kept']);
  assert.deepStrictEqual(sessions.get('two').cart.get('media_arch'), ['gone'], 'other table is untouched');
});
