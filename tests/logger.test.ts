#!/usr/bin/env node
/**
 * Scoped logger tests
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { LogEntry, Logger } from '../cli/utils/logger';

function capture(logger: Logger): Array<{ entry: LogEntry; line: string }> {
  const lines: Array<{ entry: LogEntry; line: string }> = [];
  logger.setSink((entry, line) => lines.push({ entry, line }));
  return lines;
}

test('child loggers tag lines with their scope and share the level', () => {
  const root = new Logger();
  const lines = capture(root);
  const ingest = root.child('ingest');

  ingest.debug('hidden at info');
  ingest.info('queued', { added: 2 });
  root.setLevel('warn');
  ingest.info('hidden at warn');
  root.child('jobs').child('scaffold').warn('step failed', 'disk full');

  assert.strictEqual(lines.length, 2);
  assert.strictEqual(lines[0].entry.scope, 'ingest');
  assert.match(lines[0].line, /^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[INFO\] \[ingest\] queued \{"added":2\}$/);
  assert.strictEqual(lines[1].entry.scope, 'jobs:scaffold');
  assert.match(lines[1].line, /\[WARN\] \[jobs:scaffold\] step failed disk full$/);
});

test('errors are logged by message and the root logger has no scope tag', () => {
  const root = new Logger();
  const lines = capture(root);

  root.error('request failed', new Error('boom'));

  assert.strictEqual(lines.length, 1);
  assert.strictEqual(lines[0].entry.scope, undefined);
  assert.match(lines[0].line, /\] \[ERROR\] request failed \{"error":"boom"\}$/);
});

test('setSink returns the previous sink', () => {
  const root = new Logger();
  const first = capture(root);
  const previous = root.setSink(() => undefined);
  root.info('dropped');
  root.setSink(previous);
  root.info('kept');

  assert.deepStrictEqual(first.map(({ entry }) => entry.message), ['kept']);
});
