#!/usr/bin/env node
/**
 * Configuration loading tests
 */

import { afterEach, test } from 'node:test';
import assert from 'node:assert/strict';
import os from 'os';
import path from 'path';
import { ConfigManager, buildAppConfig } from '../cli/lib/config';
import { CONFIG_DIR, loadSettings } from './helpers/depot-fixture';

afterEach(() => {
  ConfigManager.clearCache();
});

test('catalog settings load from config/catalog.config.json', async () => {
  const settings = await loadSettings();
  assert.deepStrictEqual(settings.pageSizes, { table: 100, grid: 30, fallback: 10 });
  assert.strictEqual(settings.topCategories, 20);
  assert.deepStrictEqual(settings.viewable.videos, ['mp4']);
  assert.deepStrictEqual(settings.jobApps.houdini, ['bgeo', 'hip', 'hrender', 'otl']);
});

test('missing DEPOT_ALL is a fatal configuration error', async () => {
  const settings = await loadSettings();
  assert.throws(() => buildAppConfig({}, settings, CONFIG_DIR), /Invalid environment:\n  - DEPOT_ALL:/);
  assert.throws(() => buildAppConfig({ DEPOT_ALL: '' }, settings, CONFIG_DIR), /DEPOT_ALL must point at the depot root/);
});

test('paths default under the depot root and home directory', async () => {
  const settings = await loadSettings();
  const config = buildAppConfig({ DEPOT_ALL: '/mnt/depot' }, settings, CONFIG_DIR);

  assert.strictEqual(config.depotRoot, '/mnt/depot');
  assert.strictEqual(config.catalogDbPath, '/mnt/depot/assetdepot/media/db/media.db');
  assert.strictEqual(config.jobsDbPath, '/mnt/depot/assetdepot/jobs/db/jobs.db');
  assert.strictEqual(config.mediaRoot, '/mnt/depot/assetdepot/media');
  assert.strictEqual(config.archiveRoot, '/mnt/depot/assetdepot/archive');
  assert.strictEqual(config.jobsNetworkRoot, '/mnt/depot/jobs');
  assert.strictEqual(config.renderNetworkRoot, '/mnt/depot/render');
  assert.strictEqual(config.jobsLocalRoot, path.join(os.homedir(), 'jobs'));
  assert.strictEqual(config.navFilePath, '/mnt/depot/jobs/.job_aliases');
  assert.strictEqual(config.envTemplatePath, path.join(CONFIG_DIR, 'templates', 'job.env.template'));
  assert.strictEqual(config.catalogSecret, null, 'no secret configured');
  assert.deepStrictEqual(config.server, { host: '127.0.0.1', port: 3000 });
  assert.strictEqual(config.logLevel, 'info');
});

test('environment overrides take precedence', async () => {
  const settings = await loadSettings();
  const config = buildAppConfig(
    { DEPOT_ALL: '/mnt/depot', CATALOG_DB: '/tmp/media.db', CATALOG_SECRET: 'test-secret', PORT: '8080', LOG_LEVEL: 'debug', CATALOG_USER: 'ana', CATALOG_USER_ID: '7' },
    settings,
    CONFIG_DIR
  );
  assert.strictEqual(config.catalogDbPath, '/tmp/media.db');
  assert.strictEqual(config.catalogSecret, 'test-secret');
  assert.strictEqual(config.server.port, 8080);
  assert.strictEqual(config.logLevel, 'debug');
  assert.deepStrictEqual(config.operator, { id: '7', name: 'ana' });
});

test('replaceEnvVars substitutes nested placeholders', () => {
  const env = { DEPOT_ALL: '/mnt/depot' };
  assert.deepStrictEqual(ConfigManager.replaceEnvVars({ roots: ['${DEPOT_ALL}/jobs'], n: 3 }, env), { roots: ['/mnt/depot/jobs'], n: 3 });
  assert.throws(() => ConfigManager.replaceEnvVars('${MISSING_VAR}', env), /Environment variable MISSING_VAR is not defined/);
});

test('missing config file is reported with its path', async () => {
  await assert.rejects(
    () => ConfigManager.loadCatalogSettings({ configDir: path.join(CONFIG_DIR, 'nowhere') }),
    /Configuration file not found/
  );
});
