#!/usr/bin/env node
/**
 * Copy active catalog rows and their files into the archive.
 * Usage:
 *   npm run archive:migrate -- [--dry-run] [--ext mov,mp4]
 */
import * as dotenv from 'dotenv';
import { loadAppConfig } from '../lib/config';
import { errorMessage } from '../lib/errors';
import { createCatalogContext } from '../services/context';
import { logger } from '../utils/logger';

dotenv.config({ path: '.env.local' });
dotenv.config();

async function main() {
  const args = process.argv.slice(2);
  const dryRun = args.includes('--dry-run');
  const extIdx = args.indexOf('--ext');
  const extensions = extIdx !== -1 && args[extIdx + 1]
    ? args[extIdx + 1].split(',').map(ext => ext.trim().replace(/^\./, '')).filter(Boolean)
    : undefined;

  try {
    const config = await loadAppConfig();
    logger.setLevel(config.logLevel);
    const { migrator } = createCatalogContext(config);

    const stats = await migrator.migrate({
      dryRun,
      extensions,
      onProgress: (current, total, fileId) => logger.progress(current, total, fileId),
    });

    const action = dryRun ? '[archive:migrate] (dry-run)' : '[archive:migrate]';
    console.log(`${action} Records:    ${stats.totalRecords}`);
    console.log(`${action} Migrated:   ${stats.copiedRecords}`);
    console.log(`${action} Files:      ${stats.copiedFiles} copied, ${stats.failedCopies} failed`);
    console.log(`${action} Skipped:    ${stats.skippedExisting} already archived, ${stats.skippedExtension} by extension`);
    console.log(`${action} Thumbnails: ${stats.thumbnailsCreated}`);
    for (const error of stats.errors) {
      console.warn(`${action} ⚠ ${error}`);
    }
  } catch (error) {
    console.error('[archive:migrate] Failed:', errorMessage(error));
    process.exit(1);
  }
}

if (require.main === module) {
  void main();
}

export default main;
