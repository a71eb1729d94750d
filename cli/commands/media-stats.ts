#!/usr/bin/env node
/**
 * Print quick statistics about the catalog (row counts, archive overlap, top category values).
 * Usage:
 *   npm run media:stats -- [--table media_proj] [--category genre] [--top 5]
 */
import * as dotenv from 'dotenv';
import { loadAppConfig } from '../lib/config';
import { errorMessage } from '../lib/errors';
import { ACTIVE_TABLE, CategoryFieldSchema, MediaTableSchema } from '../lib/media-types';
import { NO_FILTER } from '../lib/database';
import { createCatalogContext } from '../services/context';

dotenv.config({ path: '.env.local' });
dotenv.config();

function flagValue(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  return idx !== -1 ? args[idx + 1] : undefined;
}

async function main() {
  const args = process.argv.slice(2);
  const table = MediaTableSchema.safeParse(flagValue(args, '--table') ?? ACTIVE_TABLE);
  const category = CategoryFieldSchema.safeParse(flagValue(args, '--category') ?? 'genre');
  const top = Number(flagValue(args, '--top') ?? 5);

  if (!table.success || !category.success || !Number.isInteger(top) || top <= 0) {
    console.error('[media:stats] Invalid arguments');
    console.log('[media:stats] Usage: npm run media:stats -- [--table media_proj|media_arch] [--category genre] [--top 5]');
    process.exit(1);
  }

  try {
    const config = await loadAppConfig();
    const { store } = createCatalogContext(config);

    const active = store.count('media_proj', NO_FILTER);
    const archived = store.count('media_arch', NO_FILTER);
    const counts = store.countByCategory(table.data, category.data, top);
    const topValues = [...counts].map(([value, count]) => `${value} (${count})`);

    console.log('Media Catalog');
    console.log('-------------');
    console.log(`Depot root: ${config.depotRoot}`);
    console.log(`Database:   ${config.catalogDbPath}`);
    console.log(`Active:     ${active}`);
    console.log(`Archive:    ${archived}`);
    console.log(`Top ${category.data} in ${table.data}: ${topValues.length ? topValues.join(', ') : 'n/a'}`);
  } catch (error) {
    console.error('[media:stats] Failed:', errorMessage(error));
    process.exit(1);
  }
}

if (require.main === module) {
  void main();
}

export default main;
