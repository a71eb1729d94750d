#!/usr/bin/env node
/**
 * Create the next revision of a job, with its directories, env file and navigation aliases.
 * Usage:
 *   npm run job:make -- --base <name> [--apps adobe,houdini] [--tags "a, b"] [--notes "..."] [--due 2025-12-01] [--revision c]
 */
import * as dotenv from 'dotenv';
import { loadAppConfig } from '../lib/config';
import { errorMessage } from '../lib/errors';
import { createCatalogContext } from '../services/context';
import { cleanJobName, validateBaseName } from '../services/jobs/job-naming';
import { logger } from '../utils/logger';

dotenv.config({ path: '.env.local' });
dotenv.config();

function flagValue(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  return idx !== -1 ? args[idx + 1] : undefined;
}

function printUsage(): void {
  console.log('[job:make] Usage: npm run job:make -- --base <name> [options]');
  console.log('[job:make] Options:');
  console.log('[job:make]   --apps <list>      Comma-separated applications (default: all)');
  console.log('[job:make]   --tags <list>      Comma-separated tags');
  console.log('[job:make]   --notes <text>     Free-form notes');
  console.log('[job:make]   --due <date>       Due date (YYYY-MM-DD)');
  console.log('[job:make]   --revision <rev>   Force a revision instead of the next free one');
  console.log('[job:make]   --check            Only validate the name and show the next revision');
}

async function main() {
  const args = process.argv.slice(2);
  const rawBase = flagValue(args, '--base');
  if (!rawBase) {
    console.error('[job:make] ✗ Error: Missing required argument --base <name>');
    printUsage();
    process.exit(1);
  }

  const base = cleanJobName(rawBase);
  if (base !== rawBase) {
    console.log(`[job:make] Using cleaned base name "${base}"`);
  }

  const check = validateBaseName(base);
  if (!check.valid) {
    console.error(`[job:make] ✗ Invalid base name "${base}": ${check.reason}`);
    process.exit(1);
  }

  try {
    const config = await loadAppConfig();
    logger.setLevel(config.logLevel);
    const { jobs } = createCatalogContext(config);

    if (args.includes('--check')) {
      const next = jobs.nextJobName(base);
      console.log(`[job:make] Next job: ${next ? `${next.jobName} (alias ${next.jobAlias})` : 'n/a'}`);
      return;
    }

    const apps = flagValue(args, '--apps');
    const result = await jobs.createJob({
      base,
      apps: apps ? apps.split(',').map(app => app.trim()).filter(Boolean) : undefined,
      revision: flagValue(args, '--revision'),
      tags: flagValue(args, '--tags'),
      notes: flagValue(args, '--notes'),
      dueDate: flagValue(args, '--due'),
    });

    if (!result.success) {
      console.error(`[job:make] ✗ ${result.error}`);
      process.exit(1);
    }

    console.log(`[job:make] ✓ Created ${result.job.job_name} (alias ${result.job.job_alias})`);
    console.log(`[job:make]   Job path:    ${result.job.job_path_job}`);
    console.log(`[job:make]   Render path: ${result.job.job_path_rnd}`);
    for (const warning of result.warnings) {
      console.warn(`[job:make] ⚠ ${warning}`);
    }
  } catch (error) {
    console.error('[job:make] ✗ Failed:', errorMessage(error));
    process.exit(1);
  }
}

if (require.main === module) {
  void main();
}

export default main;
