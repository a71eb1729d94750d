#!/usr/bin/env node
/**
 * Start the catalog web API.
 * Usage:
 *   npm run serve -- [--port 3000] [--host 127.0.0.1]
 */
import * as dotenv from 'dotenv';
import { loadAppConfig } from '../lib/config';
import { errorMessage } from '../lib/errors';
import { createCatalogContext } from '../services/context';
import { CatalogServer } from '../services/web/catalog-server';
import { CLIExecutor } from '../utils/cli-executor';
import { logger } from '../utils/logger';

dotenv.config({ path: '.env.local' });
dotenv.config();

const EXTERNAL_TOOLS = ['ffmpeg', 'rsync'];

function flagValue(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  return idx !== -1 ? args[idx + 1] : undefined;
}

async function createServer(args: string[]): Promise<CatalogServer> {
  const config = await loadAppConfig();
  logger.setLevel(config.logLevel);

  const portArg = flagValue(args, '--port');
  const port = portArg ? Number(portArg) : config.server.port;
  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`Invalid port: ${portArg}`);
  }

  return new CatalogServer({
    context: createCatalogContext(config),
    port,
    host: flagValue(args, '--host') ?? config.server.host,
  });
}

async function main() {
  const args = process.argv.slice(2);

  const server = await createServer(args).catch(error => {
    console.error('[serve] ✗ Configuration error:', errorMessage(error));
    process.exit(1);
  });

  const shutdown = async () => {
    console.log('\n[serve] Shutting down...');
    await server.stop();
    process.exit(0);
  };
  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());

  for (const tool of EXTERNAL_TOOLS) {
    if (!(await CLIExecutor.isInstalled(tool))) {
      console.warn(`[serve] ⚠ ${tool} not found on PATH; features that need it will report errors`);
    }
  }

  try {
    await server.start();
  } catch (error) {
    console.error('[serve] ✗ Failed:', errorMessage(error));
    process.exit(1);
  }
}

if (require.main === module) {
  void main();
}

export default main;
