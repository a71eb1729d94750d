import { z } from 'zod';
import { errorMessage } from '../../lib/errors';
import { CommandRunner, runCommand } from '../../utils/cli-executor';
import { logger as rootLogger } from '../../utils/logger';

const logger = rootLogger.child('rsync');

export const SYNC_DIRECTIONS = ['LOCAL_TO_NETWORK', 'NETWORK_TO_LOCAL'] as const;
export type SyncDirection = (typeof SYNC_DIRECTIONS)[number];
export const SyncDirectionSchema = z.enum(SYNC_DIRECTIONS);

export interface DirectorySync {
  sync(localPath: string, networkPath: string, direction: SyncDirection): Promise<boolean>;
}

/**
 * Mirrors a job directory with rsync, newer files winning.
 */
export class RsyncDirectorySync implements DirectorySync {
  constructor(private readonly run: CommandRunner = runCommand) {}

  static buildArgs(localPath: string, networkPath: string, direction: SyncDirection): string[] {
    const [from, to] = direction === 'LOCAL_TO_NETWORK' ? [localPath, networkPath] : [networkPath, localPath];
    return ['-a', '--update', '--mkpath', `${from.replace(/\/+$/, '')}/`, `${to.replace(/\/+$/, '')}/`];
  }

  async sync(localPath: string, networkPath: string, direction: SyncDirection): Promise<boolean> {
    try {
      const result = await this.run('rsync', RsyncDirectorySync.buildArgs(localPath, networkPath, direction));
      logger.info('Directory sync complete', { direction, localPath, networkPath, durationMs: result.durationMs });
      return true;
    } catch (error) {
      logger.warn('Directory sync failed', { direction, error: errorMessage(error) });
      return false;
    }
  }
}
