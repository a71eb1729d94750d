import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import { AppConfig, CatalogSettings, ConfigManager, buildAppConfig } from '../../cli/lib/config';
import { TokenGenerator } from '../../cli/lib/unique-id';
import { CatalogContext, ContextOverrides, createCatalogContext } from '../../cli/services/context';
import { DirectorySync, SyncDirection } from '../../cli/services/jobs/directory-sync';
import { EnvFileValues, JobScaffolder } from '../../cli/services/jobs/job-scaffold';
import { Job } from '../../cli/services/jobs/job-types';
import { ImageMetadata, MediaToolkit, VideoMetadata } from '../../cli/services/media/media-toolkit';
import { InMemorySessionStore } from '../../cli/services/session/session-store';

export const CONFIG_DIR = path.join(__dirname, '..', '..', 'config');
export const TEST_SECRET = 'test-secret';

export interface TempDepot {
  root: string;
  config: AppConfig;
  settings: CatalogSettings;
  cleanup(): Promise<void>;
}

export async function loadSettings(): Promise<CatalogSettings> {
  return ConfigManager.loadCatalogSettings({ configDir: CONFIG_DIR });
}

/**
 * Fresh depot under the OS temp dir with databases, job roots and state inside it.
 */
export async function createTempDepot(env: NodeJS.ProcessEnv = {}): Promise<TempDepot> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'media-depot-test-'));
  const settings = await loadSettings();
  const config = buildAppConfig(
    {
      DEPOT_ALL: root,
      CATALOG_SECRET: TEST_SECRET,
      JOBS_LOCAL: path.join(root, 'local', 'jobs'),
      RENDER_LOCAL: path.join(root, 'local', 'render'),
      CATALOG_STATE_DIR: path.join(root, 'state'),
      CATALOG_USER: 'tester',
      CATALOG_USER_ID: '42',
      ...env,
    },
    settings,
    CONFIG_DIR
  );
  return { root, config, settings, cleanup: () => fs.remove(root) };
}

export function createTestContext(depot: TempDepot, overrides: ContextOverrides = {}): CatalogContext {
  return createCatalogContext(depot.config, {
    sessions: new InMemorySessionStore(),
    toolkit: new FakeMediaToolkit(),
    scaffolder: new RecordingScaffolder(),
    directorySync: new FakeDirectorySync(),
    ...overrides,
  });
}

/**
 * Token generator that hands out the given tokens in order, then `zzzzz<n>`.
 */
export function sequenceTokens(tokens: string[]): TokenGenerator {
  let next = 0;
  return () => {
    const token = tokens[next] ?? `zzzzz${next}`;
    next++;
    return token;
  };
}

export async function writeFile(filePath: string, content = 'data'): Promise<string> {
  await fs.outputFile(filePath, content);
  return filePath;
}

/**
 * Media toolkit stand-in: fixed probe results, frames and transcodes written as small files.
 */
export class FakeMediaToolkit implements MediaToolkit {
  video: VideoMetadata = { kind: 'video', resolution: '1920x1080', duration: '0:40', durationSeconds: 40, codec: 'h264' };
  image: ImageMetadata = { kind: 'image', resolution: '800x600', format: 'PNG' };
  failFrames = false;
  failTranscodes = false;
  /** Number of upcoming extract calls that throw. */
  extractFailures = 0;
  readonly frames: Array<{ videoPath: string; offsetSeconds: number; outPath: string }> = [];
  readonly transcodes: Array<{ sourcePath: string; destPath: string }> = [];

  async extractVideo(): Promise<VideoMetadata> {
    if (this.extractFailures > 0) {
      this.extractFailures--;
      throw new Error('metadata extraction failed');
    }
    return { ...this.video };
  }

  async extractImage(): Promise<ImageMetadata> {
    return { ...this.image };
  }

  async captureFrame(videoPath: string, offsetSeconds: number, outPath: string): Promise<void> {
    if (this.failFrames) throw new Error('frame capture failed');
    this.frames.push({ videoPath, offsetSeconds, outPath });
    await fs.outputFile(outPath, 'jpeg');
  }

  async transcode(sourcePath: string, destPath: string): Promise<boolean> {
    if (this.failTranscodes) return false;
    this.transcodes.push({ sourcePath, destPath });
    await fs.outputFile(destPath, 'mp4');
    return true;
  }
}

export class RecordingScaffolder implements JobScaffolder {
  readonly calls: string[] = [];
  failStep: 'directories' | 'env-file' | 'nav-file' | null = null;
  lastEnv: EnvFileValues | null = null;
  lastNavJobs: Job[] = [];

  async createDirectories(pathJob: string): Promise<void> {
    this.calls.push(`directories:${pathJob}`);
    if (this.failStep === 'directories') throw new Error('disk full');
  }

  async writeEnvFile(pathJob: string, _templatePath: string, values: EnvFileValues): Promise<string> {
    this.calls.push(`env-file:${pathJob}`);
    if (this.failStep === 'env-file') throw new Error('template missing');
    this.lastEnv = values;
    return path.join(pathJob, 'job.env');
  }

  async writeNavFile(navPath: string, jobs: Job[]): Promise<void> {
    this.calls.push(`nav-file:${navPath}`);
    if (this.failStep === 'nav-file') throw new Error('read-only');
    this.lastNavJobs = jobs;
  }
}

export class FakeDirectorySync implements DirectorySync {
  readonly calls: Array<{ localPath: string; networkPath: string; direction: SyncDirection }> = [];
  result = true;

  async sync(localPath: string, networkPath: string, direction: SyncDirection): Promise<boolean> {
    this.calls.push({ localPath, networkPath, direction });
    return this.result;
  }
}
