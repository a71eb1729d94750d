import { PathResolver, createPathResolver } from '../../src/lib/paths';
import { AppConfig } from '../lib/config';
import { TokenGenerator } from '../lib/unique-id';
import { ArchiveMigrator } from './catalog/archive-migration';
import { AssetDecorator } from './catalog/asset-decorator';
import { CartEditor } from './catalog/cart-editor';
import { CrossTableSync } from './catalog/cross-table-sync';
import { MetadataStore } from './catalog/metadata-store';
import { QueryBuilder } from './catalog/query-builder';
import { CopyProgressRegistry } from './ingest/copy-progress';
import { IngestionQueue } from './ingest/ingestion-queue';
import { DirectorySync, RsyncDirectorySync } from './jobs/directory-sync';
import { FileSystemJobScaffolder, JobScaffolder } from './jobs/job-scaffold';
import { JobRegistry } from './jobs/job-registry';
import { FfmpegMediaToolkit, MediaToolkit } from './media/media-toolkit';
import { JsonFileSessionStore, SessionStore, removeFromAllCarts } from './session/session-store';

export interface CatalogContext {
  config: AppConfig;
  resolver: PathResolver;
  store: MetadataStore;
  decorator: AssetDecorator;
  queryBuilder: QueryBuilder;
  crossTableSync: CrossTableSync;
  cartEditor: CartEditor;
  sessions: SessionStore;
  progress: CopyProgressRegistry;
  toolkit: MediaToolkit;
  jobs: JobRegistry;
  migrator: ArchiveMigrator;
  ingestQueue(sessionId: string): IngestionQueue;
}

/** Collaborators tests replace with in-process fakes. */
export interface ContextOverrides {
  sessions?: SessionStore;
  toolkit?: MediaToolkit;
  scaffolder?: JobScaffolder;
  directorySync?: DirectorySync;
  now?: () => Date;
  generateToken?: TokenGenerator;
}

/**
 * Build every service from one AppConfig and create missing tables.
 */
export function createCatalogContext(config: AppConfig, overrides: ContextOverrides = {}): CatalogContext {
  const { settings } = config;
  const resolver = createPathResolver(config.depotRoot);
  const store = new MetadataStore({ dbPath: config.catalogDbPath, generateToken: overrides.generateToken });
  const decorator = new AssetDecorator(resolver, settings.thumbnails, settings.viewable);
  const crossTableSync = new CrossTableSync(store);
  const sessions = overrides.sessions ?? new JsonFileSessionStore(config.stateDir);
  const progress = new CopyProgressRegistry();
  const toolkit = overrides.toolkit ?? new FfmpegMediaToolkit();

  store.ensureSchema();
  store.onDelete((table, fileId) => {
    removeFromAllCarts(sessions, table, fileId);
  });

  const jobs = new JobRegistry({
    dbPath: config.jobsDbPath,
    resolver,
    jobsNetworkRoot: config.jobsNetworkRoot,
    renderNetworkRoot: config.renderNetworkRoot,
    jobsLocalRoot: config.jobsLocalRoot,
    renderLocalRoot: config.renderLocalRoot,
    apps: settings.jobApps,
    envTemplatePath: config.envTemplatePath,
    navFilePath: config.navFilePath,
    operator: config.operator,
    scaffolder: overrides.scaffolder ?? new FileSystemJobScaffolder(),
    directorySync: overrides.directorySync ?? new RsyncDirectorySync(),
    now: overrides.now,
    generateToken: overrides.generateToken,
  });
  jobs.ensureSchema();

  return {
    config,
    resolver,
    store,
    decorator,
    queryBuilder: new QueryBuilder(store, decorator, settings.pageSizes),
    crossTableSync,
    cartEditor: new CartEditor(store, crossTableSync, config.catalogSecret),
    sessions,
    progress,
    toolkit,
    jobs,
    migrator: new ArchiveMigrator({
      store,
      toolkit,
      resolver,
      archiveRoot: config.archiveRoot,
      groups: settings.archiveGroups,
      transcodeFormats: settings.transcodeFormats,
    }),
    ingestQueue: sessionId =>
      new IngestionQueue(sessions, sessionId, {
        store,
        toolkit,
        resolver,
        progress,
        mediaRoot: config.mediaRoot,
        categories: settings.ingestCategories,
      }),
  };
}
