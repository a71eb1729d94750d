import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { LogLevel } from '../utils/logger';

/**
 * Zod schema for the static catalog tables (config/catalog.config.json)
 */
const CatalogSettingsSchema = z.object({
  pageSizes: z.object({
    table: z.number().int().positive().default(100),
    grid: z.number().int().positive().default(30),
    fallback: z.number().int().positive().default(10),
  }),
  topCategories: z.number().int().positive().default(20),
  thumbnails: z.object({
    directory: z.string(),
    generic: z.string(),
    icons: z.record(z.string()),
  }),
  viewable: z.object({
    images: z.array(z.string()),
    videos: z.array(z.string()),
  }),
  ingestCategories: z.object({
    videos: z.array(z.string()),
    images: z.array(z.string()),
  }),
  archiveGroups: z.record(z.array(z.string())),
  transcodeFormats: z.array(z.string()).default([]),
  jobApps: z.record(z.array(z.string())),
  jobEnvTemplate: z.string(),
  jobNavFile: z.string(),
  mediaSubdir: z.string(),
  archiveSubdir: z.string(),
});

export type CatalogSettings = z.infer<typeof CatalogSettingsSchema>;

/**
 * Zod schema for the process environment
 */
const EnvironmentSchema = z.object({
  DEPOT_ALL: z
    .string({ required_error: 'DEPOT_ALL must point at the depot root' })
    .min(1, 'DEPOT_ALL must point at the depot root'),
  CATALOG_DB: z.string().optional(),
  JOBS_DB: z.string().optional(),
  CATALOG_SECRET: z.string().optional(),
  JOBS_NETWORK: z.string().optional(),
  RENDER_NETWORK: z.string().optional(),
  JOBS_LOCAL: z.string().optional(),
  RENDER_LOCAL: z.string().optional(),
  CATALOG_STATE_DIR: z.string().optional(),
  CATALOG_USER: z.string().optional(),
  CATALOG_USER_ID: z.string().optional(),
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().default('127.0.0.1'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export interface OperatorIdentity {
  id: string;
  name: string;
}

/**
 * Everything the services need, built once at startup and passed into constructors.
 */
export interface AppConfig {
  depotRoot: string;
  catalogDbPath: string;
  jobsDbPath: string;
  catalogSecret: string | null;
  mediaRoot: string;
  archiveRoot: string;
  jobsNetworkRoot: string;
  renderNetworkRoot: string;
  jobsLocalRoot: string;
  renderLocalRoot: string;
  stateDir: string;
  envTemplatePath: string;
  navFilePath: string;
  operator: OperatorIdentity;
  server: { host: string; port: number };
  logLevel: LogLevel;
  settings: CatalogSettings;
}

const DEFAULT_CONFIG_DIR = path.join(process.cwd(), 'config');

export interface LoadOptions {
  configDir?: string;
}

/**
 * Configuration manager for loading and validating config files
 */
export class ConfigManager {
  private static configCache: Map<string, unknown> = new Map();

  /**
   * Load and validate a configuration file
   */
  static async load<S extends z.ZodTypeAny>(configName: string, schema: S, options: LoadOptions = {}): Promise<z.infer<S>> {
    const configDir = options.configDir ?? DEFAULT_CONFIG_DIR;
    const configPath = path.join(configDir, `${configName}.json`);

    if (this.configCache.has(configPath)) {
      return schema.parse(this.configCache.get(configPath));
    }

    let content: string;
    try {
      content = await fs.readFile(configPath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new Error(`Configuration file not found: ${configPath}`);
      }
      throw new Error(`Failed to read configuration ${configName}: ${describe(error)}`);
    }

    try {
      const processed = this.replaceEnvVars(JSON.parse(content));
      const validated: z.infer<S> = schema.parse(processed);
      this.configCache.set(configPath, validated);
      return validated;
    } catch (error) {
      if (error instanceof z.ZodError) {
        const errors = error.errors.map(e => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
        throw new Error(`Configuration validation failed for ${configName}:\n${errors}`);
      }
      throw new Error(`Failed to load configuration ${configName}: ${describe(error)}`);
    }
  }

  /**
   * Load the static catalog tables
   */
  static async loadCatalogSettings(options: LoadOptions = {}): Promise<CatalogSettings> {
    return this.load('catalog.config', CatalogSettingsSchema, options);
  }

  /**
   * Clear configuration cache
   */
  static clearCache(): void {
    this.configCache.clear();
  }

  /**
   * Replace ${VAR_NAME} placeholders in config strings with environment values
   */
  static replaceEnvVars(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
    if (typeof value === 'string') {
      return value.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
        const resolved = env[varName];
        if (resolved === undefined) {
          throw new Error(`Environment variable ${varName} is not defined`);
        }
        return resolved;
      });
    }

    if (Array.isArray(value)) {
      return value.map(item => this.replaceEnvVars(item, env));
    }

    if (value !== null && typeof value === 'object') {
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = this.replaceEnvVars(entry, env);
      }
      return result;
    }

    return value;
  }
}

/**
 * Build the application config from the environment and the static settings.
 * Throws when DEPOT_ALL is missing; callers treat that as fatal.
 */
export function buildAppConfig(
  env: NodeJS.ProcessEnv,
  settings: CatalogSettings,
  configDir: string = DEFAULT_CONFIG_DIR
): AppConfig {
  const parsed = EnvironmentSchema.safeParse(env);
  if (!parsed.success) {
    const errors = parsed.error.errors.map(e => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Invalid environment:\n${errors}`);
  }

  const vars = parsed.data;
  const depotRoot = path.resolve(vars.DEPOT_ALL);
  const home = os.homedir();

  return {
    depotRoot,
    catalogDbPath: vars.CATALOG_DB || path.join(depotRoot, 'assetdepot', 'media', 'db', 'media.db'),
    jobsDbPath: vars.JOBS_DB || path.join(depotRoot, 'assetdepot', 'jobs', 'db', 'jobs.db'),
    catalogSecret: vars.CATALOG_SECRET || null,
    mediaRoot: path.join(depotRoot, settings.mediaSubdir),
    archiveRoot: path.join(depotRoot, settings.archiveSubdir),
    jobsNetworkRoot: vars.JOBS_NETWORK || path.join(depotRoot, 'jobs'),
    renderNetworkRoot: vars.RENDER_NETWORK || path.join(depotRoot, 'render'),
    jobsLocalRoot: vars.JOBS_LOCAL || path.join(home, 'jobs'),
    renderLocalRoot: vars.RENDER_LOCAL || path.join(home, 'render'),
    stateDir: vars.CATALOG_STATE_DIR || path.join(home, '.media-depot'),
    envTemplatePath: path.resolve(configDir, '..', settings.jobEnvTemplate),
    navFilePath: path.join(depotRoot, settings.jobNavFile),
    operator: {
      id: vars.CATALOG_USER_ID || '0',
      name: vars.CATALOG_USER || safeUserName(),
    },
    server: { host: vars.HOST, port: vars.PORT },
    logLevel: vars.LOG_LEVEL,
    settings,
  };
}

/**
 * Load static settings from config/ and combine them with process.env
 */
export async function loadAppConfig(options: LoadOptions = {}): Promise<AppConfig> {
  const settings = await ConfigManager.loadCatalogSettings(options);
  return buildAppConfig(process.env, settings, options.configDir);
}

function safeUserName(): string {
  try {
    return os.userInfo().username;
  } catch {
    return 'unknown';
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
