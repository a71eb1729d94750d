import path from 'path';
import { PathResolver } from '../../../src/lib/paths';
import { OperatorIdentity } from '../../lib/config';
import { Connection, escapeLike, withConnection } from '../../lib/database';
import { ConflictError, Failure, NotFoundError, ValidationError, errorMessage, failure } from '../../lib/errors';
import { TokenGenerator, generateToken, uniqueToken } from '../../lib/unique-id';
import { logger as rootLogger } from '../../utils/logger';
import { DirectorySync, SyncDirection } from './directory-sync';
import { JobScaffolder } from './job-scaffold';
import { createName, formatTags, maxRevision, nextRevision, parseJobName, shortYear, validateBaseName } from './job-naming';
import {
  JOB_FIELDS,
  JOB_TABLE,
  Job,
  JobEditableField,
  JobState,
  JobStepName,
  JobStepResult,
  ProjectSummary,
  isJobEditableField,
} from './job-types';

const logger = rootLogger.child('jobs');

type JobRow = { [K in (typeof JOB_FIELDS)[number]]: string | null };

const FIELD_LIST = JOB_FIELDS.join(', ');
const COLUMNS_SQL = JOB_FIELDS.map(field =>
  field === 'job_id' ? 'job_id TEXT NOT NULL UNIQUE' : field === 'job_name' ? 'job_name TEXT NOT NULL UNIQUE' : `${field} TEXT`
).join(', ');

export interface JobRegistryOptions {
  dbPath: string;
  resolver: PathResolver;
  jobsNetworkRoot: string;
  renderNetworkRoot: string;
  jobsLocalRoot: string;
  renderLocalRoot: string;
  /** Application name -> subdirectories created in every job. */
  apps: Record<string, string[]>;
  envTemplatePath: string;
  navFilePath: string;
  operator: OperatorIdentity;
  scaffolder: JobScaffolder;
  directorySync?: DirectorySync;
  now?: () => Date;
  generateToken?: TokenGenerator;
}

export interface CreateJobInput {
  base: string;
  /** Subset of the configured applications. Defaults to all of them. */
  apps?: string[];
  /** Force a revision instead of taking the next free one. */
  revision?: string;
  notes?: string;
  tags?: string | string[];
  dueDate?: string;
  charges?: [string?, string?, string?];
}

export type CreateJobResult =
  | { success: true; job: Job; steps: JobStepResult[]; warnings: string[] }
  | Failure;

export type JobLookup = { jobName: string } | { jobPath: string };

export interface SyncPaths {
  direction: SyncDirection;
  localPath: string;
  networkPath: string;
  localRndPath: string;
  networkRndPath: string;
}

/**
 * Job rows in the jobs database plus the directory and environment scaffolding
 * created for each job. Scaffolding steps run after the insert and are
 * best-effort: a failure becomes a warning and the row stays.
 */
export class JobRegistry {
  private readonly now: () => Date;
  private readonly generate: TokenGenerator;

  constructor(private readonly options: JobRegistryOptions) {
    this.now = options.now ?? (() => new Date());
    this.generate = options.generateToken ?? (() => generateToken());
  }

  ensureSchema(): void {
    this.run(db => db.exec(`CREATE TABLE IF NOT EXISTS ${JOB_TABLE} (${COLUMNS_SQL})`));
  }

  generateUniqueId(idColumn: 'job_id' = 'job_id'): string {
    return this.run(db => {
      const lookup = db.prepare<[string], { found: number }>(`SELECT 1 AS found FROM ${JOB_TABLE} WHERE ${idColumn} = ? LIMIT 1`);
      return uniqueToken(token => lookup.get(token) !== undefined, this.generate);
    });
  }

  /**
   * Highest existing revision for `{year}_{base}_*`, or '' when there is none.
   */
  latestRevision(base: string, year: string): string {
    const rows = this.run(db =>
      db
        .prepare<[string], { job_name: string }>(`SELECT job_name FROM ${JOB_TABLE} WHERE job_name LIKE ? ESCAPE '\\'`)
        .all(`${year}\\_${escapeLike(base)}\\_%`)
    );
    const revisions = rows.flatMap(row => {
      const parsed = parseJobName(row.job_name);
      return parsed && parsed.base === base && parsed.year === year ? [parsed.revision] : [];
    });
    return maxRevision(revisions);
  }

  /**
   * Name the next job for `base` would get this year.
   */
  nextJobName(base: string): { jobName: string; jobAlias: string; revision: string } | null {
    const year = shortYear(this.now());
    const revision = nextRevision(this.latestRevision(base, year));
    const name = createName(base, revision, year);
    return name ? { ...name, revision } : null;
  }

  async createJob(input: CreateJobInput): Promise<CreateJobResult> {
    let job: Job;
    let apps: Record<string, string[]>;
    try {
      const check = validateBaseName(input.base);
      if (!check.valid) throw new ValidationError(check.reason ?? 'Invalid base name', 'job_base');
      apps = this.selectApps(input.apps);

      const today = this.now();
      const year = shortYear(today);
      const revision = input.revision ?? nextRevision(this.latestRevision(input.base, year));
      const name = createName(input.base, revision, year);
      if (!name) throw new ValidationError(`Invalid revision: ${revision}`, 'revision');
      if (this.exists(name.jobName)) throw new ConflictError(`Job ${name.jobName} already exists`, name.jobName);

      const fullYear = String(today.getFullYear());
      const { resolver, operator } = this.options;
      const stamp = formatDate(today);
      job = {
        job_id: this.generateUniqueId(),
        job_name: name.jobName,
        job_alias: name.jobAlias,
        job_state: 'active',
        job_year: fullYear,
        job_user_id: operator.id,
        job_user_name: operator.name,
        job_edit_user_id: operator.id,
        job_edit_user_name: operator.name,
        job_edit_date: stamp,
        job_notes: input.notes ?? '',
        job_tags: formatTags(input.tags ?? []),
        job_date_created: stamp,
        job_date_due: input.dueDate ?? '',
        job_charge1: input.charges?.[0] ?? '',
        job_charge2: input.charges?.[1] ?? '',
        job_charge3: input.charges?.[2] ?? '',
        job_path_job: resolver.toSymbolic(path.join(this.options.jobsNetworkRoot, fullYear, name.jobName)),
        job_path_rnd: resolver.toSymbolic(path.join(this.options.renderNetworkRoot, fullYear, name.jobName)),
        job_apps: Object.keys(apps).join(','),
      };
      this.insert(job);
    } catch (error) {
      return failure(error);
    }

    logger.info('Created job', { jobName: job.job_name, jobId: job.job_id });
    const steps = await this.scaffold(job, apps);
    const warnings = steps.flatMap(step => (step.success ? [] : [`${step.step}: ${step.error ?? 'failed'}`]));
    return { success: true, job, steps, warnings };
  }

  years(): string[] {
    return this.run(db =>
      db
        .prepare<[], { job_year: string }>(
          `SELECT DISTINCT job_year FROM ${JOB_TABLE} WHERE job_year IS NOT NULL AND job_year != '' ORDER BY job_year DESC`
        )
        .all()
        .map(row => row.job_year)
    );
  }

  projectsForYear(year: string): ProjectSummary[] {
    return this.run(db =>
      db
        .prepare<[string, JobState], { job_name: string; job_path_job: string | null }>(
          `SELECT job_name, job_path_job FROM ${JOB_TABLE} WHERE job_year = ? AND job_state = ? ORDER BY job_name ASC`
        )
        .all(year, 'active')
        .map(row => ({ name: row.job_name, path: this.options.resolver.expand(row.job_path_job ?? '') }))
    );
  }

  appsForProject(jobName: string): string[] {
    const job = this.requireJob({ jobName });
    return job.job_apps
      .split(',')
      .map(app => app.trim())
      .filter(app => app.length > 0);
  }

  subdirsForApp(app: string): string[] {
    const subdirs = this.options.apps[app];
    if (!subdirs) throw new NotFoundError(`Unknown application: ${app}`, 'app');
    return [...subdirs];
  }

  findJob(lookup: JobLookup): Job | null {
    const row = this.run(db => {
      if ('jobName' in lookup) {
        return db.prepare<[string], JobRow>(`SELECT ${FIELD_LIST} FROM ${JOB_TABLE} WHERE job_name = ?`).get(lookup.jobName);
      }
      const symbolic = this.options.resolver.toSymbolic(lookup.jobPath.replace(/\/+$/, ''));
      return db.prepare<[string], JobRow>(`SELECT ${FIELD_LIST} FROM ${JOB_TABLE} WHERE job_path_job = ?`).get(symbolic);
    });
    return row ? mapJobRow(row) : null;
  }

  /** Jobs in the given state, newest name first. */
  listJobs(state: JobState = 'active'): Job[] {
    return this.run(db =>
      db
        .prepare<[JobState], JobRow>(`SELECT ${FIELD_LIST} FROM ${JOB_TABLE} WHERE job_state = ? ORDER BY job_name DESC`)
        .all(state)
        .map(mapJobRow)
    );
  }

  /**
   * Apply dashboard edits. Non-editable fields are ignored; tags are deduplicated.
   */
  updateJob(jobName: string, changes: Record<string, string>): Job {
    this.requireJob({ jobName });
    const updates: Array<[JobEditableField, string]> = [];
    for (const [field, value] of Object.entries(changes)) {
      if (!isJobEditableField(field)) continue;
      updates.push([field, field === 'job_tags' ? formatTags(value) : value]);
    }
    if (updates.length === 0) throw new ValidationError('No editable fields provided');

    const { operator } = this.options;
    const assignments = [...updates.map(([field]) => `${field} = ?`), 'job_edit_user_id = ?', 'job_edit_user_name = ?', 'job_edit_date = ?'];
    const params = [...updates.map(([, value]) => value), operator.id, operator.name, formatDate(this.now()), jobName];
    this.run(db => db.prepare(`UPDATE ${JOB_TABLE} SET ${assignments.join(', ')} WHERE job_name = ?`).run(...params));

    logger.info('Updated job', { jobName, fields: updates.map(([field]) => field) });
    return this.requireJob({ jobName });
  }

  setState(jobName: string, state: JobState): Job {
    this.requireJob({ jobName });
    this.run(db => db.prepare(`UPDATE ${JOB_TABLE} SET job_state = ? WHERE job_name = ?`).run(state, jobName));
    return this.requireJob({ jobName });
  }

  /**
   * Local and network locations of a job and its render directory.
   */
  syncPaths(jobName: string, direction: SyncDirection): SyncPaths {
    const job = this.requireJob({ jobName });
    const { resolver, jobsNetworkRoot, jobsLocalRoot, renderNetworkRoot, renderLocalRoot } = this.options;
    const networkPath = resolver.expand(job.job_path_job);
    const networkRndPath = resolver.expand(job.job_path_rnd);
    return {
      direction,
      networkPath,
      localPath: rebase(networkPath, jobsNetworkRoot, jobsLocalRoot),
      networkRndPath,
      localRndPath: rebase(networkRndPath, renderNetworkRoot, renderLocalRoot),
    };
  }

  /**
   * Mirror the job and render directories in the given direction.
   */
  async syncJob(jobName: string, direction: SyncDirection): Promise<{ success: boolean; paths: SyncPaths }> {
    const paths = this.syncPaths(jobName, direction);
    const sync = this.options.directorySync;
    if (!sync) throw new ValidationError('Directory sync is not configured');
    const jobSynced = await sync.sync(paths.localPath, paths.networkPath, direction);
    const rndSynced = await sync.sync(paths.localRndPath, paths.networkRndPath, direction);
    return { success: jobSynced && rndSynced, paths };
  }

  private async scaffold(job: Job, apps: Record<string, string[]>): Promise<JobStepResult[]> {
    const { resolver, scaffolder } = this.options;
    const pathJob = resolver.expand(job.job_path_job);
    const pathRnd = resolver.expand(job.job_path_rnd);

    return [
      await this.step('directories', () => scaffolder.createDirectories(pathJob, pathRnd, apps)),
      await this.step('env-file', () =>
        scaffolder.writeEnvFile(pathJob, this.options.envTemplatePath, {
          jobName: job.job_name,
          jobAlias: job.job_alias,
          jobYear: job.job_year,
          jobPath: job.job_path_job,
          jobRnd: job.job_path_rnd,
          depotRoot: resolver.depotRoot,
        })
      ),
      await this.step('nav-file', () => scaffolder.writeNavFile(this.options.navFilePath, this.listJobs('active'))),
    ];
  }

  private async step(step: JobStepName, fn: () => Promise<unknown>): Promise<JobStepResult> {
    try {
      await fn();
      return { step, success: true };
    } catch (error) {
      const message = errorMessage(error);
      logger.warn(`Job step ${step} failed`, { error: message });
      return { step, success: false, error: message };
    }
  }

  private selectApps(requested: string[] | undefined): Record<string, string[]> {
    const configured = this.options.apps;
    if (!requested || requested.length === 0) return { ...configured };

    const selected: Record<string, string[]> = {};
    for (const app of requested) {
      const subdirs = configured[app];
      if (!subdirs) throw new ValidationError(`Unknown application: ${app}`, 'apps');
      selected[app] = subdirs;
    }
    return selected;
  }

  private exists(jobName: string): boolean {
    return this.run(db => db.prepare<[string], { found: number }>(`SELECT 1 AS found FROM ${JOB_TABLE} WHERE job_name = ?`).get(jobName) !== undefined);
  }

  private insert(job: Job): void {
    const placeholders = JOB_FIELDS.map(() => '?').join(', ');
    this.run(db => db.prepare(`INSERT INTO ${JOB_TABLE} (${FIELD_LIST}) VALUES (${placeholders})`).run(...JOB_FIELDS.map(field => job[field])));
  }

  private requireJob(lookup: JobLookup): Job {
    const job = this.findJob(lookup);
    if (!job) {
      throw new NotFoundError(`Job not found: ${'jobName' in lookup ? lookup.jobName : lookup.jobPath}`, 'job');
    }
    return job;
  }

  private run<T>(fn: (db: Connection) => T): T {
    return withConnection(this.options.dbPath, fn);
  }
}

function mapJobRow(row: JobRow): Job {
  return {
    job_id: row.job_id ?? '',
    job_name: row.job_name ?? '',
    job_alias: row.job_alias ?? '',
    job_state: row.job_state ?? '',
    job_year: row.job_year ?? '',
    job_user_id: row.job_user_id ?? '',
    job_user_name: row.job_user_name ?? '',
    job_edit_user_id: row.job_edit_user_id ?? '',
    job_edit_user_name: row.job_edit_user_name ?? '',
    job_edit_date: row.job_edit_date ?? '',
    job_notes: row.job_notes ?? '',
    job_tags: row.job_tags ?? '',
    job_date_created: row.job_date_created ?? '',
    job_date_due: row.job_date_due ?? '',
    job_charge1: row.job_charge1 ?? '',
    job_charge2: row.job_charge2 ?? '',
    job_charge3: row.job_charge3 ?? '',
    job_path_job: row.job_path_job ?? '',
    job_path_rnd: row.job_path_rnd ?? '',
    job_apps: row.job_apps ?? '',
  };
}

function rebase(target: string, fromRoot: string, toRoot: string): string {
  const root = fromRoot.replace(/\/+$/, '');
  if (!target.startsWith(`${root}/`)) {
    throw new ValidationError(`Path ${target} is outside ${root}`, 'path');
  }
  return path.join(toRoot, target.slice(root.length + 1));
}

/** `YYYY-MM-DD` in local time. */
export function formatDate(date: Date): string {
  const pad = (value: number) => value.toString().padStart(2, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}
