import fs from 'fs-extra';
import path from 'path';
import { Job } from './job-types';

export const JOB_ENV_FILE = 'job.env';

export interface EnvFileValues {
  jobName: string;
  jobAlias: string;
  jobYear: string;
  jobPath: string;
  jobRnd: string;
  depotRoot: string;
}

/**
 * Filesystem side of job creation. Each method throws on failure; the registry
 * decides what a failure means.
 */
export interface JobScaffolder {
  createDirectories(pathJob: string, pathRnd: string, apps: Record<string, string[]>): Promise<void>;
  writeEnvFile(pathJob: string, templatePath: string, values: EnvFileValues): Promise<string>;
  writeNavFile(navPath: string, jobs: Job[]): Promise<void>;
}

export class FileSystemJobScaffolder implements JobScaffolder {
  async createDirectories(pathJob: string, pathRnd: string, apps: Record<string, string[]>): Promise<void> {
    await fs.ensureDir(pathJob);
    for (const [app, subdirs] of Object.entries(apps)) {
      await fs.ensureDir(path.join(pathJob, app));
      for (const subdir of subdirs) {
        await fs.ensureDir(path.join(pathJob, app, subdir));
      }
    }
    await fs.ensureDir(pathRnd);
  }

  async writeEnvFile(pathJob: string, templatePath: string, values: EnvFileValues): Promise<string> {
    const template = await fs.readFile(templatePath, 'utf-8');
    const target = path.join(pathJob, JOB_ENV_FILE);
    await fs.outputFile(target, renderEnvTemplate(template, values));
    return target;
  }

  async writeNavFile(navPath: string, jobs: Job[]): Promise<void> {
    await fs.outputFile(navPath, renderNavFile(jobs));
  }
}

/**
 * Substitute `{{TOKEN}}` markers line by line. Unknown tokens are left in place.
 */
export function renderEnvTemplate(template: string, values: EnvFileValues): string {
  const tokens: Record<string, string> = {
    JOB_NAME: values.jobName,
    JOB_ALIAS: values.jobAlias,
    JOB_YEAR: values.jobYear,
    JOB_PATH: values.jobPath,
    JOB_RND: values.jobRnd,
    DEPOT_ALL: values.depotRoot,
  };
  return template
    .split('\n')
    .map(line => line.replace(/\{\{([A-Z_]+)\}\}/g, (marker, name: string) => tokens[name] ?? marker))
    .join('\n');
}

/**
 * Shell aliases that jump into each job and load its environment.
 */
export function renderNavFile(jobs: Job[]): string {
  const lines = ['# job navigation aliases, regenerated on every job creation', ''];
  for (const job of jobs) {
    lines.push(`# ${job.job_name} (${job.job_user_name}, ${job.job_date_created})`);
    lines.push(`alias ${job.job_alias} 'cd ${job.job_path_job}; source ${JOB_ENV_FILE}'`);
  }
  return `${lines.join('\n')}\n`;
}
