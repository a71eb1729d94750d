import { z } from 'zod';

export const JOB_TABLE = 'projects';

export const JOB_STATES = ['active', 'archived', 'deleted'] as const;
export type JobState = (typeof JOB_STATES)[number];
export const JobStateSchema = z.enum(JOB_STATES);

export const JOB_FIELDS = [
  'job_id',
  'job_name',
  'job_alias',
  'job_state',
  'job_year',
  'job_user_id',
  'job_user_name',
  'job_edit_user_id',
  'job_edit_user_name',
  'job_edit_date',
  'job_notes',
  'job_tags',
  'job_date_created',
  'job_date_due',
  'job_charge1',
  'job_charge2',
  'job_charge3',
  'job_path_job',
  'job_path_rnd',
  'job_apps',
] as const;
export type JobField = (typeof JOB_FIELDS)[number];

export type Job = Record<JobField, string>;

/** Fields the dashboard may change after creation. */
export const JOB_EDITABLE_FIELDS = ['job_date_due', 'job_charge1', 'job_charge2', 'job_charge3', 'job_tags', 'job_notes'] as const;
export type JobEditableField = (typeof JOB_EDITABLE_FIELDS)[number];

export function isJobEditableField(value: string): value is JobEditableField {
  return JOB_EDITABLE_FIELDS.some(field => field === value);
}

export interface ProjectSummary {
  name: string;
  path: string;
}

export type JobStepName = 'directories' | 'env-file' | 'nav-file';

export interface JobStepResult {
  step: JobStepName;
  success: boolean;
  error?: string;
}
