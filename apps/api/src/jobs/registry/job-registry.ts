import { Job, JobPatch } from '../entities/job.entity';

export const JOB_REGISTRY = Symbol('JOB_REGISTRY');

/**
 * Owns every job record. Readers get copies; a record is only written by the
 * worker running it, so `update` never has to merge concurrent writes.
 */
export interface JobRegistry {
  insert(job: Job): Promise<void>;
  get(id: string): Promise<Job | null>;
  /** Newest first. */
  list(): Promise<Job[]>;
  /** Resolves to null when the job no longer exists; a removed job is never recreated. */
  update(id: string, patch: JobPatch): Promise<Job | null>;
  remove(id: string): Promise<boolean>;
  /** Removes terminal jobs that finished before `cutoff` and returns them. */
  removeFinishedBefore(cutoff: Date): Promise<Job[]>;
}
