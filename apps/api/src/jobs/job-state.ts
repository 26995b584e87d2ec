import { Job, JobPatch, JobStatus, isTerminal } from './entities/job.entity';

export type JobEvent =
  | { type: 'start' }
  | { type: 'progress'; step: string; percent: number }
  | {
      type: 'complete';
      resultLocation: string;
      localPath: string | null;
      script: string | null;
    }
  | { type: 'fail'; message: string };

export class InvalidJobTransitionError extends Error {
  constructor(
    readonly jobId: string,
    readonly from: JobStatus,
    readonly event: JobEvent['type'],
  ) {
    super(`Job ${jobId} cannot apply "${event}" while ${from}`);
    this.name = 'InvalidJobTransitionError';
  }
}

const ALLOWED_FROM: Record<JobEvent['type'], readonly JobStatus[]> = {
  start: ['queued'],
  progress: ['processing'],
  complete: ['processing'],
  fail: ['queued', 'processing'],
};

export function canApply(status: JobStatus, event: JobEvent['type']): boolean {
  return !isTerminal(status) && ALLOWED_FROM[event].includes(status);
}

/**
 * Computes the fields to write for an event. result_location is only ever
 * written together with `completed` and error_message with `error`.
 */
export function transition(job: Job, event: JobEvent, now: Date = new Date()): JobPatch {
  if (!canApply(job.status, event.type)) {
    throw new InvalidJobTransitionError(job.id, job.status, event.type);
  }
  switch (event.type) {
    case 'start':
      return {
        status: 'processing',
        progress: 'Starting video generation...',
        percent: 0,
        started_at: now,
      };
    case 'progress':
      return {
        progress: event.step,
        percent: clampPercent(event.percent),
      };
    case 'complete':
      if (!event.resultLocation) {
        throw new Error(`Job ${job.id} completed without a result location`);
      }
      return {
        status: 'completed',
        progress: 'Video ready!',
        percent: 100,
        script: event.script,
        result_location: event.resultLocation,
        local_path: event.localPath,
        error_message: null,
        completed_at: now,
      };
    case 'fail':
      return {
        status: 'error',
        progress: `Error: ${event.message}`,
        result_location: null,
        local_path: null,
        error_message: event.message || 'Unknown error',
        completed_at: now,
      };
  }
}

export function newJob(id: string, text: string, voice: string | null, now: Date = new Date()): Job {
  const job = new Job();
  job.id = id;
  job.created_at = now;
  job.status = 'queued';
  job.progress = 'Queued for processing...';
  job.percent = 0;
  job.input_text = text;
  job.voice = voice;
  job.script = null;
  job.result_location = null;
  job.local_path = null;
  job.error_message = null;
  job.started_at = null;
  job.completed_at = null;
  return job;
}

function clampPercent(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(100, Math.max(0, Math.round(value)));
}
