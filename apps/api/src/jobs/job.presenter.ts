import { Job, JobStatus } from './entities/job.entity';

export interface JobView {
  job_id: string;
  status: JobStatus;
  progress: string;
  percent: number;
  input_text: string;
  voice: string | null;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
  script?: string;
  result_location?: string;
  download_url?: string;
  error_message?: string;
}

export function statusUrl(jobId: string): string {
  return `/job-status/${jobId}`;
}

export function downloadUrl(jobId: string): string {
  return `/download-video/${jobId}`;
}

export function toJobView(job: Job): JobView {
  const view: JobView = {
    job_id: job.id,
    status: job.status,
    progress: job.progress,
    percent: job.percent,
    input_text: job.input_text,
    voice: job.voice,
    created_at: job.created_at.toISOString(),
    started_at: job.started_at?.toISOString() ?? null,
    completed_at: job.completed_at?.toISOString() ?? null,
  };
  if (job.script) view.script = job.script;
  if (job.status === 'completed' && job.result_location) {
    view.result_location = job.result_location;
    view.download_url = downloadUrl(job.id);
  }
  if (job.status === 'error' && job.error_message) {
    view.error_message = job.error_message;
  }
  return view;
}
