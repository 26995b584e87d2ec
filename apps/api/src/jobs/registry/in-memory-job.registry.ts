import { Injectable } from '@nestjs/common';
import { Job, JobPatch, isTerminal } from '../entities/job.entity';
import { JobRegistry } from './job-registry';

function copy(job: Job): Job {
  return Object.assign(new Job(), job);
}

@Injectable()
export class InMemoryJobRegistry implements JobRegistry {
  private readonly jobs = new Map<string, Job>();

  async insert(job: Job): Promise<void> {
    if (this.jobs.has(job.id)) {
      throw new Error(`Job ${job.id} already exists`);
    }
    this.jobs.set(job.id, copy(job));
  }

  async get(id: string): Promise<Job | null> {
    const job = this.jobs.get(id);
    return job ? copy(job) : null;
  }

  async list(): Promise<Job[]> {
    return [...this.jobs.values()]
      .sort((a, b) => b.created_at.getTime() - a.created_at.getTime())
      .map(copy);
  }

  async update(id: string, patch: JobPatch): Promise<Job | null> {
    const existing = this.jobs.get(id);
    if (!existing) return null;
    const updated = Object.assign(copy(existing), patch);
    this.jobs.set(id, updated);
    return copy(updated);
  }

  async remove(id: string): Promise<boolean> {
    return this.jobs.delete(id);
  }

  async removeFinishedBefore(cutoff: Date): Promise<Job[]> {
    const removed: Job[] = [];
    for (const [id, job] of this.jobs.entries()) {
      if (isTerminal(job.status) && job.completed_at && job.completed_at < cutoff) {
        this.jobs.delete(id);
        removed.push(job);
      }
    }
    return removed;
  }
}
