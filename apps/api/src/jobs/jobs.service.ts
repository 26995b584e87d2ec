import {
  BadRequestException,
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { access, rm } from 'fs/promises';
import { v4 as uuidv4 } from 'uuid';
import { APP_CONFIG, AppConfig } from '../config/app-config';
import { describeError } from '../pipeline/pipeline.errors';
import { generateVideoSchema } from './dto/generate-video.dto';
import { Job } from './entities/job.entity';
import { JobRunner } from './job-runner.service';
import { newJob } from './job-state';
import {
  ArtifactMissingException,
  JobNotFoundException,
  JobNotReadyException,
  QueueFullException,
} from './jobs.errors';
import { JOB_REGISTRY, JobRegistry } from './registry/job-registry';

export type JobArtifact =
  | { kind: 'file'; path: string; filename: string }
  | { kind: 'url'; url: string };

function isRemote(location: string): boolean {
  return /^https?:\/\//i.test(location);
}

@Injectable()
export class JobsService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(JobsService.name);
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(
    @Inject(JOB_REGISTRY) private readonly registry: JobRegistry,
    private readonly runner: JobRunner,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  onModuleInit(): void {
    const { retentionMs, sweepIntervalMs } = this.config.jobs;
    if (retentionMs <= 0) return;
    this.sweepTimer = setInterval(() => {
      this.evictExpired().catch((err: unknown) =>
        this.logger.error(`Eviction sweep failed: ${describeError(err)}`),
      );
    }, sweepIntervalMs);
    this.sweepTimer.unref();
  }

  onModuleDestroy(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  async submit(body: unknown): Promise<Job> {
    const parsed = generateVideoSchema.safeParse(body);
    if (!parsed.success) {
      throw new BadRequestException({
        message: parsed.error.issues[0]?.message ?? 'Invalid request body',
      });
    }
    if (!this.runner.reserve()) {
      throw new QueueFullException(this.config.jobs.queueLimit);
    }

    const { text, voice } = parsed.data;
    const job = newJob(uuidv4(), text, voice ?? null);
    try {
      await this.registry.insert(job);
    } finally {
      this.runner.release();
    }
    this.logger.log(`[${job.id}] Queued (${text.length} chars)`);

    // The worker's first write is asynchronous; the record returned here is still queued.
    this.runner.dispatch({ id: job.id, text, voice: job.voice });
    return job;
  }

  async getStatus(id: string): Promise<Job> {
    const job = await this.registry.get(id);
    if (!job) {
      throw new JobNotFoundException(id);
    }
    return job;
  }

  async getResult(id: string): Promise<JobArtifact> {
    const job = await this.getStatus(id);
    if (job.status !== 'completed' || !job.result_location) {
      throw new JobNotReadyException(id, job.status);
    }
    if (isRemote(job.result_location)) {
      return { kind: 'url', url: job.result_location };
    }
    try {
      await access(job.result_location);
    } catch {
      throw new ArtifactMissingException(id);
    }
    return { kind: 'file', path: job.result_location, filename: `video_${id}.mp4` };
  }

  async list(): Promise<Job[]> {
    return this.registry.list();
  }

  async cleanup(id: string): Promise<void> {
    const job = await this.getStatus(id);
    this.runner.cancel(id);
    if (!(await this.registry.remove(id))) {
      throw new JobNotFoundException(id);
    }
    await this.removeArtifact(job);
    this.logger.log(`[${id}] Cleaned up`);
  }

  /** Removes finished jobs older than the retention window; returns how many went. */
  async evictExpired(now: Date = new Date()): Promise<number> {
    const { retentionMs } = this.config.jobs;
    if (retentionMs <= 0) return 0;
    const removed = await this.registry.removeFinishedBefore(new Date(now.getTime() - retentionMs));
    for (const job of removed) {
      await this.removeArtifact(job);
    }
    if (removed.length > 0) {
      this.logger.log(`Evicted ${removed.length} finished job(s)`);
    }
    return removed.length;
  }

  private async removeArtifact(job: Job): Promise<void> {
    if (job.local_path) {
      await rm(job.local_path, { force: true });
    }
  }
}
