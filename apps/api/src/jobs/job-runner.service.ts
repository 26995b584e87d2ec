import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import PQueue from 'p-queue';
import { rm } from 'fs/promises';
import { APP_CONFIG, AppConfig } from '../config/app-config';
import { describeError } from '../pipeline/pipeline.errors';
import { PipelineResult, VideoPipeline } from '../pipeline/video-pipeline.service';
import { JobEvent, transition } from './job-state';
import { JOB_REGISTRY, JobRegistry } from './registry/job-registry';

export interface RunnableJob {
  id: string;
  text: string;
  voice: string | null;
}

export interface RunnerStats {
  running: number;
  waiting: number;
  concurrency: number;
  queueLimit: number;
}

/**
 * Worker pool for generation jobs. Each job is written only by the task
 * running it; a job removed from the registry mid-run is aborted and its
 * later writes are dropped.
 */
@Injectable()
export class JobRunner implements OnModuleDestroy {
  private readonly logger = new Logger(JobRunner.name);
  private readonly queue: PQueue;
  private readonly controllers = new Map<string, AbortController>();
  private reserved = 0;

  constructor(
    @Inject(JOB_REGISTRY) private readonly registry: JobRegistry,
    private readonly pipeline: VideoPipeline,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {
    this.queue = new PQueue({ concurrency: config.jobs.maxConcurrent });
  }

  get stats(): RunnerStats {
    return {
      running: this.queue.pending,
      waiting: this.queue.size,
      concurrency: this.config.jobs.maxConcurrent,
      queueLimit: this.config.jobs.queueLimit,
    };
  }

  hasCapacity(): boolean {
    const { queueLimit } = this.config.jobs;
    return queueLimit === 0 || this.waitingWith(this.reserved + 1) <= queueLimit;
  }

  /**
   * Claims room for one more job in the same tick as the capacity check, so
   * submissions racing on their registry insert cannot overfill the queue.
   * Every successful reservation is followed by exactly one `release`.
   */
  reserve(): boolean {
    if (!this.hasCapacity()) return false;
    this.reserved += 1;
    return true;
  }

  release(): void {
    this.reserved = Math.max(0, this.reserved - 1);
  }

  /** Jobs that would be waiting once `incoming` more jobs were added. */
  private waitingWith(incoming: number): number {
    const idle = Math.max(0, this.config.jobs.maxConcurrent - this.queue.pending);
    return this.queue.size + Math.max(0, incoming - idle);
  }

  dispatch(job: RunnableJob): void {
    const controller = new AbortController();
    this.controllers.set(job.id, controller);
    this.queue
      .add(() => this.run(job, controller.signal))
      .catch((err: unknown) =>
        this.logger.error(`[${job.id}] Worker crashed: ${describeError(err)}`),
      );
  }

  /** Aborts a queued or running job. Returns false when nothing was in flight. */
  cancel(jobId: string): boolean {
    const controller = this.controllers.get(jobId);
    if (!controller) return false;
    controller.abort(new Error('Job cancelled'));
    this.controllers.delete(jobId);
    this.logger.log(`[${jobId}] Cancelled`);
    return true;
  }

  /** Resolves once every dispatched job has settled. */
  onIdle(): Promise<void> {
    return this.queue.onIdle();
  }

  onModuleDestroy(): void {
    for (const jobId of [...this.controllers.keys()]) {
      this.cancel(jobId);
    }
    this.queue.clear();
  }

  async run(job: RunnableJob, signal: AbortSignal): Promise<void> {
    if (signal.aborted) return;
    try {
      if (!(await this.apply(job.id, { type: 'start' }))) return;
      this.logger.log(`[${job.id}] Processing`);

      const request = { jobId: job.id, text: job.text, voice: job.voice };
      const result = await this.pipeline.run(request, {
        signal,
        onProgress: async (step, percent) => {
          await this.apply(job.id, { type: 'progress', step, percent });
        },
      });

      if (signal.aborted || !(await this.complete(job.id, result))) {
        await this.discard(job.id, result);
        return;
      }
      this.logger.log(`[${job.id}] Completed: ${result.resultLocation}`);
    } catch (err) {
      if (signal.aborted) {
        this.logger.log(`[${job.id}] Stopped after cancellation`);
        return;
      }
      const message = describeError(err);
      this.logger.error(`[${job.id}] Failed: ${message}`);
      try {
        await this.apply(job.id, { type: 'fail', message });
      } catch (writeErr) {
        this.logger.error(`[${job.id}] Could not record failure: ${describeError(writeErr)}`);
      }
    } finally {
      this.controllers.delete(job.id);
    }
  }

  private complete(jobId: string, result: PipelineResult): Promise<boolean> {
    return this.apply(jobId, {
      type: 'complete',
      resultLocation: result.resultLocation,
      localPath: result.localPath,
      script: result.script,
    });
  }

  /** Applies an event to the stored job; false when the job no longer exists. */
  private async apply(jobId: string, event: JobEvent): Promise<boolean> {
    const current = await this.registry.get(jobId);
    if (!current) return false;
    const updated = await this.registry.update(jobId, transition(current, event));
    return updated !== null;
  }

  private async discard(jobId: string, result: PipelineResult): Promise<void> {
    if (result.localPath) {
      await rm(result.localPath, { force: true });
    }
    this.logger.log(`[${jobId}] Removed while running, result discarded`);
  }
}
