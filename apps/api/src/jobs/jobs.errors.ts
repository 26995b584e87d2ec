import { ConflictException, NotFoundException, ServiceUnavailableException } from '@nestjs/common';
import { JobStatus } from './entities/job.entity';

export class JobNotFoundException extends NotFoundException {
  constructor(jobId: string) {
    super({ message: 'Job not found', job_id: jobId });
  }
}

export class JobNotReadyException extends ConflictException {
  constructor(jobId: string, status: JobStatus) {
    super({ message: 'Video not ready yet', job_id: jobId, status });
  }
}

export class ArtifactMissingException extends NotFoundException {
  constructor(jobId: string) {
    super({ message: 'Video file not found', job_id: jobId });
  }
}

export class QueueFullException extends ServiceUnavailableException {
  constructor(limit: number) {
    super({ message: `Job queue is full (${limit} waiting), retry later` });
  }
}
