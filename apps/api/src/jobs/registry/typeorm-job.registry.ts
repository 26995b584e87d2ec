import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, LessThan, Repository } from 'typeorm';
import { Job, JobPatch, TERMINAL_STATUSES } from '../entities/job.entity';
import { JobRegistry } from './job-registry';

@Injectable()
export class TypeOrmJobRegistry implements JobRegistry {
  constructor(
    @InjectRepository(Job)
    private jobRepo: Repository<Job>,
  ) {}

  async insert(job: Job): Promise<void> {
    await this.jobRepo.insert(job);
  }

  async get(id: string): Promise<Job | null> {
    return this.jobRepo.findOne({ where: { id } });
  }

  async list(): Promise<Job[]> {
    return this.jobRepo.find({ order: { created_at: 'DESC' } });
  }

  async update(id: string, patch: JobPatch): Promise<Job | null> {
    const result = await this.jobRepo.update(id, patch);
    if (!result.affected) return null;
    return this.get(id);
  }

  async remove(id: string): Promise<boolean> {
    const result = await this.jobRepo.delete(id);
    return Boolean(result.affected);
  }

  async removeFinishedBefore(cutoff: Date): Promise<Job[]> {
    const expired = await this.jobRepo.find({
      where: { status: In([...TERMINAL_STATUSES]), completed_at: LessThan(cutoff) },
    });
    if (expired.length > 0) {
      await this.jobRepo.delete(expired.map((job) => job.id));
    }
    return expired;
  }
}
