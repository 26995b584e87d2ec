import { DynamicModule, Module, Provider } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { JobStore } from '../config/app-config';
import { PipelineModule } from '../pipeline/pipeline.module';
import { Job } from './entities/job.entity';
import { JobRunner } from './job-runner.service';
import { JobsController } from './jobs.controller';
import { JobsService } from './jobs.service';
import { InMemoryJobRegistry } from './registry/in-memory-job.registry';
import { JOB_REGISTRY } from './registry/job-registry';
import { TypeOrmJobRegistry } from './registry/typeorm-job.registry';

@Module({})
export class JobsModule {
  static register(store: JobStore): DynamicModule {
    const registry: Provider =
      store === 'postgres'
        ? { provide: JOB_REGISTRY, useClass: TypeOrmJobRegistry }
        : { provide: JOB_REGISTRY, useClass: InMemoryJobRegistry };
    return {
      module: JobsModule,
      imports: [
        PipelineModule,
        ...(store === 'postgres' ? [TypeOrmModule.forFeature([Job])] : []),
      ],
      controllers: [JobsController],
      providers: [registry, JobRunner, JobsService],
      exports: [JobsService, JobRunner],
    };
  }
}
