import { DynamicModule, Module } from '@nestjs/common';
import { TypeOrmModule, TypeOrmModuleOptions } from '@nestjs/typeorm';
import { AppConfig } from './config/app-config';
import { ConfigModule } from './config/config.module';
import { HealthController } from './health/health.controller';
import { Job } from './jobs/entities/job.entity';
import { JobsModule } from './jobs/jobs.module';

export function databaseOptions(config: AppConfig): TypeOrmModuleOptions {
  const { url, host, port, username, password, database } = config.database;
  return url
    ? {
        type: 'postgres' as const,
        url,
        ssl: { rejectUnauthorized: false },
        entities: [Job],
        synchronize: true,
      }
    : {
        type: 'postgres' as const,
        host,
        port,
        username,
        password,
        database,
        entities: [Job],
        synchronize: true,
      };
}

@Module({})
export class AppModule {
  static forRoot(config: AppConfig): DynamicModule {
    const usePostgres = config.jobs.store === 'postgres';
    return {
      module: AppModule,
      imports: [
        ConfigModule.forRoot(config),
        ...(usePostgres ? [TypeOrmModule.forRoot(databaseOptions(config))] : []),
        JobsModule.register(config.jobs.store),
      ],
      controllers: [HealthController],
    };
  }
}
