import 'reflect-metadata';
import 'dotenv/config';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { loadConfig, missingRequiredKeys } from './config/app-config';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');
  const config = loadConfig();

  const app = await NestFactory.create(AppModule.forRoot(config));
  app.enableCors();
  app.enableShutdownHooks();

  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle('Shortform video API')
      .setDescription('Generate short narrated videos from a topic and poll for the result')
      .setVersion(config.version)
      .build(),
  );
  SwaggerModule.setup('docs', app, document);

  await app.listen(config.port, '0.0.0.0');
  logger.log(`Listening on port ${config.port} (jobs: ${config.jobs.store}, storage: ${config.storage.provider})`);
  const missing = missingRequiredKeys(config);
  if (missing.length > 0) {
    logger.warn(`Missing configuration: ${missing.join(', ')}; /health reports degraded`);
  }
}

bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error(err instanceof Error ? err.stack ?? err.message : String(err));
  process.exit(1);
});
