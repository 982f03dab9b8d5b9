import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from 'nestjs-pino';
import { ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { PipelineExceptionFilter } from './common/pipeline-exception.filter';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  app.useLogger(app.get(Logger));
  app.useGlobalPipes(new ValidationPipe());
  app.useGlobalFilters(new PipelineExceptionFilter());
  app.enableShutdownHooks();

  const configService = app.get(ConfigService);
  await app.listen(configService.get<number>('PORT', 3000));
}

bootstrap().catch((error: unknown) => {
  console.error(
    `Failed to start: ${error instanceof Error ? error.message : 'Unknown error'}`,
  );
  process.exit(1);
});
