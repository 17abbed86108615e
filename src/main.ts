import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { loadEngineConfig, logLevelsFor } from './config/engine.config';

async function bootstrap(): Promise<void> {
  const config = loadEngineConfig();
  const app = await NestFactory.create(AppModule.forRoot(config), {
    logger: logLevelsFor(config.logLevel),
  });

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );
  app.enableShutdownHooks();

  await app.listen(config.port);
  Logger.log(
    `Room booking engine listening on port ${config.port} (${config.storageDriver} storage)`,
    'Bootstrap',
  );
}

bootstrap().catch((error: unknown) => {
  Logger.error(
    error instanceof Error ? error.message : String(error),
    error instanceof Error ? error.stack : undefined,
    'Bootstrap',
  );
  process.exitCode = 1;
});
