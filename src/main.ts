import 'reflect-metadata';
import { ValidationPipe } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { appConfig } from './config/configuration';
import { logger } from './core/logger/logger.config';

async function bootstrap() {
  const pinoLogger = logger();

  try {
    // rawBody keeps the exact bytes for webhook signature checks
    const app = await NestFactory.create(AppModule, {
      logger: false,
      rawBody: true,
    });

    const config = app.get<ConfigType<typeof appConfig>>(appConfig.KEY);

    app.useGlobalPipes(
      new ValidationPipe({
        whitelist: true,
        forbidNonWhitelisted: true,
        transform: true,
      }),
    );

    app.setGlobalPrefix('api');
    app.enableShutdownHooks();

    await app.listen(config.port);

    pinoLogger.info(`Application running on: http://localhost:${config.port}`);
  } catch (error) {
    pinoLogger.error(
      {
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      },
      'Bootstrap failed',
    );
    throw error;
  }
}

bootstrap().catch((error: unknown) => {
  const pinoLogger = logger();
  pinoLogger.error(
    { error: error instanceof Error ? error.message : String(error) },
    'Failed to start application',
  );
  process.exit(1);
});
