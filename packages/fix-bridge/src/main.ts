import 'reflect-metadata';
import { INestApplication, Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';

const logger = new Logger('Bootstrap');
let app: INestApplication | undefined;

/**
 * Rejections are logged and the process keeps serving; an uncaught exception
 * leaves it in an undefined state, so it exits and the supervisor restarts it.
 */
function setupGlobalErrorHandlers(): void {
  process.on('unhandledRejection', (reason: unknown) => {
    const errorMessage = reason instanceof Error ? reason.message : String(reason);
    const errorStack = reason instanceof Error ? reason.stack : undefined;

    logger.error({
      event: 'unhandledRejection',
      timestamp: new Date().toISOString(),
      error: errorMessage,
      stack: errorStack,
    });
  });

  process.on('uncaughtException', (error: Error, origin: string) => {
    logger.error({
      event: 'uncaughtException',
      timestamp: new Date().toISOString(),
      error: error.message,
      stack: error.stack,
      origin,
    });

    const forceExit = setTimeout(() => process.exit(1), 10000);
    forceExit.unref();
    (app ? app.close() : Promise.resolve())
      .catch((closeError: unknown) => {
        logger.error(`Error while closing after uncaught exception: ${String(closeError)}`);
      })
      .finally(() => process.exit(1));
  });
}

async function bootstrap(): Promise<void> {
  logger.log('Starting fix-bridge...');
  setupGlobalErrorHandlers();

  try {
    app = await NestFactory.create(AppModule);

    app.setGlobalPrefix('api/v1');
    app.useGlobalPipes(
      new ValidationPipe({
        whitelist: true,
        transform: true,
      }),
    );
    // SIGTERM/SIGINT close the app so in-flight dispatches see their modules shut down
    app.enableShutdownHooks();

    const port = parseInt(process.env.PORT ?? '8000', 10);
    await app.listen(port);
    logger.log(`Application listening on port ${port}`);
  } catch (error) {
    logger.error(
      `Error starting application: ${error instanceof Error ? error.message : String(error)}`,
    );
    process.exit(1);
  }
}

void bootstrap();
