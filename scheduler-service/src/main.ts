import 'reflect-metadata';
import * as dotenv from 'dotenv';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe, Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { EngineExceptionFilter } from './common/engine-exception.filter';
import { errorMessage } from './common/errors';
import { ConfigService } from './config/config.service';

dotenv.config();

async function bootstrap() {
  const logger = new Logger('Bootstrap');

  try {
    const config = new ConfigService();
    const app = await NestFactory.create(AppModule.forRoot(config.storageDriver), {
      logger: config.logLevels,
    });

    app.useGlobalPipes(new ValidationPipe({
      transform: true,
      whitelist: true,
      forbidNonWhitelisted: true,
    }));
    app.useGlobalFilters(new EngineExceptionFilter());
    app.enableShutdownHooks();

    await app.listen(config.port);

    logger.log(`Scheduler service listening on port ${config.port}`);
    logger.log(`Storage driver: ${config.storageDriver}`);
    logger.log(`Environment: ${config.nodeEnv}`);
    logger.log(`RabbitMQ URL: ${config.rabbitmqUrlForLogging}`);
  } catch (error) {
    logger.error(`Failed to start application: ${errorMessage(error)}`);
    process.exit(1);
  }
}

bootstrap().catch((error) => {
  console.error(error);
  process.exit(1);
});
