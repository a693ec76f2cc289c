import 'reflect-metadata';
import 'dotenv/config';
import { NestFactory } from '@nestjs/core';
import { Logger, ValidationPipe } from '@nestjs/common';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { toNestLogLevels } from './common/log-level';
import { isLogLevel } from './config/app-config';
import { AppConfigService } from './config/config.service';
import { TaskRegistry } from './tasks/task-registry.service';

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  const envLevel = process.env.LOG_LEVEL ?? 'info';

  try {
    const app = await NestFactory.create(AppModule, {
      logger: toNestLogLevels(isLogLevel(envLevel) ? envLevel : 'info'),
    });

    app.useGlobalPipes(
      new ValidationPipe({
        whitelist: true,
        forbidNonWhitelisted: true,
        transform: true,
      }),
    );

    const document = SwaggerModule.createDocument(
      app,
      new DocumentBuilder()
        .setTitle('Funding Settlement Engine')
        .setDescription('Start, list and stop per-symbol funding settlement tasks')
        .setVersion('1.0')
        .addTag('tasks', 'Monitoring tasks')
        .addTag('health')
        .build(),
    );
    SwaggerModule.setup('api', app, document);

    // Stop tasks (and cancel their orders) before the process exits
    const registry = app.get(TaskRegistry);
    const shutdown = async (signal: string) => {
      logger.warn(`🛑 ${signal} received, stopping ${registry.list().length} task(s)`);
      await registry.stopAll();
      await app.close();
      process.exit(0);
    };
    process.once('SIGINT', (signal) => void shutdown(signal));
    process.once('SIGTERM', (signal) => void shutdown(signal));

    const config = app.get(AppConfigService);
    const port = config.get('port');
    await app.listen(port);

    logger.log(`🚀 Funding settlement engine listening on port ${port}`);
    logger.log(`📊 Environment: ${config.get('environment')}`);
    logger.log(`📚 API documentation at http://localhost:${port}/api`);
  } catch (error) {
    logger.error('❌ Failed to start application', error instanceof Error ? error.stack : String(error));
    process.exit(1);
  }
}

void bootstrap();
