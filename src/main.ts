import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { MigrationService } from './modules/database/migration.service';

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule);

  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
  app.enableShutdownHooks();

  const configService = app.get(ConfigService);

  if (configService.get<boolean>('RUN_MIGRATIONS')) {
    await app.get(MigrationService).runMigrations();
  } else {
    logger.log('⏭️  RUN_MIGRATIONS is off; skipping database migrations');
  }

  const port = configService.get<number>('PORT') ?? 8080;
  await app.listen(port, '0.0.0.0');
  logger.log(`🚗 Car rental API running on port ${port}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error('❌ Failed to start application', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
