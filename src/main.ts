import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { APP_CONFIG, AppConfig } from './config/configuration';

async function bootstrap() {
  const app = configureApp(await NestFactory.create(AppModule));
  const config = app.get<AppConfig>(APP_CONFIG);

  await app.listen(config.port);
  new Logger('Bootstrap').log(`Listening on port ${config.port}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    'Startup failed',
    error instanceof Error ? error.stack : String(error),
  );
  process.exitCode = 1;
});
