import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../app.module';
import { APP_CONFIG, AppConfig } from '../config/configuration';
import { ImportService } from './import.service';

async function run(): Promise<void> {
  const logger = new Logger('ImportCsv');
  const app = await NestFactory.createApplicationContext(AppModule);
  try {
    const config = app.get<AppConfig>(APP_CONFIG);
    const directory = process.argv[2] ?? config.importDir;
    const report = await app.get(ImportService).importDirectory(directory);
    for (const file of report.files) {
      logger.log(
        file.present
          ? `${file.file}: ${file.imported} imported, ${file.skipped} skipped`
          : `${file.file}: missing`,
      );
    }
    logger.log(`Ratings recomputed for ${report.ratedTitles.length} title(s)`);
  } finally {
    await app.close();
  }
}

run().catch((error: unknown) => {
  new Logger('ImportCsv').error(
    'Import failed',
    error instanceof Error ? error.stack : String(error),
  );
  process.exitCode = 1;
});
