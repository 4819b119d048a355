import { Global, Module } from '@nestjs/common';
import { config as loadEnv } from 'dotenv';
import { APP_CONFIG, loadConfig } from './configuration';

@Global()
@Module({
  providers: [
    {
      provide: APP_CONFIG,
      useFactory: () => {
        loadEnv();
        return loadConfig();
      },
    },
  ],
  exports: [APP_CONFIG],
})
export class ConfigModule {}
