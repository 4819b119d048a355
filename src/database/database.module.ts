import { Global, Module } from '@nestjs/common';
import { TypeOrmModule, TypeOrmModuleOptions } from '@nestjs/typeorm';
import { KeyedLock } from '../common/keyed-lock';
import { UnitOfWork } from '../common/unit-of-work';
import { APP_CONFIG, AppConfig } from '../config/configuration';
import { ENTITIES } from './entities';

export function typeOrmOptions(config: AppConfig): TypeOrmModuleOptions {
  const { database } = config;
  if (database.driver === 'better-sqlite3') {
    return {
      type: 'better-sqlite3',
      database: database.name,
      entities: ENTITIES,
      synchronize: database.synchronize,
    };
  }
  return {
    type: 'postgres',
    host: database.host,
    port: database.port,
    username: database.username,
    password: database.password,
    database: database.name,
    entities: ENTITIES,
    synchronize: database.synchronize,
  };
}

@Global()
@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig) => typeOrmOptions(config),
    }),
    TypeOrmModule.forFeature(ENTITIES),
  ],
  providers: [UnitOfWork, KeyedLock],
  exports: [TypeOrmModule, UnitOfWork, KeyedLock],
})
export class DatabaseModule {}
