import { Injectable, Logger } from '@nestjs/common';
import { DataSource, EntityManager } from 'typeorm';
import { UnavailableError } from './errors';
import { KeyedLock } from './keyed-lock';
import { translateStorageError } from './storage-errors';

// sqlite drivers hand every caller the same connection, so only one
// transaction may be open at a time
const SINGLE_CONNECTION_DRIVERS = new Set(['sqlite', 'better-sqlite3']);
const CONNECTION_LOCK_KEY = 'storage:connection';

/**
 * Runs a piece of work in one database transaction. Either everything the
 * callback wrote is committed or nothing is, and storage failures come out
 * as core errors.
 */
@Injectable()
export class UnitOfWork {
  private readonly logger = new Logger(UnitOfWork.name);

  constructor(
    private readonly dataSource: DataSource,
    private readonly lock: KeyedLock,
  ) {}

  async run<T>(work: (manager: EntityManager) => Promise<T>): Promise<T> {
    try {
      if (SINGLE_CONNECTION_DRIVERS.has(this.dataSource.options.type)) {
        return await this.lock.run(CONNECTION_LOCK_KEY, () =>
          this.dataSource.transaction(work),
        );
      }
      return await this.dataSource.transaction(work);
    } catch (error) {
      const translated = translateStorageError(error);
      if (translated instanceof UnavailableError) {
        this.logger.error(
          'Transaction rolled back after a storage failure',
          error instanceof Error ? error.stack : String(error),
        );
      }
      throw translated;
    }
  }
}
