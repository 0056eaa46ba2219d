import { DataSource, EntityManager } from 'typeorm';
import { AppConfig } from '../config/environment';
import { logger } from '../utils/logger';
import { DatabaseError } from '../utils/errors';
import { TRACKING_ENTITIES } from './entities';

export function createDataSource(config: AppConfig['database']): DataSource {
  return new DataSource({
    type: 'better-sqlite3',
    database: config.path,
    entities: TRACKING_ENTITIES,
    synchronize: config.synchronize,
    logging: false,
  });
}

// Serializes every unit of work issued by this process. SQLite has a single
// writer and TypeORM shares one query runner per better-sqlite3 connection,
// so overlapping transactions would interleave on the same connection.
//
// Work passed to `transaction` or `read` must not call back into this object.
export class TrackingDatabase {
  private tail: Promise<unknown> = Promise.resolve();

  constructor(readonly dataSource: DataSource) {}

  async connect(): Promise<void> {
    if (this.dataSource.isInitialized) return;
    try {
      await this.dataSource.initialize();
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      throw new DatabaseError(`Failed to open database: ${err.message}`, 'connect', err);
    }
    logger.debug('Database initialized', { entities: TRACKING_ENTITIES.length });
  }

  async disconnect(): Promise<void> {
    await this.tail;
    if (this.dataSource.isInitialized) {
      await this.dataSource.destroy();
    }
  }

  transaction<T>(work: (manager: EntityManager) => Promise<T>): Promise<T> {
    return this.enqueue(() => this.dataSource.transaction(work));
  }

  read<T>(work: (manager: EntityManager) => Promise<T>): Promise<T> {
    return this.enqueue(() => work(this.dataSource.manager));
  }

  private enqueue<T>(run: () => Promise<T>): Promise<T> {
    const result = this.tail.then(run);
    // failures surface through `result`
    this.tail = result.catch(() => undefined);
    return result;
  }
}
