import { DataSource } from 'typeorm';
import { Actor } from '../../src/common/actor';
import { KeyedLock } from '../../src/common/keyed-lock';
import { UnitOfWork } from '../../src/common/unit-of-work';
import { AppConfig } from '../../src/config/configuration';
import {
  Category,
  ENTITIES,
  Genre,
  Title,
  User,
} from '../../src/database/entities';
import type { StoredRole } from '../../src/policy/roles';

export const testConfig: AppConfig = {
  port: 0,
  database: {
    driver: 'better-sqlite3',
    host: 'localhost',
    port: 0,
    username: '',
    password: '',
    name: ':memory:',
    synchronize: true,
  },
  auth: {
    jwtSecret: 'test-secret',
    jwtExpiresIn: '1h',
    codeTtlMinutes: 15,
  },
  mail: {
    from: 'noreply@example.test',
  },
  importDir: 'test/fixtures/csv',
};

export async function createTestDataSource(): Promise<DataSource> {
  const dataSource = new DataSource({
    type: 'better-sqlite3',
    database: ':memory:',
    entities: ENTITIES,
    synchronize: true,
  });
  return dataSource.initialize();
}

export interface TestStorage {
  dataSource: DataSource;
  unitOfWork: UnitOfWork;
  lock: KeyedLock;
}

export async function createTestStorage(): Promise<TestStorage> {
  const dataSource = await createTestDataSource();
  const lock = new KeyedLock();
  return {
    dataSource,
    unitOfWork: new UnitOfWork(dataSource, lock),
    lock,
  };
}

export async function seedUser(
  dataSource: DataSource,
  username: string,
  role: StoredRole = 'user',
): Promise<User> {
  const repository = dataSource.getRepository(User);
  return repository.save(
    repository.create({ username, email: `${username}@example.test`, role }),
  );
}

export function actorFor(user: User): Actor {
  return { userId: user.id, role: user.role };
}

export async function seedTitle(
  dataSource: DataSource,
  name: string,
  options: { year?: number; category?: Category | null; genres?: Genre[] } = {},
): Promise<Title> {
  const repository = dataSource.getRepository(Title);
  return repository.save(
    repository.create({
      name,
      year: options.year ?? 2000,
      description: null,
      category: options.category ?? null,
      genres: options.genres ?? [],
      rating: null,
    }),
  );
}

export async function seedCategory(
  dataSource: DataSource,
  name: string,
  slug: string,
): Promise<Category> {
  const repository = dataSource.getRepository(Category);
  return repository.save(repository.create({ name, slug }));
}

export async function seedGenre(
  dataSource: DataSource,
  name: string,
  slug: string,
): Promise<Genre> {
  const repository = dataSource.getRepository(Genre);
  return repository.save(repository.create({ name, slug }));
}
