import { DataSource } from 'typeorm';
import { ANONYMOUS } from '../common/actor';
import {
  ConflictError,
  ForbiddenError,
  NotFoundError,
  ValidationError,
} from '../common/errors';
import { Category, Title, User } from '../database/entities';
import { actorFor, createTestStorage, seedTitle, seedUser } from '../../test/utils/test-database';
import { CategoriesService } from './categories.service';

describe('CategoriesService', () => {
  let dataSource: DataSource;
  let service: CategoriesService;
  let admin: User;

  beforeEach(async () => {
    const storage = await createTestStorage();
    dataSource = storage.dataSource;
    service = new CategoriesService(storage.unitOfWork, dataSource.getRepository(Category));
    admin = await seedUser(dataSource, 'root', 'admin');
  });

  afterEach(async () => {
    await dataSource.destroy();
  });

  it('creates and finds a category by slug', async () => {
    await service.create(actorFor(admin), { name: 'Film', slug: 'film' });

    await expect(service.get('film')).resolves.toMatchObject({ name: 'Film', slug: 'film' });
  });

  it('lists categories by name with a search fragment', async () => {
    await service.create(actorFor(admin), { name: 'Music', slug: 'music' });
    await service.create(actorFor(admin), { name: 'Book', slug: 'book' });
    await service.create(actorFor(admin), { name: 'Film', slug: 'film' });

    const all = await service.list();
    const filtered = await service.list({ search: 'O' });

    expect(all.results.map((entry) => entry.slug)).toEqual(['book', 'film', 'music']);
    expect(filtered).toMatchObject({ count: 1, page: 1, pageSize: 10 });
    expect(filtered.results.map((entry) => entry.slug)).toEqual(['book']);
  });

  it('rejects duplicate names and slugs', async () => {
    await service.create(actorFor(admin), { name: 'Film', slug: 'film' });

    await expect(
      service.create(actorFor(admin), { name: 'Film', slug: 'movies' }),
    ).rejects.toBeInstanceOf(ConflictError);
    await expect(
      service.create(actorFor(admin), { name: 'Movies', slug: 'film' }),
    ).rejects.toBeInstanceOf(ConflictError);
  });

  it.each(['with space', 'ünïcode', ''])('rejects slug %p', async (slug) => {
    await expect(
      service.create(actorFor(admin), { name: 'Anything', slug }),
    ).rejects.toBeInstanceOf(ValidationError);
  });

  it('is read-only for everyone but admins', async () => {
    const moderator = await seedUser(dataSource, 'mod', 'moderator');

    await expect(
      service.create(actorFor(moderator), { name: 'Film', slug: 'film' }),
    ).rejects.toBeInstanceOf(ForbiddenError);
    await expect(service.remove(ANONYMOUS, 'film')).rejects.toBeInstanceOf(ForbiddenError);
    expect(await dataSource.getRepository(Category).count()).toBe(0);
  });

  it('renames a category while keeping its slug', async () => {
    await service.create(actorFor(admin), { name: 'Film', slug: 'film' });

    const updated = await service.update(actorFor(admin), 'film', { name: 'Cinema' });

    expect(updated).toMatchObject({ name: 'Cinema', slug: 'film' });
  });

  it('leaves titles uncategorized when their category is deleted', async () => {
    const category = await service.create(actorFor(admin), { name: 'Film', slug: 'film' });
    const title = await seedTitle(dataSource, 'North Road', { category });

    await service.remove(actorFor(admin), 'film');

    const stored = await dataSource.getRepository(Title).findOneByOrFail({ id: title.id });
    expect(stored.categoryId).toBeNull();
    await expect(service.get('film')).rejects.toBeInstanceOf(NotFoundError);
  });
});
