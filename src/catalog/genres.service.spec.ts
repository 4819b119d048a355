import { DataSource } from 'typeorm';
import { Genre, Title, User } from '../database/entities';
import { actorFor, createTestStorage, seedTitle, seedUser } from '../../test/utils/test-database';
import { GenresService } from './genres.service';

describe('GenresService', () => {
  let dataSource: DataSource;
  let service: GenresService;
  let admin: User;

  beforeEach(async () => {
    const storage = await createTestStorage();
    dataSource = storage.dataSource;
    service = new GenresService(storage.unitOfWork, dataSource.getRepository(Genre));
    admin = await seedUser(dataSource, 'root', 'admin');
  });

  afterEach(async () => {
    await dataSource.destroy();
  });

  it('removes a deleted genre from every title but keeps the titles', async () => {
    const drama = await service.create(actorFor(admin), { name: 'Drama', slug: 'drama' });
    const comedy = await service.create(actorFor(admin), { name: 'Comedy', slug: 'comedy' });
    const title = await seedTitle(dataSource, 'Two Faces', { genres: [drama, comedy] });

    await service.remove(actorFor(admin), 'drama');

    const stored = await dataSource
      .getRepository(Title)
      .findOneOrFail({ where: { id: title.id }, relations: { genres: true } });
    expect(stored.genres.map((genre) => genre.slug)).toEqual(['comedy']);
  });
});
