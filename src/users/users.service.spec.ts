import { JwtService } from '@nestjs/jwt';
import { DataSource } from 'typeorm';
import { ConfirmationCodeService } from '../auth/confirmation-code.service';
import { TokenService } from '../auth/token.service';
import { ANONYMOUS } from '../common/actor';
import {
  ForbiddenError,
  NotFoundError,
  UnauthenticatedError,
  ValidationError,
} from '../common/errors';
import { Comment, Review, User } from '../database/entities';
import { RecordingDelivery } from '../../test/utils/recording-delivery';
import {
  actorFor,
  createTestStorage,
  seedTitle,
  seedUser,
  testConfig,
} from '../../test/utils/test-database';
import { UsersService } from './users.service';

describe('UsersService', () => {
  let dataSource: DataSource;
  let delivery: RecordingDelivery;
  let service: UsersService;
  let admin: User;

  beforeEach(async () => {
    const storage = await createTestStorage();
    dataSource = storage.dataSource;
    delivery = new RecordingDelivery();
    const codes = new ConfirmationCodeService(
      storage.unitOfWork,
      delivery,
      new TokenService(new JwtService({ secret: 'test-secret' })),
      testConfig,
    );
    service = new UsersService(storage.unitOfWork, dataSource.getRepository(User), codes);
    admin = await seedUser(dataSource, 'root', 'admin');
  });

  afterEach(async () => {
    await dataSource.destroy();
  });

  describe('register', () => {
    it('creates a user with the user role and delivers a code', async () => {
      const user = await service.register('dana@example.test', 'dana');

      expect(user.role).toBe('user');
      expect(delivery.sent).toHaveLength(1);
      const stored = await dataSource.getRepository(User).findOneByOrFail({ username: 'dana' });
      expect(stored.confirmationCode).toBe(delivery.lastCodeFor('dana@example.test'));
    });

    it.each([
      ['a reserved username', 'me@example.test', 'me'],
      ['a malformed email', 'not-an-email', 'erin'],
      ['a username with spaces', 'erin@example.test', 'erin smith'],
    ])('rejects %s', async (_case, email, username) => {
      await expect(service.register(email, username)).rejects.toBeInstanceOf(ValidationError);
      expect(delivery.sent).toEqual([]);
    });

    it('rejects a taken email or username', async () => {
      await service.register('dana@example.test', 'dana');

      await expect(service.register('dana@example.test', 'dana2')).rejects.toThrow(
        'Email is already in use',
      );
      await expect(service.register('other@example.test', 'dana')).rejects.toThrow(
        'Username is already in use',
      );
    });

    it('keeps the registration when delivery fails', async () => {
      delivery.failWith = new Error('smtp down');

      await service.register('dana@example.test', 'dana');

      expect(await dataSource.getRepository(User).countBy({ username: 'dana' })).toBe(1);
    });
  });

  describe('signup', () => {
    it('re-issues a code for an existing email and username pair', async () => {
      const first = await service.signup('dana@example.test', 'dana');
      const again = await service.signup('dana@example.test', 'dana');

      expect(again.id).toBe(first.id);
      expect(delivery.sent).toHaveLength(2);
      expect(delivery.sent[1].code).not.toBe(delivery.sent[0].code);
    });

    it('rejects a pair that half matches an existing user', async () => {
      await service.signup('dana@example.test', 'dana');

      await expect(service.signup('dana@example.test', 'someone')).rejects.toBeInstanceOf(
        ValidationError,
      );
      await expect(service.signup('someone@example.test', 'dana')).rejects.toBeInstanceOf(
        ValidationError,
      );
    });
  });

  describe('setRole', () => {
    it('lets admins promote a user', async () => {
      await seedUser(dataSource, 'dana');

      const user = await service.setRole(actorFor(admin), 'dana', 'moderator');

      expect(user.role).toBe('moderator');
    });

    it('rejects roles that cannot be stored', async () => {
      await seedUser(dataSource, 'dana');

      await expect(service.setRole(actorFor(admin), 'dana', 'anonymous')).rejects.toBeInstanceOf(
        ValidationError,
      );
    });

    it('forbids moderators from changing roles', async () => {
      const moderator = await seedUser(dataSource, 'mod', 'moderator');

      await expect(service.setRole(actorFor(moderator), 'mod', 'admin')).rejects.toBeInstanceOf(
        ForbiddenError,
      );
      expect((await service.lookup('mod'))?.role).toBe('moderator');
    });
  });

  describe('administration', () => {
    it('lists users by username and filters by fragment', async () => {
      await seedUser(dataSource, 'zoe');
      await seedUser(dataSource, 'amir');

      const all = await service.list(actorFor(admin));
      const filtered = await service.list(actorFor(admin), { search: 'O' });

      expect(all.results.map((user) => user.username)).toEqual(['amir', 'root', 'zoe']);
      expect(filtered.results.map((user) => user.username)).toEqual(['root', 'zoe']);
    });

    it('is closed to non-admins', async () => {
      const user = await seedUser(dataSource, 'dana');

      await expect(service.list(actorFor(user))).rejects.toBeInstanceOf(ForbiddenError);
      await expect(service.get(ANONYMOUS, 'root')).rejects.toBeInstanceOf(ForbiddenError);
    });

    it('creates users with a chosen role and no code', async () => {
      const user = await service.create(actorFor(admin), {
        email: 'eve@example.test',
        username: 'eve',
        role: 'moderator',
        bio: 'Curates westerns',
      });

      expect(user).toMatchObject({ role: 'moderator', bio: 'Curates westerns', confirmationCode: null });
      expect(delivery.sent).toEqual([]);
    });

    it('updates profile fields and role', async () => {
      await seedUser(dataSource, 'dana');

      const user = await service.update(actorFor(admin), 'dana', {
        firstName: 'Dana',
        role: 'admin',
      });

      expect(user).toMatchObject({ firstName: 'Dana', role: 'admin' });
    });

    it('refuses to rename onto a taken username', async () => {
      await seedUser(dataSource, 'dana');

      await expect(
        service.update(actorFor(admin), 'dana', { username: 'root' }),
      ).rejects.toBeInstanceOf(ValidationError);
    });

    it('reports unknown usernames as not found', async () => {
      await expect(service.get(actorFor(admin), 'ghost')).rejects.toBeInstanceOf(NotFoundError);
      await expect(service.remove(actorFor(admin), 'ghost')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('keeps a deleted user’s reviews and comments without an author', async () => {
      const dana = await seedUser(dataSource, 'dana');
      const title = await seedTitle(dataSource, 'Salt Marsh');
      const reviews = dataSource.getRepository(Review);
      const comments = dataSource.getRepository(Comment);
      const review = await reviews.save(
        reviews.create({ title, author: dana, text: 'Moody', score: 7 }),
      );
      await comments.save(comments.create({ review, author: dana, text: 'Still true' }));

      await service.remove(actorFor(admin), 'dana');

      expect(await service.lookup('dana')).toBeNull();
      const orphan = await reviews.findOneByOrFail({ id: review.id });
      expect(orphan.authorId).toBeNull();
      expect(orphan.score).toBe(7);
      expect((await comments.find())[0].authorId).toBeNull();
    });
  });

  describe('me', () => {
    it('returns and updates the caller’s own profile', async () => {
      const dana = await seedUser(dataSource, 'dana');

      const updated = await service.updateMe(actorFor(dana), { bio: 'Night owl' });

      expect(updated.bio).toBe('Night owl');
      expect((await service.me(actorFor(dana))).bio).toBe('Night owl');
    });

    it('ignores a role change requested by a non-admin', async () => {
      const dana = await seedUser(dataSource, 'dana');

      const updated = await service.updateMe(actorFor(dana), { role: 'admin' });

      expect(updated.role).toBe('user');
    });

    it('requires an authenticated actor', async () => {
      await expect(service.me(ANONYMOUS)).rejects.toBeInstanceOf(UnauthenticatedError);
    });
  });
});
