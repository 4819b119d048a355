import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, ILike, Not, Repository } from 'typeorm';
import { ConfirmationCodeService } from '../auth/confirmation-code.service';
import { Actor } from '../common/actor';
import {
  ConflictError,
  NotFoundError,
  UnauthenticatedError,
  ValidationError,
} from '../common/errors';
import { Page, PageRequest, pageWindow, toPage } from '../common/pagination';
import { UnitOfWork } from '../common/unit-of-work';
import { Comment, Review, User } from '../database/entities';
import { authorize } from '../policy/policy';
import { isStoredRole, StoredRole } from '../policy/roles';
import { assertValidEmail, assertValidUsername } from './identity-rules';

export interface ProfileChanges {
  firstName?: string;
  lastName?: string;
  bio?: string;
}

export interface NewUser extends ProfileChanges {
  email: string;
  username: string;
  role?: StoredRole;
}

export interface UserChanges extends ProfileChanges {
  email?: string;
  username?: string;
  role?: string;
}

export interface UserListQuery extends PageRequest {
  search?: string;
}

function parseRole(value: string): StoredRole {
  if (!isStoredRole(value)) {
    throw new ValidationError(`Unknown role "${value}"`);
  }
  return value;
}

@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(
    private readonly unitOfWork: UnitOfWork,
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
    private readonly codes: ConfirmationCodeService,
  ) {}

  /**
   * Creates a user with the `user` role and issues a confirmation code.
   * The code is stored with the user; delivery runs after commit and its
   * failure does not undo the registration.
   */
  async register(email: string, username: string): Promise<User> {
    assertValidEmail(email);
    assertValidUsername(username);

    const { user, code } = await this.reportTakenAsInvalid(
      this.unitOfWork.run(async (manager) => {
        const user = await this.insertUser(manager, { email, username });
        const code = await this.codes.assignCode(manager, user);
        return { user, code };
      }),
    );

    this.logger.log(`Registered user ${user.username}`);
    await this.codes.deliver(user.email, code);
    return user;
  }

  /**
   * Registration endpoint behaviour: an exact (email, username) match gets a
   * new code; anything else is a fresh registration.
   */
  async signup(email: string, username: string): Promise<User> {
    const [byEmail, byUsername] = await Promise.all([
      this.userRepository.findOne({ where: { email } }),
      this.userRepository.findOne({ where: { username } }),
    ]);

    if (byEmail && byEmail.username !== username) {
      throw new ValidationError('Email is already in use');
    }
    if (byUsername && byUsername.email !== email) {
      throw new ValidationError('Username is already in use');
    }
    if (byEmail) {
      await this.codes.issueCode(email, username);
      return byEmail;
    }
    return this.register(email, username);
  }

  async setRole(actor: Actor, username: string, newRole: string): Promise<User> {
    authorize(actor, 'user:set-role');
    const role = parseRole(newRole);

    const user = await this.unitOfWork.run(async (manager) => {
      const user = await this.findByUsername(manager, username);
      user.role = role;
      return manager.save(user);
    });

    this.logger.log(`Role of ${user.username} set to ${newRole}`);
    return user;
  }

  async lookup(username: string): Promise<User | null> {
    return this.userRepository.findOne({ where: { username } });
  }

  async list(actor: Actor, query: UserListQuery = {}): Promise<Page<User>> {
    authorize(actor, 'user:manage');
    const window = pageWindow(query);
    const result = await this.userRepository.findAndCount({
      where: query.search ? { username: ILike(`%${query.search}%`) } : {},
      order: { username: 'ASC' },
      skip: window.skip,
      take: window.take,
    });
    return toPage(result, window, (user) => user);
  }

  async get(actor: Actor, username: string): Promise<User> {
    authorize(actor, 'user:manage');
    const user = await this.lookup(username);
    if (!user) {
      throw new NotFoundError(`User ${username} not found`);
    }
    return user;
  }

  /** Admin-side creation; no confirmation code is issued. */
  async create(actor: Actor, input: NewUser): Promise<User> {
    authorize(actor, 'user:manage');
    assertValidEmail(input.email);
    assertValidUsername(input.username);

    const user = await this.reportTakenAsInvalid(
      this.unitOfWork.run((manager) => this.insertUser(manager, input)),
    );
    this.logger.log(`Created user ${user.username} as ${user.role}`);
    return user;
  }

  async update(actor: Actor, username: string, changes: UserChanges): Promise<User> {
    authorize(actor, 'user:manage');
    const role = changes.role === undefined ? undefined : parseRole(changes.role);

    return this.reportTakenAsInvalid(
      this.unitOfWork.run(async (manager) => {
        const user = await this.findByUsername(manager, username);
        await this.applyChanges(manager, user, changes);
        if (role !== undefined) {
          user.role = role;
        }
        return manager.save(user);
      }),
    );
  }

  /**
   * Deletes the account. Reviews and comments it wrote stay, authorless.
   */
  async remove(actor: Actor, username: string): Promise<void> {
    authorize(actor, 'user:manage');

    await this.unitOfWork.run(async (manager) => {
      const user = await this.findByUsername(manager, username);
      await manager
        .createQueryBuilder()
        .update(Review)
        .set({ author: null })
        .where('author_id = :userId', { userId: user.id })
        .execute();
      await manager
        .createQueryBuilder()
        .update(Comment)
        .set({ author: null })
        .where('author_id = :userId', { userId: user.id })
        .execute();
      await manager.delete(User, { id: user.id });
    });

    this.logger.log(`Deleted user ${username}`);
  }

  async me(actor: Actor): Promise<User> {
    const userId = this.requireIdentity(actor);
    const user = await this.userRepository.findOne({ where: { id: userId } });
    if (!user) {
      throw new NotFoundError('Your account no longer exists');
    }
    return user;
  }

  /** Profile self-service; the role field is only honoured for admins. */
  async updateMe(actor: Actor, changes: UserChanges): Promise<User> {
    const userId = this.requireIdentity(actor);
    const { role: requestedRole, ...rest } = changes;
    const role =
      requestedRole !== undefined && actor.role === 'admin'
        ? parseRole(requestedRole)
        : undefined;

    return this.reportTakenAsInvalid(
      this.unitOfWork.run(async (manager) => {
        const user = await manager.findOne(User, { where: { id: userId } });
        if (!user) {
          throw new NotFoundError('Your account no longer exists');
        }
        await this.applyChanges(manager, user, rest);
        if (role !== undefined) {
          user.role = role;
        }
        return manager.save(user);
      }),
    );
  }

  private requireIdentity(actor: Actor): number {
    if (actor.userId === null) {
      throw new UnauthenticatedError();
    }
    return actor.userId;
  }

  private async findByUsername(manager: EntityManager, username: string): Promise<User> {
    const user = await manager.findOne(User, { where: { username } });
    if (!user) {
      throw new NotFoundError(`User ${username} not found`);
    }
    return user;
  }

  private async insertUser(manager: EntityManager, input: NewUser): Promise<User> {
    const taken = await manager.findOne(User, {
      where: [{ email: input.email }, { username: input.username }],
    });
    if (taken) {
      throw new ValidationError(
        taken.email === input.email
          ? 'Email is already in use'
          : 'Username is already in use',
      );
    }

    return manager.save(
      manager.create(User, {
        email: input.email,
        username: input.username,
        role: input.role ?? 'user',
        firstName: input.firstName ?? '',
        lastName: input.lastName ?? '',
        bio: input.bio ?? '',
        confirmationCode: null,
        confirmationCodeExpiresAt: null,
      }),
    );
  }

  private async applyChanges(
    manager: EntityManager,
    user: User,
    changes: Omit<UserChanges, 'role'>,
  ): Promise<void> {
    if (changes.email !== undefined && changes.email !== user.email) {
      assertValidEmail(changes.email);
      const clash = await manager.count(User, {
        where: { email: changes.email, id: Not(user.id) },
      });
      if (clash > 0) {
        throw new ValidationError('Email is already in use');
      }
      user.email = changes.email;
    }
    if (changes.username !== undefined && changes.username !== user.username) {
      assertValidUsername(changes.username);
      const clash = await manager.count(User, {
        where: { username: changes.username, id: Not(user.id) },
      });
      if (clash > 0) {
        throw new ValidationError('Username is already in use');
      }
      user.username = changes.username;
    }
    if (changes.firstName !== undefined) user.firstName = changes.firstName;
    if (changes.lastName !== undefined) user.lastName = changes.lastName;
    if (changes.bio !== undefined) user.bio = changes.bio;
  }

  // a unique-index race loser is reported like the pre-check would have
  private async reportTakenAsInvalid<T>(work: Promise<T>): Promise<T> {
    try {
      return await work;
    } catch (error) {
      if (error instanceof ConflictError) {
        throw new ValidationError('Email or username is already in use');
      }
      throw error;
    }
  }
}
